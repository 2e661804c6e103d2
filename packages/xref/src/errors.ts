/**
 * Error codes for cross-reference operations
 */
export const XRefErrorCode = {
  REFERENCE_NOT_FOUND: 'REFERENCE_NOT_FOUND',
  FIELD_CONFLICT: 'FIELD_CONFLICT',
  INVALID_COLLECTION: 'INVALID_COLLECTION',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type XRefErrorCode = (typeof XRefErrorCode)[keyof typeof XRefErrorCode]

/**
 * Error raised by cross-reference operations. `code` identifies the failure
 * and the message names the offending key or field.
 */
export class XRefError extends Error {
  constructor(
    public code: XRefErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'XRefError'
  }
}

/**
 * Create a reference not found error
 */
export function referenceNotFoundError(id: string, context?: string): XRefError {
  const where = context ? ` (${context})` : ''
  return new XRefError(XRefErrorCode.REFERENCE_NOT_FOUND, `Referenced entity not found: ${id}${where}`)
}

/**
 * Create an error for a link field that already holds a non-list value
 */
export function fieldConflictError(field: string, found: string): XRefError {
  return new XRefError(
    XRefErrorCode.FIELD_CONFLICT,
    `Cannot append to field "${field}": it holds a ${found}, not a list`,
  )
}

/**
 * Create an error for a snapshot collection of the wrong shape
 */
export function invalidCollectionError(name: string, expected: string): XRefError {
  return new XRefError(XRefErrorCode.INVALID_COLLECTION, `Collection "${name}" must be ${expected}`)
}

/**
 * Create an invalid configuration error
 */
export function invalidConfigError(reason: string): XRefError {
  return new XRefError(XRefErrorCode.INVALID_CONFIG, `Invalid configuration: ${reason}`)
}
