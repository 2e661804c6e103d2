/**
 * Error codes for join operations
 */
export const JoinErrorCode = {
  MERGE_CONFLICT: 'MERGE_CONFLICT',
  INVALID_INPUT: 'INVALID_INPUT',
} as const

export type JoinErrorCode = (typeof JoinErrorCode)[keyof typeof JoinErrorCode]

export class JoinError extends Error {
  constructor(
    public code: JoinErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'JoinError'
  }
}

export function mergeConflictError(reason: string): JoinError {
  return new JoinError(JoinErrorCode.MERGE_CONFLICT, `Cannot merge: ${reason}`)
}

export function invalidJoinInputError(reason: string): JoinError {
  return new JoinError(JoinErrorCode.INVALID_INPUT, `Invalid join input: ${reason}`)
}
