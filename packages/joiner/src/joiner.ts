import type { DataRecord, FieldValue } from '@rosterlink/utils/record'
import { createLogger } from '@rosterlink/utils/logger'
import { isRecord, isRecordList, toKey } from '@rosterlink/utils/record'
import { invalidJoinInputError, mergeConflictError } from './errors'

const log = createLogger('Joiner')

type Mergeable = DataRecord | FieldValue[]

function isMergeable(value: FieldValue | undefined): value is Mergeable {
  return Array.isArray(value) || isRecord(value)
}

function kindOf(value: FieldValue | undefined): string {
  if (Array.isArray(value))
    return 'list'
  if (value === null)
    return 'null'
  return isRecord(value) ? 'record' : typeof value
}

/**
 * Merge `rhs` into `lhs` and return `lhs`.
 *
 * Lists are concatenated. Records are merged field by field: when both sides
 * hold a list or record under the same field they merge recursively,
 * otherwise the `rhs` value replaces the `lhs` one.
 */
export function deepMerge(lhs: DataRecord, rhs: DataRecord): DataRecord
export function deepMerge(lhs: FieldValue[], rhs: FieldValue[]): FieldValue[]
export function deepMerge(lhs: Mergeable, rhs: Mergeable): Mergeable
export function deepMerge(lhs: Mergeable, rhs: Mergeable): Mergeable {
  if (Array.isArray(lhs)) {
    if (!Array.isArray(rhs))
      throw mergeConflictError(`list with ${kindOf(rhs)}`)
    lhs.push(...rhs)
    return lhs
  }
  if (Array.isArray(rhs))
    throw mergeConflictError('record with list')

  for (const [field, value] of Object.entries(rhs)) {
    if (value === undefined)
      continue
    const existing = lhs[field]
    if (existing !== undefined && isMergeable(value)) {
      if (!isMergeable(existing))
        throw mergeConflictError(`field "${field}" holds ${kindOf(existing)}, got ${kindOf(value)}`)
      deepMerge(existing, value)
    }
    else {
      lhs[field] = value
    }
  }
  return lhs
}

/**
 * Join two lists of records on `keyField`.
 *
 * Each `rhs` record whose key matches an `lhs` record is deep-merged into it;
 * the rest are appended. `lhs` is mutated and returned.
 */
export function joinArrayData(
  keyField: string,
  lhs: FieldValue | undefined,
  rhs: FieldValue | undefined,
): DataRecord[] {
  if (!isRecordList(lhs) || !isRecordList(rhs)) {
    throw invalidJoinInputError(
      `both sides must be lists of records (lhs: ${kindOf(lhs)}, rhs: ${kindOf(rhs)})`,
    )
  }

  const lhsIndex = new Map<string, DataRecord>()
  for (const item of lhs) {
    const key = toKey(item[keyField])
    if (key !== undefined)
      lhsIndex.set(key, item)
  }

  let merged = 0
  for (const item of rhs) {
    const key = toKey(item[keyField])
    const match = key === undefined ? undefined : lhsIndex.get(key)
    if (match) {
      deepMerge(match, item)
      merged++
    }
    else {
      lhs.push(item)
      if (key !== undefined)
        lhsIndex.set(key, item)
    }
  }

  log.debug(`Joined on "${keyField}": ${merged} merged, ${rhs.length - merged} appended`)
  return lhs
}

/**
 * Turn a keyed mapping back into the list of its values.
 *
 * A `private` entry holding a mapping is itself flattened and appended as a
 * single `{ private: [...] }` record.
 */
export function flattenIndex(index: DataRecord): FieldValue[] {
  const result: FieldValue[] = []
  let privateData: DataRecord | undefined

  for (const [key, value] of Object.entries(index)) {
    if (value === undefined)
      continue
    if (key === 'private' && isRecord(value)) {
      privateData = value
      continue
    }
    result.push(value)
  }

  if (privateData)
    result.push({ private: flattenIndex(privateData) })
  return result
}
