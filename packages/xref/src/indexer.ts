import type { DataRecord } from '@rosterlink/utils/record'
import { toKey } from '@rosterlink/utils/record'

/** Unique-key index: key value to the single record holding it */
export type Index = Map<string, DataRecord>

/** Grouping index: key value to every record holding it, in collection order */
export type GroupIndex = Map<string, DataRecord[]>

/**
 * Group `collection` by the value of `key`.
 *
 * Records without a string or numeric `key` are left out. Each group keeps
 * the relative order its records had in `collection`.
 */
export function createIndex(collection: readonly DataRecord[], key: string): GroupIndex {
  const index: GroupIndex = new Map()
  for (const item of collection) {
    const value = toKey(item[key])
    if (value === undefined)
      continue
    const group = index.get(value)
    if (group)
      group.push(item)
    else
      index.set(value, [item])
  }
  return index
}

/**
 * Index `collection` by `key`, one record per key. A later record with the
 * same key replaces the earlier one but keeps its position in iteration order.
 */
export function createUniqueIndex(collection: readonly DataRecord[], key: string): Index {
  const index: Index = new Map()
  for (const item of collection) {
    const value = toKey(item[key])
    if (value !== undefined)
      index.set(value, item)
  }
  return index
}
