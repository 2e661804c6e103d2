import type { DataRecord, FieldValue } from '@rosterlink/utils/record'
import { isRecord, toKey } from '@rosterlink/utils/record'

function flattenItem(item: FieldValue, key: string): FieldValue {
  return isRecord(item) ? (item[key] ?? null) : item
}

/**
 * Return a copy of `collection` in which each record's `property` list of
 * linked records is replaced by the list of their `key` values.
 *
 * Records are copied shallowly; the originals keep their links. Items that
 * are not records (already flattened identifiers, for instance) are kept.
 */
export function flattenProperty(
  collection: readonly DataRecord[],
  property: string,
  key: string,
): DataRecord[] {
  return collection.map((record) => {
    const copy = { ...record }
    const links = record[property]
    if (Array.isArray(links))
      copy[property] = links.map(item => flattenItem(item, key))
    return copy
  })
}

/**
 * In-place flattenProperty: each record's `property` list is rewritten to
 * hold `key` values. Severs the cycles between linked records.
 */
export function flattenPropertyInPlace<T extends readonly DataRecord[]>(
  collection: T,
  property: string,
  key: string,
): T {
  for (const record of collection) {
    const links = record[property]
    if (!Array.isArray(links))
      continue
    for (let i = 0; i < links.length; i++) {
      const item = links[i]
      if (item !== undefined)
        links[i] = flattenItem(item, key)
    }
  }
  return collection
}

/**
 * Map each record's `primaryKey` value to its flattened `property` list.
 * Records without a `property` list are left out.
 *
 * @example
 * ```typescript
 * propertyMap(team, 'name', 'projects', 'name')
 * // { mbland: ['hub', 'pages'], afeld: ['hub'] }
 * ```
 */
export function propertyMap(
  collection: readonly DataRecord[],
  primaryKey: string,
  property: string,
  key: string,
): Record<string, FieldValue[]> {
  const result: Record<string, FieldValue[]> = {}
  for (const record of collection) {
    const links = record[property]
    const id = toKey(record[primaryKey])
    if (Array.isArray(links) && id !== undefined)
      result[id] = links.map(item => flattenItem(item, key))
  }
  return result
}
