/**
 * Open record values shared by every collection in a site data snapshot.
 *
 * Records have no fixed shape: the data files decide which fields exist and
 * the cross-reference passes add more at runtime.
 */

export type Scalar = string | number | boolean | null

export type FieldValue = Scalar | DataRecord | FieldValue[]

export interface DataRecord {
  [field: string]: FieldValue | undefined
}

/**
 * A data snapshot: collection name to collection. Most collections are lists
 * of records; `snippets` maps a timestamp to a list of records.
 */
export type SiteData = DataRecord

export function isRecord(value: FieldValue | undefined): value is DataRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isRecordList(value: FieldValue | undefined): value is DataRecord[] {
  return Array.isArray(value) && value.every(isRecord)
}

/**
 * Convert a field value into an index key. Only strings and numbers qualify;
 * everything else (absent, null, booleans, lists, records) yields undefined.
 */
export function toKey(value: FieldValue | undefined): string | undefined {
  if (typeof value === 'string')
    return value
  if (typeof value === 'number')
    return String(value)
  return undefined
}

/** Code-unit ordering, independent of the host locale */
export function compareStrings(a: string, b: string): number {
  if (a < b)
    return -1
  return a > b ? 1 : 0
}

/** Order records by the string form of `field`; records without it sort first */
export function compareByField(field: string): (a: DataRecord, b: DataRecord) => number {
  return (a, b) => compareStrings(toKey(a[field]) ?? '', toKey(b[field]) ?? '')
}

/**
 * Remove later records that share a `field` value with an earlier one.
 * Mutates `list` in place and returns it.
 */
export function uniqueBy(list: DataRecord[], field: string): DataRecord[] {
  const seen = new Set<FieldValue | undefined>()
  const kept = list.filter((item) => {
    const value = item[field]
    if (seen.has(value))
      return false
    seen.add(value)
    return true
  })
  list.splice(0, list.length, ...kept)
  return list
}
