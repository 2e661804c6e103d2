import type { DataRecord, FieldValue } from '@rosterlink/utils/record'
import type { Index } from './indexer'
import { createLogger } from '@rosterlink/utils/logger'
import { isRecord } from '@rosterlink/utils/record'
import { fieldConflictError, referenceNotFoundError } from './errors'

const log = createLogger('XRef')

function label(item: FieldValue): string {
  if (Array.isArray(item))
    return '<list>'
  return isRecord(item) ? '<record>' : String(item)
}

export interface ResolveOptions {
  /**
   * Throw an XRefError instead of skipping an identifier that has no target.
   * Default: false.
   */
  strict?: boolean
}

/**
 * Look up `id` in `targets`. Returns undefined for an unknown id, or throws
 * when `options.strict` is set.
 */
export function resolveReference(
  targets: Index,
  id: string,
  options: ResolveOptions & { strict: true },
): DataRecord
export function resolveReference(
  targets: Index,
  id: string,
  options?: ResolveOptions,
): DataRecord | undefined
export function resolveReference(
  targets: Index,
  id: string,
  options: ResolveOptions = {},
): DataRecord | undefined {
  const target = targets.get(id)
  if (!target && options.strict)
    throw referenceNotFoundError(id)
  return target
}

/**
 * Append `item` to the list stored under `field`, creating the list when the
 * field is absent.
 */
export function appendLink(record: DataRecord, field: string, item: DataRecord): void {
  const existing = record[field]
  if (existing === undefined || existing === null) {
    record[field] = [item]
  }
  else if (Array.isArray(existing)) {
    existing.push(item)
  }
  else {
    throw fieldConflictError(field, isRecord(existing) ? 'record' : typeof existing)
  }
}

/**
 * Link records in `sources` with records in `targets`.
 *
 * Every source whose `sourceKey` field is a list of target identifiers has
 * each identifier replaced, in place, by the target record itself, and is
 * appended to that target's `targetKey` list. Identifiers with no target are
 * removed from the list; sources without a `sourceKey` list are skipped.
 *
 * An item that is already one of the target records is linked again, so
 * running this twice over the same sources duplicates the reciprocal entries.
 */
export function createXrefs(
  sources: readonly DataRecord[] | undefined,
  sourceKey: string,
  targets: Index,
  targetKey: string,
  options: ResolveOptions = {},
): void {
  let resolvedTargets: Set<DataRecord> | undefined

  const resolve = (item: FieldValue): DataRecord | undefined => {
    if (typeof item === 'string')
      return resolveReference(targets, item, options)
    if (isRecord(item)) {
      resolvedTargets ??= new Set(targets.values())
      if (resolvedTargets.has(item))
        return item
    }
    if (options.strict)
      throw referenceNotFoundError(label(item), `"${sourceKey}" item`)
    return undefined
  }

  for (const source of sources ?? []) {
    const ids = source[sourceKey]
    if (!Array.isArray(ids))
      continue

    const linked: DataRecord[] = []
    for (const id of ids) {
      const target = resolve(id)
      if (!target) {
        log.debug(`Skipped unresolved "${sourceKey}" reference: ${label(id)}`)
        continue
      }
      appendLink(target, targetKey, source)
      linked.push(target)
    }
    ids.splice(0, ids.length, ...linked)
  }
}
