import type { DataRecord, FieldValue, SiteData } from '@rosterlink/utils/record'
import type { Index } from './indexer'
import { joinArrayData } from '@rosterlink/joiner'
import { createLogger } from '@rosterlink/utils/logger'
import { compareByField, compareStrings, isRecord, isRecordList, toKey, uniqueBy } from '@rosterlink/utils/record'
import { invalidCollectionError, referenceNotFoundError } from './errors'
import { createIndex, createUniqueIndex } from './indexer'
import { appendLink, createXrefs, resolveReference } from './xref'

const log = createLogger('CrossReferencer')

/**
 * Keyed merge of two record lists. Must fold `rhs` into `lhs` by `keyField`
 * and return the merged list.
 */
export type ArrayJoiner = (
  keyField: string,
  lhs: FieldValue | undefined,
  rhs: DataRecord[],
) => DataRecord[]

export interface CrossReferencerOptions {
  /** Merge used by xrefLocations. Default: joinArrayData */
  join?: ArrayJoiner
}

// Pass receipts. Each pass returns one; passes that read what an earlier pass
// wrote take that pass's receipt as an argument. The private member makes the
// classes nominal, so only CrossReferencer can produce them.

class ProjectsLinked {
  private readonly linked = true
  readonly pass = 'projects'
}

class GroupsLinked<G extends string> {
  private readonly linked = true
  readonly pass = 'groups'
  constructor(readonly collection: G) {}
}

class SnippetsLinked {
  private readonly linked = true
  readonly pass = 'snippets'
  /** Timestamp of the last snippet batch, if there was any */
  constructor(readonly latest: string | undefined) {}
}

class SkillsLinked {
  private readonly linked = true
  readonly pass = 'skills'
  /** Categories written to `skills`, in configured order */
  constructor(readonly categories: string[]) {}
}

class LocationsLinked {
  private readonly linked = true
  readonly pass = 'locations'
  /** Location codes summarised, sorted */
  constructor(readonly codes: string[]) {}
}

export type { GroupsLinked, LocationsLinked, ProjectsLinked, SkillsLinked, SnippetsLinked }

export interface LocationPrerequisites<G extends string> {
  projects: ProjectsLinked
  groups: GroupsLinked<G>
}

/**
 * Cross-references the collections of one site data snapshot.
 *
 * Holds the snapshot and an index of the `team` collection by `name`, built
 * once. Each pass mutates the snapshot's records in place; none is safe to
 * run twice, since linking again duplicates reciprocal entries.
 */
export class CrossReferencer {
  private readonly teamIndex: Index
  private readonly join: ArrayJoiner

  constructor(
    readonly siteData: SiteData,
    options: CrossReferencerOptions = {},
  ) {
    this.join = options.join ?? joinArrayData
    // Duplicate names: the last record wins
    this.teamIndex = createUniqueIndex(this.collection('team'), 'name')
    log.debug(`Indexed ${this.teamIndex.size} team members`)
  }

  /** Team index: member name to member record */
  get team(): ReadonlyMap<string, DataRecord> {
    return this.teamIndex
  }

  /**
   * Link projects with team members. A project's `team` field may be a
   * comma-separated string of member names; members gain a `projects` list.
   */
  xrefProjectsAndTeamMembers(): ProjectsLinked {
    const projects = this.collection('projects')
    for (const project of projects) {
      if (typeof project.team === 'string')
        project.team = project.team.split(/, ?/)
    }
    createXrefs(projects, 'team', this.teamIndex, 'projects')
    log.debug(`Linked ${projects.length} projects with team members`)
    return new ProjectsLinked()
  }

  /**
   * Link a group collection with team members.
   *
   * @param groupsName - snapshot collection, e.g. `working_groups`; also the
   *   field members gain
   * @param memberFields - group fields listing member names, e.g. `['leads', 'members']`
   */
  xrefGroupsAndTeamMembers<G extends string>(
    groupsName: G,
    memberFields: readonly string[],
  ): GroupsLinked<G> {
    const groups = this.collection(groupsName)
    for (const field of memberFields)
      createXrefs(groups, field, this.teamIndex, groupsName)

    // A lead who is also listed as a member is linked once
    for (const member of this.teamIndex.values()) {
      const linked = member[groupsName]
      if (isRecordList(linked))
        uniqueBy(linked, 'name')
    }
    log.debug(`Linked ${groups.length} ${groupsName} with team members`)
    return new GroupsLinked(groupsName)
  }

  /**
   * Summarise team members, projects and groups per location code and merge
   * the summaries into the `locations` collection, keyed on `code`.
   */
  xrefLocations<G extends string>(prerequisites: LocationPrerequisites<G>): LocationsLinked {
    const categories = [prerequisites.projects.pass, prerequisites.groups.collection]
    const byLocation = createIndex(this.collection('team'), 'location')

    const summaries = [...byLocation.entries()]
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([code, team]) => {
        const summary: DataRecord = { code, team }
        for (const category of categories) {
          const items: DataRecord[] = []
          for (const member of team) {
            const linked = member[category]
            if (Array.isArray(linked))
              items.push(...linked.filter(isRecord))
          }
          items.sort(compareByField('name'))
          uniqueBy(items, 'name')
          if (items.length > 0)
            summary[category] = items
        }
        return summary
      })

    const existing = this.siteData.locations
    this.siteData.locations = existing === undefined || existing === null
      ? summaries
      : this.join('code', existing, summaries)

    log.debug(`Summarised ${summaries.length} locations`)
    return new LocationsLinked([...byLocation.keys()].sort(compareStrings))
  }

  /**
   * Attach each snippet to its author's `snippets` list and record the latest
   * batch in `snippets_latest` and the authors in `snippets_team_members`.
   *
   * Unlike the other passes this one fails on an unknown author: a snippet
   * must belong to a team member.
   */
  xrefSnippetsAndTeamMembers(): SnippetsLinked {
    const batches = this.siteData.snippets
    if (batches === undefined || batches === null)
      return new SnippetsLinked(undefined)
    if (!isRecord(batches))
      throw invalidCollectionError('snippets', 'a mapping of timestamp to a list of records')

    let latest: string | undefined
    // Batches arrive in chronological order, so the last one is the latest
    for (const [timestamp, snippets] of Object.entries(batches)) {
      for (const snippet of Array.isArray(snippets) ? snippets.filter(isRecord) : []) {
        const author = toKey(snippet.name)
        if (author === undefined)
          throw referenceNotFoundError('(no author)', `snippet in batch ${timestamp}`)
        const member = resolveReference(this.teamIndex, author, { strict: true })
        appendLink(member, 'snippets', snippet)
      }
      latest = timestamp
    }

    if (latest !== undefined) {
      this.siteData.snippets_latest = latest
      this.siteData.snippets_team_members = [...this.teamIndex.values()]
        .filter(member => Array.isArray(member.snippets))
    }
    log.debug(`Linked snippets, latest batch: ${latest ?? 'none'}`)
    return new SnippetsLinked(latest)
  }

  /**
   * Build `skills`: category to skill to the team members claiming it.
   *
   * @param categories - category names, possibly capitalized; members list
   *   their skills under the lowercased name
   */
  xrefSkillsAndTeamMembers(categories: readonly string[]): SkillsLinked {
    const buckets = new Map(
      categories.map((category): [string, Map<string, DataRecord[]>] => [category, new Map()]),
    )

    for (const member of this.teamIndex.values()) {
      for (const [category, bucket] of buckets) {
        const claimed = member[category.toLowerCase()]
        if (!Array.isArray(claimed))
          continue
        for (const value of claimed) {
          const skill = toKey(value)
          if (skill === undefined)
            continue
          const holders = bucket.get(skill)
          if (holders)
            holders.push(member)
          else
            bucket.set(skill, [member])
        }
      }
    }

    const skills: DataRecord = {}
    for (const [category, bucket] of buckets) {
      if (bucket.size > 0)
        skills[category] = Object.fromEntries(bucket)
    }

    const written = Object.keys(skills)
    if (written.length > 0)
      this.siteData.skills = skills
    log.debug(`Cross-referenced skills in ${written.length} of ${categories.length} categories`)
    return new SkillsLinked(written)
  }

  private collection(name: string): DataRecord[] {
    const value = this.siteData[name]
    if (value === undefined || value === null)
      return []
    if (!Array.isArray(value))
      throw invalidCollectionError(name, 'a list of records')
    return value.filter(isRecord)
  }
}
