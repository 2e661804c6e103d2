import type { SiteData } from '@rosterlink/utils/record'
import type { CrossReferenceConfigInput } from './config'
import type { CrossReferencerOptions, GroupsLinked } from './cross-referencer'
import { createLogger } from '@rosterlink/utils/logger'
import { parseCrossReferenceConfig } from './config'
import { CrossReferencer } from './cross-referencer'
import { invalidConfigError } from './errors'

const log = createLogger('Pipeline')

/**
 * Run every cross-reference pass over `siteData`, in dependency order:
 * projects, each group collection, snippets, skills, then locations.
 *
 * The snapshot is mutated in place; the returned CrossReferencer exposes it
 * along with the team index.
 */
export function crossReferenceSiteData(
  siteData: SiteData,
  config: CrossReferenceConfigInput = {},
  options: CrossReferencerOptions = {},
): CrossReferencer {
  const { groups, locationGroups, skillCategories } = parseCrossReferenceConfig(config)
  const xref = new CrossReferencer(siteData, options)

  const projects = xref.xrefProjectsAndTeamMembers()

  const linkedGroups = new Map<string, GroupsLinked<string>>()
  for (const [collection, memberFields] of Object.entries(groups))
    linkedGroups.set(collection, xref.xrefGroupsAndTeamMembers(collection, memberFields))

  const snippets = xref.xrefSnippetsAndTeamMembers()
  const skills = xref.xrefSkillsAndTeamMembers(skillCategories)

  const locationGroupsLinked = linkedGroups.get(locationGroups)
  if (!locationGroupsLinked)
    throw invalidConfigError(`locationGroups "${locationGroups}" was not linked`)
  const locations = xref.xrefLocations({ projects, groups: locationGroupsLinked })

  log.debug(
    `Cross-referenced ${xref.team.size} team members: `
    + `${linkedGroups.size} group collections, ${locations.codes.length} locations, `
    + `${skills.categories.length} skill categories, latest snippets ${snippets.latest ?? 'none'}`,
  )
  return xref
}
