import type { DataRecord, FieldValue, SiteData } from '@rosterlink/utils'
import { crossReferenceSiteData, flattenPropertyInPlace, propertyMap, XRefError } from '@rosterlink/xref'
import { describe, expect, it } from 'vitest'

function records(value: FieldValue | undefined): DataRecord[] {
  return Array.isArray(value)
    ? value.filter((item): item is DataRecord => typeof item === 'object' && item !== null && !Array.isArray(item))
    : []
}

function createSiteData(): SiteData {
  return {
    team: [
      { name: 'mbland', location: 'DCA', languages: ['ruby'], specialties: ['testing'] },
      { name: 'afeld', location: 'NYC', technologies: ['node'] },
    ],
    projects: [{ name: 'hub', team: 'mbland, afeld' }],
    working_groups: [{ name: 'wg-docs', leads: ['mbland'] }],
    guilds: [{ name: 'ruby-guild', leads: ['afeld'], members: ['mbland', 'afeld'] }],
    locations: [{ code: 'DCA', label: 'Washington, DC' }],
    snippets: { 20150105: [{ name: 'afeld', last_week: 'paired on the hub' }] },
  }
}

describe('crossReferenceSiteData', () => {
  it('runs every pass with the default configuration', () => {
    const siteData = createSiteData()

    const xref = crossReferenceSiteData(siteData)

    expect(xref.siteData).toBe(siteData)
    const team = records(siteData.team)
    expect(propertyMap(team, 'name', 'projects', 'name')).toEqual({ mbland: ['hub'], afeld: ['hub'] })
    expect(propertyMap(team, 'name', 'working_groups', 'name')).toEqual({ mbland: ['wg-docs'] })
    expect(propertyMap(team, 'name', 'guilds', 'name')).toEqual({
      mbland: ['ruby-guild'],
      afeld: ['ruby-guild'],
    })
    expect(propertyMap(team, 'name', 'snippets', 'last_week')).toEqual({ afeld: ['paired on the hub'] })
    expect(siteData.snippets_latest).toBe('20150105')
    expect(records(siteData.snippets_team_members).map(m => m.name)).toEqual(['afeld'])
  })

  it('summarises locations with projects and the configured groups', () => {
    const siteData = createSiteData()

    crossReferenceSiteData(siteData)

    const locations = records(siteData.locations)
    expect(locations.map(l => l.code)).toEqual(['DCA', 'NYC'])
    expect(locations[0]?.label).toBe('Washington, DC')
    expect(propertyMap(locations, 'code', 'projects', 'name')).toEqual({ DCA: ['hub'], NYC: ['hub'] })
    expect(propertyMap(locations, 'code', 'working_groups', 'name')).toEqual({ DCA: ['wg-docs'] })
    expect(propertyMap(locations, 'code', 'guilds', 'name')).toEqual({})
  })

  it('summarises another group collection per location when configured', () => {
    const siteData = createSiteData()

    crossReferenceSiteData(siteData, { locationGroups: 'guilds' })

    const locations = records(siteData.locations)
    expect(propertyMap(locations, 'code', 'guilds', 'name')).toEqual({
      DCA: ['ruby-guild'],
      NYC: ['ruby-guild'],
    })
    expect(propertyMap(locations, 'code', 'working_groups', 'name')).toEqual({})
  })

  it('builds skills for the configured categories', () => {
    const siteData = createSiteData()

    crossReferenceSiteData(siteData, { skillCategories: ['Languages', 'Technologies'] })

    const skills = siteData.skills
    if (!skills || typeof skills !== 'object' || Array.isArray(skills))
      throw new Error('skills not written')
    expect(Object.keys(skills)).toEqual(['Languages', 'Technologies'])
  })

  it('produces a graph that serializes once flattened', () => {
    const siteData = createSiteData()
    crossReferenceSiteData(siteData)

    expect(() => JSON.stringify(siteData)).toThrow(TypeError)

    const team = records(siteData.team)
    for (const field of ['projects', 'working_groups', 'guilds'])
      flattenPropertyInPlace(team, field, 'name')
    flattenPropertyInPlace(team, 'snippets', 'last_week')

    expect(JSON.parse(JSON.stringify(siteData.team))).toEqual([
      {
        name: 'mbland',
        location: 'DCA',
        languages: ['ruby'],
        specialties: ['testing'],
        projects: ['hub'],
        working_groups: ['wg-docs'],
        guilds: ['ruby-guild'],
      },
      {
        name: 'afeld',
        location: 'NYC',
        technologies: ['node'],
        projects: ['hub'],
        guilds: ['ruby-guild'],
        snippets: ['paired on the hub'],
      },
    ])
  })

  it('rejects an invalid configuration before touching the data', () => {
    const siteData = createSiteData()

    expect(() => crossReferenceSiteData(siteData, { locationGroups: 'committees' }))
      .toThrow(XRefError)
    expect(records(siteData.projects)[0]?.team).toBe('mbland, afeld')
  })
})
