// Configuration
export {
  CrossReferenceConfigSchema,
  parseCrossReferenceConfig,
} from './config'

export type { CrossReferenceConfig, CrossReferenceConfigInput } from './config'

// Domain passes
export { CrossReferencer } from './cross-referencer'

export type {
  ArrayJoiner,
  CrossReferencerOptions,
  GroupsLinked,
  LocationPrerequisites,
  LocationsLinked,
  ProjectsLinked,
  SkillsLinked,
  SnippetsLinked,
} from './cross-referencer'

// Errors
export {
  fieldConflictError,
  invalidCollectionError,
  invalidConfigError,
  referenceNotFoundError,
  XRefError,
  XRefErrorCode,
} from './errors'

// Flattening
export { flattenProperty, flattenPropertyInPlace, propertyMap } from './flatten'

// Indexing
export { createIndex, createUniqueIndex } from './indexer'

export type { GroupIndex, Index } from './indexer'

export { crossReferenceSiteData } from './pipeline'

// Cross-reference engine
export { appendLink, createXrefs, resolveReference } from './xref'

export type { ResolveOptions } from './xref'
