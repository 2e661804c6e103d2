import { z } from 'zod/v4'
import { invalidConfigError } from './errors'

/**
 * Cross-reference configuration for a full run over a site data snapshot
 */
export const CrossReferenceConfigSchema = z
  .object({
    /** Group collection name to the member-list fields its records carry */
    groups: z
      .record(z.string().min(1), z.array(z.string().min(1)).min(1))
      .default(() => ({
        working_groups: ['leads', 'members'],
        guilds: ['leads', 'members'],
      })),
    /** Group collection summarised per location, alongside projects */
    locationGroups: z.string().min(1).default('working_groups'),
    /** Skill categories; team members list their skills under the lowercased name */
    skillCategories: z
      .array(z.string().min(1))
      .default(() => ['Languages', 'Technologies', 'Specialties']),
  })
  .refine(config => Object.hasOwn(config.groups, config.locationGroups), {
    message: 'must name one of the configured group collections',
    path: ['locationGroups'],
  })

export type CrossReferenceConfig = z.infer<typeof CrossReferenceConfigSchema>
export type CrossReferenceConfigInput = z.input<typeof CrossReferenceConfigSchema>

/**
 * Parse and default a configuration object. Throws XRefError INVALID_CONFIG
 * listing every issue found.
 */
export function parseCrossReferenceConfig(input: unknown = {}): CrossReferenceConfig {
  const result = CrossReferenceConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw invalidConfigError(issues)
  }
  return result.data
}
