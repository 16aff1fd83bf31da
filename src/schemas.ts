/**
 * Zod schemas for definition metadata and agents.yaml.
 */

import { z } from 'zod';
import { nameRuleViolations } from './naming';

export const MAX_DESCRIPTION_LENGTH = 1024;
export const MAX_COMPATIBILITY_LENGTH = 500;

/** Length in code points, so astral characters count once. */
export function characterLength(text: string): number {
  return [...text].length;
}

function boundedText(max: number) {
  return z
    .string()
    .refine((value) => characterLength(value) <= max, `String must contain at most ${max} character(s)`);
}

const skillName = z.string().superRefine((value, ctx) => {
  for (const message of nameRuleViolations(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
  }
});

const subAgentFields = {
  model: z.string().min(1).optional(),
  sub_agents: z.array(z.string().min(1)).optional(),
  tool_descriptions: z.record(z.string()).optional(),
  tool_name_prefix: z.string().optional(),
};

/**
 * SKILL.md frontmatter. Unknown keys are kept and end up in the unit's metadata.
 */
export const SkillFrontmatterSchema = z
  .object({
    name: skillName,
    description: z.string().min(1, 'Description cannot be empty').pipe(boundedText(MAX_DESCRIPTION_LENGTH)),
    license: z.string().optional(),
    compatibility: boundedText(MAX_COMPATIBILITY_LENGTH).optional(),
    metadata: z.record(z.unknown()).optional(),
    'allowed-tools': z.string().optional(),
    ...subAgentFields,
  })
  .passthrough();

export type SkillFrontmatter = z.infer<typeof SkillFrontmatterSchema>;

/**
 * `<name>.yaml` beside `<name>.md`. Name and description are optional here:
 * the name falls back to the file stem.
 */
export const SiblingMetadataSchema = z
  .object({
    name: z.string().min(1).optional(),
    description: boundedText(MAX_DESCRIPTION_LENGTH).optional(),
    ...subAgentFields,
  })
  .passthrough();

export type SiblingMetadata = z.infer<typeof SiblingMetadataSchema>;

export const TopLevelAgentEntrySchema = z.object({
  name: z.string().min(1),
  skill: z.string().min(1),
  model: z.string().min(1).optional(),
  sub_agents: z.array(z.string().min(1)).optional(),
  tool_descriptions: z.record(z.string()).optional(),
  variables: z.record(z.unknown()).optional(),
});

export const AgentsConfigSchema = z.object({
  agents: z.array(TopLevelAgentEntrySchema),
  default_model: z.string().min(1).optional(),
  skills_directory: z.string().min(1).default('skills'),
});

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}
