import { z } from 'zod';

/**
 * Make an object field optional and apply its inner defaults when missing.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low']);

/** What to do with context keys the template does not use. */
export const UnknownKeyPolicySchema = z.enum(['ignore', 'warn', 'error']);

/** Output format for review reports. */
export const OutputFormatSchema = z.enum(['human', 'json', 'compact']);

export const TemplateSettingsSchema = z.object({
  /** Project template directory, relative to the project root */
  dir: z.string().default('.promptsmith/templates'),
  /** Extension appended to template names that lack one */
  extension: z.string().default('.md'),
  /** Maximum nesting of @references */
  max_depth: z.number().int().min(1).default(16),
  /** Fall back to the bundled template library */
  use_builtin: z.boolean().default(true),
});

export const ChecklistSettingsSchema = z.object({
  dir: z.string().default('.promptsmith/checklists'),
  use_builtin: z.boolean().default(true),
});

export const ContextSettingsSchema = z.object({
  unknown_keys: UnknownKeyPolicySchema.default('warn'),
});

export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  blocked: z.number().int().default(2),
});

export const ReviewSettingsSchema = z.object({
  /** Severities whose failures block the artifact */
  blocking_severities: z.array(SeveritySchema).default(['critical', 'high']),
  /** Treat a predicate that threw on a blocking item as a failure */
  errors_block: z.boolean().default(true),
  output_format: OutputFormatSchema.default('human'),
  exit_codes: withDefaults(ExitCodesSchema),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  templates: withDefaults(TemplateSettingsSchema),
  checklists: withDefaults(ChecklistSettingsSchema),
  context: withDefaults(ContextSettingsSchema),
  review: withDefaults(ReviewSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TemplateSettings = z.infer<typeof TemplateSettingsSchema>;
export type ChecklistSettings = z.infer<typeof ChecklistSettingsSchema>;
export type ReviewSettings = z.infer<typeof ReviewSettingsSchema>;
export type UnknownKeyPolicy = z.infer<typeof UnknownKeyPolicySchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
