import { z } from 'zod';
import { SeveritySchema } from '../config/schema.js';

const RegexFlagsSchema = z.string().regex(/^[imsu]*$/, 'flags may only contain i, m, s, u');

export const ForbidPatternCheckSchema = z.object({
  type: z.literal('forbid_pattern'),
  pattern: z.string().min(1),
  flags: RegexFlagsSchema.default('m'),
});

export const RequirePatternCheckSchema = z.object({
  type: z.literal('require_pattern'),
  pattern: z.string().min(1),
  flags: RegexFlagsSchema.default('m'),
  min_count: z.number().int().min(1).default(1),
});

export const MaxLineLengthCheckSchema = z.object({
  type: z.literal('max_line_length'),
  max: z.number().int().min(1),
  /** Lines matching this pattern are exempt (e.g. URLs) */
  ignore_pattern: z.string().optional(),
});

export const MaxLinesCheckSchema = z.object({
  type: z.literal('max_lines'),
  max: z.number().int().min(1),
});

export const FirstLineCheckSchema = z.object({
  type: z.literal('first_line'),
  max_length: z.number().int().min(1).optional(),
  pattern: z.string().optional(),
  flags: RegexFlagsSchema.default(''),
});

export const RequireSectionCheckSchema = z.object({
  type: z.literal('require_section'),
  heading: z.string().min(1),
  /** Heading level; any level when omitted */
  level: z.number().int().min(1).max(6).optional(),
});

export const CheckSchema = z.discriminatedUnion('type', [
  ForbidPatternCheckSchema,
  RequirePatternCheckSchema,
  MaxLineLengthCheckSchema,
  MaxLinesCheckSchema,
  FirstLineCheckSchema,
  RequireSectionCheckSchema,
]);

export const ChecklistItemSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'item ids are lowercase kebab-case'),
  description: z.string().min(1),
  severity: SeveritySchema,
  /** Why the item matters, shown with failures */
  why: z.string().optional(),
  /** Result recorded when the check does not hold */
  on_fail: z.enum(['fail', 'warning']).default('fail'),
  check: CheckSchema.optional(),
});

export const ChecklistFileSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  items: z.array(ChecklistItemSchema).min(1),
});

export type Check = z.infer<typeof CheckSchema>;
export type CheckType = Check['type'];
export type ForbidPatternCheck = z.infer<typeof ForbidPatternCheckSchema>;
export type RequirePatternCheck = z.infer<typeof RequirePatternCheckSchema>;
export type MaxLineLengthCheck = z.infer<typeof MaxLineLengthCheckSchema>;
export type MaxLinesCheck = z.infer<typeof MaxLinesCheckSchema>;
export type FirstLineCheck = z.infer<typeof FirstLineCheckSchema>;
export type RequireSectionCheck = z.infer<typeof RequireSectionCheckSchema>;
export type ChecklistFile = z.infer<typeof ChecklistFileSchema>;
