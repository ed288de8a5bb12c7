/**
 * Parsing of template text: YAML front matter, `@path.md` references and
 * template name normalization.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { parseYaml, formatZodError } from '../../utils/yaml.js';
import { SecurityError, TemplateError, ErrorCodes } from '../../utils/errors.js';
import type { TemplateMetadata, TemplateReference } from './types.js';

const FRONT_MATTER_PATTERN = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * A reference is `@` at the start of a line or after whitespace, followed by
 * a relative path ending in the template extension. `user@example.com` never matches.
 */
function referencePattern(extension: string): RegExp {
  return new RegExp(
    `(^|[ \\t])@((?:\\.{1,2}\\/)*[\\w][\\w\\-./]*${escapeRegex(extension)})(?=$|[\\s)\\],;:!?]|\\.(?:\\s|$))`,
    'gm'
  );
}

const FENCE_PATTERN = /^[ \t]*(```|~~~)/;

/**
 * Path patterns a template name may never contain.
 */
const DANGEROUS_PATTERNS = [
  /^\//,              // Absolute paths
  /^[a-zA-Z]:[\\/]/,  // Windows absolute paths
  /%2e%2e/i,          // URL-encoded ..
  /%2f/i,             // URL-encoded /
  /\0/,
];

const FrontMatterSchema = z.object({
  description: z.string().optional(),
  inputs: z.record(z.string(), z.string()).default({}),
});

export interface ParsedTemplate {
  metadata: TemplateMetadata;
  body: string;
}

/**
 * Split a template into its front matter and body.
 * Templates without front matter get empty metadata.
 */
export function parseTemplate(content: string, name: string): ParsedTemplate {
  const match = content.match(FRONT_MATTER_PATTERN);
  if (!match) {
    return { metadata: { inputs: {} }, body: content };
  }

  const raw = parseYaml(match[1]) ?? {};
  const result = FrontMatterSchema.safeParse(raw);
  if (!result.success) {
    throw new TemplateError(
      ErrorCodes.PARSE_ERROR,
      `Invalid front matter in template '${name}': ${formatZodError(result.error)}`,
      { template: name }
    );
  }

  return {
    metadata: { description: result.data.description, inputs: result.data.inputs },
    body: content.slice(match[0].length),
  };
}

/**
 * Offsets covered by fenced code blocks; references inside them are literal.
 */
function findFencedRanges(text: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  let offset = 0;
  let openAt: number | null = null;
  let fence = '';

  for (const line of text.split('\n')) {
    const match = line.match(FENCE_PATTERN);
    if (match) {
      if (openAt === null) {
        openAt = offset;
        fence = match[1];
      } else if (match[1] === fence) {
        ranges.push([openAt, offset + line.length]);
        openAt = null;
      }
    }
    offset += line.length + 1;
  }

  if (openAt !== null) {
    ranges.push([openAt, text.length]);
  }
  return ranges;
}

/**
 * Find every `@reference` in a template body, in textual order.
 * Only targets ending in `extension` are references.
 */
export function findReferences(body: string, extension = '.md'): TemplateReference[] {
  const fenced = findFencedRanges(body);
  const references: TemplateReference[] = [];

  for (const match of body.matchAll(referencePattern(extension))) {
    const start = (match.index ?? 0) + match[1].length;
    if (fenced.some(([from, to]) => start >= from && start < to)) continue;
    references.push({
      target: match[2],
      start,
      end: start + 1 + match[2].length,
    });
  }

  return references;
}

/**
 * Normalize a template name to a posix path relative to the template root,
 * appending the default extension when the name has none.
 */
export function normalizeTemplateName(name: string, extension = '.md'): string {
  const trimmed = name.trim().replace(/\\/g, '/');
  for (const pattern of DANGEROUS_PATTERNS) {
    if (pattern.test(trimmed)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Template name '${name}' is not a relative path inside the template root`,
        { name }
      );
    }
  }

  const normalized = path.posix.normalize(trimmed);
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `Template name '${name}' resolves outside the template root`,
      { name }
    );
  }

  return path.posix.extname(normalized) ? normalized : `${normalized}${extension}`;
}

/**
 * Resolve a reference target against the template that contains it.
 * `./` and `../` targets are relative to the including template's directory;
 * anything else is relative to the template root.
 */
export function resolveReferenceName(target: string, includedBy: string, extension = '.md'): string {
  if (target.startsWith('./') || target.startsWith('../')) {
    const base = path.posix.dirname(includedBy);
    return normalizeTemplateName(path.posix.join(base, target), extension);
  }
  return normalizeTemplateName(target, extension);
}
