/**
 * Sources of context values: CLI assignments, preference files, stdin, git.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { readFile, fileExists } from '../../utils/file-system.js';
import { parseYaml, formatZodError } from '../../utils/yaml.js';
import { ContextError, ErrorCodes } from '../../utils/errors.js';
import { getStagedDiff } from '../../utils/git.js';

const KEY_PATTERN = /^[A-Za-z_][\w-]*$/;

/** Scalars in a context file are stringified; nested values are rejected. */
const ContextFileSchema = z.record(
  z.string().regex(KEY_PATTERN, 'context keys must be identifiers'),
  z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value))
);

/**
 * Parse `key=value` assignments. A value of `@path` reads the file at path,
 * relative to `cwd`; `@@text` is the literal `@text`.
 */
export async function parseContextAssignments(
  assignments: string[],
  cwd: string = process.cwd()
): Promise<Map<string, string>> {
  const values = new Map<string, string>();

  for (const assignment of assignments) {
    const eq = assignment.indexOf('=');
    const key = eq === -1 ? assignment : assignment.slice(0, eq);
    if (eq === -1 || !KEY_PATTERN.test(key)) {
      throw new ContextError(
        ErrorCodes.INVALID_CONTEXT,
        `Invalid context assignment '${assignment}' (expected key=value)`,
        { assignment }
      );
    }

    const raw = assignment.slice(eq + 1);
    if (raw.startsWith('@@')) {
      values.set(key, raw.slice(1));
    } else if (raw.startsWith('@')) {
      values.set(key, await readContextFile(path.resolve(cwd, raw.slice(1)), key));
    } else {
      values.set(key, raw);
    }
  }

  return values;
}

async function readContextFile(filePath: string, key: string): Promise<string> {
  if (!(await fileExists(filePath))) {
    throw new ContextError(
      ErrorCodes.INVALID_CONTEXT,
      `File for context key '${key}' not found: ${filePath}`,
      { key, filePath }
    );
  }
  return readFile(filePath);
}

/**
 * Load a YAML or JSON mapping of context values (e.g. a preferences override file).
 */
export async function loadContextFile(filePath: string): Promise<Map<string, string>> {
  if (!(await fileExists(filePath))) {
    throw new ContextError(
      ErrorCodes.INVALID_CONTEXT,
      `Context file not found: ${filePath}`,
      { filePath }
    );
  }

  // JSON is a subset of YAML
  const parsed = parseYaml(await readFile(filePath)) ?? {};
  const result = ContextFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ContextError(
      ErrorCodes.INVALID_CONTEXT,
      `Invalid context file ${filePath}: ${formatZodError(result.error)}`,
      { filePath }
    );
  }

  return new Map(Object.entries(result.data));
}

/**
 * Read all of a stream as UTF-8 text.
 */
export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Context with `diff` bound to the staged changes of the repository.
 */
export async function stagedDiffContext(projectRoot: string): Promise<Map<string, string>> {
  const diff = await getStagedDiff(projectRoot);
  if (!diff.trim()) {
    throw new ContextError(
      ErrorCodes.INVALID_CONTEXT,
      'No staged changes: stage files with `git add` before composing from the diff',
      { projectRoot }
    );
  }
  return new Map([['diff', diff]]);
}

/**
 * Merge context maps left to right; later maps override earlier keys.
 */
export function mergeContexts(...contexts: Array<Map<string, string>>): Map<string, string> {
  const merged = new Map<string, string>();
  for (const context of contexts) {
    for (const [key, value] of context) {
      merged.set(key, value);
    }
  }
  return merged;
}
