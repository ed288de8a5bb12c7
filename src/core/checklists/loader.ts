/**
 * Checklist loading: YAML files validated against the checklist schema,
 * then frozen so items cannot change during a review.
 */
import * as path from 'node:path';
import { ChecklistError, PromptsmithError, ErrorCodes } from '../../utils/errors.js';
import { readFile, fileExists, globFiles, directoryExists, toPosixPath } from '../../utils/file-system.js';
import { parseYaml, formatZodError } from '../../utils/yaml.js';
import { ChecklistFileSchema } from './schema.js';
import { compileCheck } from './checks/registry.js';
import type { Checklist, ChecklistItem, ChecklistListing, ChecklistOrigin } from './types.js';

const CHECKLIST_EXTENSIONS = ['.yaml', '.yml'];

export interface ChecklistDirectory {
  dir: string;
  origin: ChecklistOrigin;
}

/**
 * Build a frozen checklist from an unvalidated definition.
 *
 * @throws ChecklistError K002 on schema errors, duplicate ids or bad regexes
 */
export function createChecklist(
  definition: unknown,
  name: string,
  origin: ChecklistOrigin = 'memory',
  filePath?: string
): Checklist {
  const result = ChecklistFileSchema.safeParse(definition);
  if (!result.success) {
    throw new ChecklistError(
      ErrorCodes.INVALID_CHECKLIST,
      `Invalid checklist '${name}': ${formatZodError(result.error)}`,
      { checklist: name, filePath }
    );
  }

  const seen = new Set<string>();
  const items: ChecklistItem[] = [];
  for (const raw of result.data.items) {
    if (seen.has(raw.id)) {
      throw new ChecklistError(
        ErrorCodes.INVALID_CHECKLIST,
        `Invalid checklist '${name}': duplicate item id '${raw.id}'`,
        { checklist: name, item: raw.id }
      );
    }
    seen.add(raw.id);

    if (raw.check) {
      try {
        compileCheck(raw.check);
      } catch (error) {
        if (error instanceof PromptsmithError) {
          throw new ChecklistError(
            error.code,
            `Invalid checklist '${name}', item '${raw.id}': ${error.message}`,
            { ...error.details, checklist: name, item: raw.id }
          );
        }
        throw error;
      }
    }

    items.push(Object.freeze({
      id: raw.id,
      description: raw.description,
      severity: raw.severity,
      why: raw.why,
      onFail: raw.on_fail,
      check: raw.check ? Object.freeze(raw.check) : undefined,
    }));
  }

  return Object.freeze({
    name: result.data.name ?? name,
    description: result.data.description,
    items: Object.freeze(items),
    origin,
    filePath,
  });
}

/**
 * Parse checklist YAML text.
 */
export function parseChecklist(content: string, name: string, origin: ChecklistOrigin = 'memory'): Checklist {
  return createChecklist(parseYaml(content), name, origin);
}

/**
 * Resolves checklist names against directories in order; the first hit wins.
 */
export class ChecklistLoader {
  constructor(private readonly directories: ChecklistDirectory[]) {}

  /**
   * @throws ChecklistError K001 when no directory has the checklist
   */
  async load(name: string): Promise<Checklist> {
    const base = stripExtension(name.trim().replace(/\\/g, '/'));
    if (base.length === 0 || base.split('/').includes('..') || path.isAbsolute(base)) {
      throw new ChecklistError(
        ErrorCodes.CHECKLIST_NOT_FOUND,
        `Checklist '${name}' not found`,
        { checklist: name }
      );
    }

    for (const { dir, origin } of this.directories) {
      for (const ext of CHECKLIST_EXTENSIONS) {
        const filePath = path.resolve(dir, `${base}${ext}`);
        if (await fileExists(filePath)) {
          return createChecklist(parseYaml(await readFile(filePath)), base, origin, filePath);
        }
      }
    }

    throw new ChecklistError(
      ErrorCodes.CHECKLIST_NOT_FOUND,
      `Checklist '${name}' not found`,
      { checklist: name, searched: this.directories.map(d => d.dir) }
    );
  }

  async list(): Promise<ChecklistListing[]> {
    const seen = new Map<string, ChecklistListing>();
    for (const { dir, origin } of this.directories) {
      if (!(await directoryExists(dir))) continue;
      const files = await globFiles(CHECKLIST_EXTENSIONS.map(ext => `**/*${ext}`), { cwd: dir, absolute: false });
      for (const file of files) {
        const name = stripExtension(toPosixPath(file));
        if (!seen.has(name)) {
          seen.set(name, { name, origin });
        }
      }
    }
    return Array.from(seen.values()).sort((a, b) => a.name.localeCompare(b.name));
  }
}

function stripExtension(name: string): string {
  for (const ext of CHECKLIST_EXTENSIONS) {
    if (name.endsWith(ext)) {
      return name.slice(0, -ext.length);
    }
  }
  return name;
}
