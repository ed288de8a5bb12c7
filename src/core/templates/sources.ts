/**
 * Template sources: where template text comes from.
 *
 * - MemoryTemplateSource: an explicit name → content mapping
 * - FileTemplateSource: a directory of Markdown files, cached with reload-on-change
 * - LayeredTemplateSource: several sources, first match wins
 */
import * as path from 'node:path';
import { readFile, getModifiedTime, globFiles, toPosixPath, directoryExists } from '../../utils/file-system.js';
import { SecurityError, ErrorCodes } from '../../utils/errors.js';
import { normalizeTemplateName } from './parser.js';
import type { TemplateDocument, TemplateListing, TemplateOrigin, TemplateSource } from './types.js';

export class MemoryTemplateSource implements TemplateSource {
  private templates = new Map<string, string>();

  constructor(
    templates: Record<string, string> = {},
    private readonly extension = '.md'
  ) {
    for (const [name, content] of Object.entries(templates)) {
      this.templates.set(normalizeTemplateName(name, extension), content);
    }
  }

  async read(name: string): Promise<TemplateDocument | null> {
    const normalized = normalizeTemplateName(name, this.extension);
    const content = this.templates.get(normalized);
    if (content === undefined) {
      return null;
    }
    return { name: normalized, content, origin: 'memory' };
  }

  async list(): Promise<TemplateListing[]> {
    return Array.from(this.templates.keys())
      .sort()
      .map(name => ({ name, origin: 'memory' as const }));
  }
}

interface CachedTemplate {
  mtimeMs: number;
  content: string;
}

/**
 * Directory-backed templates.
 * File contents are cached and re-read only when the file's mtime changes.
 */
export class FileTemplateSource implements TemplateSource {
  private readonly root: string;
  private cache = new Map<string, CachedTemplate>();

  constructor(
    root: string,
    private readonly origin: TemplateOrigin = 'project',
    private readonly extension = '.md'
  ) {
    this.root = path.resolve(root);
  }

  async read(name: string): Promise<TemplateDocument | null> {
    const normalized = normalizeTemplateName(name, this.extension);
    const filePath = path.resolve(this.root, normalized);

    // Verify the resolved path is within the template root
    if (filePath !== this.root && !filePath.startsWith(this.root + path.sep)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Path traversal detected: ${name} resolves outside ${this.root}`,
        { name, filePath, root: this.root }
      );
    }

    const mtimeMs = await getModifiedTime(filePath);
    if (mtimeMs === null) {
      this.cache.delete(filePath);
      return null;
    }

    const cached = this.cache.get(filePath);
    if (cached && cached.mtimeMs === mtimeMs) {
      return { name: normalized, content: cached.content, origin: this.origin, filePath };
    }

    const content = await readFile(filePath);
    this.cache.set(filePath, { mtimeMs, content });
    return { name: normalized, content, origin: this.origin, filePath };
  }

  async list(): Promise<TemplateListing[]> {
    if (!(await directoryExists(this.root))) {
      return [];
    }
    const files = await globFiles(`**/*${this.extension}`, { cwd: this.root, absolute: false });
    return files.map(file => ({ name: toPosixPath(file), origin: this.origin }));
  }

  /**
   * Drop every cached file (the next read goes to disk).
   */
  clearCache(): void {
    this.cache.clear();
  }
}

/**
 * Consults each source in order; earlier sources shadow later ones by name.
 */
export class LayeredTemplateSource implements TemplateSource {
  constructor(private readonly sources: TemplateSource[]) {}

  async read(name: string): Promise<TemplateDocument | null> {
    for (const source of this.sources) {
      const doc = await source.read(name);
      if (doc) return doc;
    }
    return null;
  }

  async list(): Promise<TemplateListing[]> {
    const seen = new Map<string, TemplateListing>();
    for (const source of this.sources) {
      for (const listing of await source.list()) {
        if (!seen.has(listing.name)) {
          seen.set(listing.name, listing);
        }
      }
    }
    return Array.from(seen.values()).sort((a, b) => a.name.localeCompare(b.name));
  }
}
