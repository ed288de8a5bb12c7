/**
 * Template type definitions.
 */

/** Where a template was read from. */
export type TemplateOrigin = 'memory' | 'project' | 'builtin';

/**
 * Raw template text as returned by a source.
 */
export interface TemplateDocument {
  /** Normalized template name (posix path relative to the source root) */
  name: string;
  content: string;
  origin: TemplateOrigin;
  /** Absolute file path, when file-backed */
  filePath?: string;
}

/**
 * A template name available from a source.
 */
export interface TemplateListing {
  name: string;
  origin: TemplateOrigin;
}

/**
 * Backing store for templates.
 * Sources are injected into the loader so several roots can coexist.
 */
export interface TemplateSource {
  read(name: string): Promise<TemplateDocument | null>;
  list(): Promise<TemplateListing[]>;
}

/**
 * Metadata declared in a template's YAML front matter.
 */
export interface TemplateMetadata {
  description?: string;
  /** Declared insertion points and what to supply for them */
  inputs: Record<string, string>;
}

/**
 * An `@path.md` inclusion found in template text.
 */
export interface TemplateReference {
  /** Path exactly as written after the `@` */
  target: string;
  /** Offset of the `@` */
  start: number;
  /** Offset just past the path */
  end: number;
}

/**
 * A template with every reference expanded.
 */
export interface ResolvedTemplate {
  name: string;
  origin: TemplateOrigin;
  /** Body text with references expanded and front matter removed */
  text: string;
  description?: string;
  /** Insertion points in order: those in the text first, then declared-only inputs */
  insertionPoints: string[];
  /** Descriptions for declared inputs, merged across includes */
  inputs: Record<string, string>;
  /** Every template included, depth-first, without duplicates */
  includes: string[];
}

export interface TemplateLoaderOptions {
  /** Maximum nesting of references (default: 16) */
  maxDepth?: number;
  /** Extension appended to names without one (default: .md) */
  extension?: string;
}
