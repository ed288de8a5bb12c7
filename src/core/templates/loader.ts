/**
 * Template loader: resolves a template name to its text with every
 * `@reference` expanded depth-first, in place.
 */
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { extractInsertionPoints } from '../context/placeholders.js';
import { parseTemplate, findReferences, normalizeTemplateName, resolveReferenceName } from './parser.js';
import type {
  ResolvedTemplate,
  TemplateLoaderOptions,
  TemplateOrigin,
  TemplateSource,
} from './types.js';

const DEFAULT_MAX_DEPTH = 16;

interface Expansion {
  text: string;
  origin: TemplateOrigin;
  description?: string;
  inputs: Record<string, string>;
  includes: string[];
}

export class TemplateLoader {
  private readonly maxDepth: number;
  private readonly extension: string;
  private readonly log = logger.child('templates');

  constructor(
    private readonly source: TemplateSource,
    options: TemplateLoaderOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.extension = options.extension ?? '.md';
  }

  /**
   * Load a template and expand its references.
   *
   * @throws TemplateError T001 when the template or a referenced template is missing
   * @throws TemplateError T002 when references form a cycle
   * @throws TemplateError T003 when nesting exceeds the configured depth
   */
  async load(name: string): Promise<ResolvedTemplate> {
    const normalized = normalizeTemplateName(name, this.extension);
    const expansion = await this.expand(normalized, []);

    const inTextPoints = extractInsertionPoints(expansion.text);
    const declaredOnly = Object.keys(expansion.inputs).filter(input => !inTextPoints.includes(input));

    return {
      name: normalized,
      origin: expansion.origin,
      text: expansion.text,
      description: expansion.description,
      insertionPoints: [...inTextPoints, ...declaredOnly],
      inputs: expansion.inputs,
      includes: expansion.includes,
    };
  }

  private async expand(name: string, stack: string[]): Promise<Expansion> {
    const cycleStart = stack.indexOf(name);
    if (cycleStart !== -1) {
      const cycle = [...stack.slice(cycleStart), name];
      throw new TemplateError(
        ErrorCodes.CYCLIC_REFERENCE,
        `Cyclic template reference: ${cycle.join(' → ')}`,
        { template: name, cycle }
      );
    }

    if (stack.length > this.maxDepth) {
      throw new TemplateError(
        ErrorCodes.INCLUDE_DEPTH_EXCEEDED,
        `Template references nest deeper than ${this.maxDepth} levels at '${name}'`,
        { template: name, chain: [...stack, name], maxDepth: this.maxDepth }
      );
    }

    const doc = await this.source.read(name);
    if (!doc) {
      const includedBy = stack[stack.length - 1];
      throw new TemplateError(
        ErrorCodes.TEMPLATE_NOT_FOUND,
        includedBy
          ? `Template '${name}' not found (referenced by '${includedBy}')`
          : `Template '${name}' not found`,
        { template: name, includedBy }
      );
    }

    this.log.debug(`Expanding ${name}`, { origin: doc.origin, depth: stack.length });

    const { metadata, body } = parseTemplate(doc.content, name);
    const references = findReferences(body, this.extension);
    const inputs: Record<string, string> = { ...metadata.inputs };
    const includes: string[] = [];
    const childStack = [...stack, name];

    let text = '';
    let cursor = 0;
    for (const reference of references) {
      const childName = resolveReferenceName(reference.target, name, this.extension);
      const child = await this.expand(childName, childStack);

      text += body.slice(cursor, reference.start) + child.text.replace(/\n+$/, '');
      cursor = reference.end;

      for (const [input, description] of Object.entries(child.inputs)) {
        if (!(input in inputs)) {
          inputs[input] = description;
        }
      }
      for (const included of [childName, ...child.includes]) {
        if (!includes.includes(included)) {
          includes.push(included);
        }
      }
    }
    text += body.slice(cursor);

    return {
      text,
      origin: doc.origin,
      description: metadata.description,
      inputs,
      includes,
    };
  }
}
