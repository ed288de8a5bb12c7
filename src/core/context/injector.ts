/**
 * Context injector: binds runtime values to a resolved template's insertion points.
 *
 * Substitution is a single left-to-right pass. Inserted values are never
 * re-scanned, so a value containing `{{name}}` or `@file.md` stays literal.
 */
import { ContextError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ResolvedTemplate } from '../templates/types.js';
import { INSERTION_POINT_PATTERN } from './placeholders.js';
import type { Composition, CompositionWarning, ContextInjectorOptions, ContextValues } from './types.js';

/**
 * Normalize either context shape into an ordered Map.
 */
export function toContextMap(context: ContextValues): Map<string, string> {
  if (context instanceof Map) {
    return new Map(context);
  }
  return new Map(Object.entries(context));
}

export class ContextInjector {
  private readonly unknownKeys: NonNullable<ContextInjectorOptions['unknownKeys']>;

  constructor(options: ContextInjectorOptions = {}) {
    this.unknownKeys = options.unknownKeys ?? 'warn';
  }

  /**
   * Substitute every insertion point of the template.
   *
   * @throws ContextError C001 when any insertion point has no value
   * @throws ContextError C002 for unused keys when the policy is 'error'
   */
  inject(template: ResolvedTemplate, context: ContextValues): Composition {
    const values = toContextMap(context);

    const unbound = template.insertionPoints.filter(point => !values.has(point));
    if (unbound.length > 0) {
      throw new ContextError(
        ErrorCodes.UNBOUND_INSERTION_POINT,
        `Template '${template.name}' has unbound insertion point${unbound.length === 1 ? '' : 's'}: ${unbound.join(', ')}`,
        { template: template.name, unbound }
      );
    }

    const warnings = this.checkUnknownKeys(template, values);

    const text = template.text.replace(
      INSERTION_POINT_PATTERN,
      (match: string, escaped: string | undefined, name: string) => {
        if (escaped) {
          return match.slice(1);
        }
        // Every point was checked above; the fallback keeps replace() total
        return values.get(name) ?? match;
      }
    );

    return {
      template: template.name,
      text,
      bound: [...template.insertionPoints],
      warnings,
    };
  }

  private checkUnknownKeys(template: ResolvedTemplate, values: Map<string, string>): CompositionWarning[] {
    if (this.unknownKeys === 'ignore') {
      return [];
    }

    const unknown = Array.from(values.keys()).filter(key => !template.insertionPoints.includes(key));
    if (unknown.length === 0) {
      return [];
    }

    if (this.unknownKeys === 'error') {
      throw new ContextError(
        ErrorCodes.UNKNOWN_CONTEXT_KEY,
        `Template '${template.name}' does not use context key${unknown.length === 1 ? '' : 's'}: ${unknown.join(', ')}`,
        { template: template.name, unknown }
      );
    }

    return unknown.map(key => {
      const message = `Context key '${key}' is not used by template '${template.name}'`;
      logger.warn(message);
      return { code: ErrorCodes.UNKNOWN_CONTEXT_KEY, message, key };
    });
  }
}
