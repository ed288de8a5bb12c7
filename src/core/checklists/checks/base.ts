import { ChecklistError, ErrorCodes } from '../../../utils/errors.js';
import type { Check } from '../schema.js';
import type { Artifact, ICheckEvaluator, PredicateOutcome } from '../types.js';

/**
 * Base class for check evaluators.
 * Provides regex compilation and outcome helpers.
 */
export abstract class BaseCheckEvaluator<C extends Check> implements ICheckEvaluator<C> {
  abstract readonly type: C['type'];

  abstract compile(check: C): void;

  abstract evaluate(check: C, artifact: Artifact): PredicateOutcome;

  /**
   * Build a RegExp, failing with INVALID_CHECKLIST on bad syntax.
   * Patterns are always compiled global so every match is visited.
   */
  protected buildRegex(pattern: string, flags: string): RegExp {
    try {
      return new RegExp(pattern, flags.includes('g') ? flags : `${flags}g`);
    } catch (error) {
      throw new ChecklistError(
        ErrorCodes.INVALID_CHECKLIST,
        `Invalid regex in ${this.type} check: ${pattern} (${error instanceof Error ? error.message : String(error)})`,
        { pattern, flags, type: this.type }
      );
    }
  }

  protected pass(message?: string): PredicateOutcome {
    return message ? { result: 'pass', message } : { result: 'pass' };
  }

  protected fail(message: string, line?: number): PredicateOutcome {
    return line === undefined ? { result: 'fail', message } : { result: 'fail', message, line };
  }

  /**
   * 1-based line number of a character offset.
   */
  protected getLineNumber(text: string, index: number): number {
    return text.substring(0, index).split('\n').length;
  }
}
