import type { RequirePatternCheck } from '../schema.js';
import type { Artifact, PredicateOutcome } from '../types.js';
import { BaseCheckEvaluator } from './base.js';

/**
 * Fails unless the pattern occurs at least `min_count` times.
 */
export class RequirePatternEvaluator extends BaseCheckEvaluator<RequirePatternCheck> {
  readonly type = 'require_pattern' as const;

  compile(check: RequirePatternCheck): void {
    this.buildRegex(check.pattern, check.flags);
  }

  evaluate(check: RequirePatternCheck, artifact: Artifact): PredicateOutcome {
    const regex = this.buildRegex(check.pattern, check.flags);
    const count = [...artifact.text.matchAll(regex)].length;

    if (count >= check.min_count) {
      return this.pass();
    }
    if (count === 0) {
      return this.fail(`Required pattern not found: ${check.pattern}`);
    }
    return this.fail(`Required pattern found ${count} time${count === 1 ? '' : 's'}, expected at least ${check.min_count}: ${check.pattern}`);
  }
}
