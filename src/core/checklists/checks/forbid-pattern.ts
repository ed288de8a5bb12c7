import type { ForbidPatternCheck } from '../schema.js';
import type { Artifact, PredicateOutcome } from '../types.js';
import { BaseCheckEvaluator } from './base.js';

/**
 * Fails when the pattern occurs anywhere in the artifact.
 * Use for anti-patterns: hardcoded secrets, `eval`, bare `except:`.
 */
export class ForbidPatternEvaluator extends BaseCheckEvaluator<ForbidPatternCheck> {
  readonly type = 'forbid_pattern' as const;

  compile(check: ForbidPatternCheck): void {
    this.buildRegex(check.pattern, check.flags);
  }

  evaluate(check: ForbidPatternCheck, artifact: Artifact): PredicateOutcome {
    const regex = this.buildRegex(check.pattern, check.flags);
    const matches = [...artifact.text.matchAll(regex)];
    if (matches.length === 0) {
      return this.pass();
    }

    const lines = matches.map(match => this.getLineNumber(artifact.text, match.index ?? 0));
    const unique = [...new Set(lines)];
    const where = unique.length === 1 ? `line ${unique[0]}` : `lines ${unique.join(', ')}`;
    return this.fail(`Forbidden pattern found on ${where}: ${matches[0][0].trim()}`, unique[0]);
  }
}
