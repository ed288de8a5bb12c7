import type { FirstLineCheck } from '../schema.js';
import type { Artifact, PredicateOutcome } from '../types.js';
import { BaseCheckEvaluator } from './base.js';

/**
 * Rules for the first non-blank line, e.g. a commit subject:
 * length limit and/or a required shape.
 */
export class FirstLineEvaluator extends BaseCheckEvaluator<FirstLineCheck> {
  readonly type = 'first_line' as const;

  compile(check: FirstLineCheck): void {
    if (check.pattern !== undefined) {
      this.buildRegex(check.pattern, check.flags);
    }
  }

  evaluate(check: FirstLineCheck, artifact: Artifact): PredicateOutcome {
    const index = artifact.lines.findIndex(line => line.trim().length > 0);
    if (index === -1) {
      return this.fail('Artifact is empty');
    }

    const line = artifact.lines[index];
    const lineNumber = index + 1;

    if (check.max_length !== undefined && line.length > check.max_length) {
      return this.fail(`First line is ${line.length} characters, limit is ${check.max_length}`, lineNumber);
    }

    if (check.pattern !== undefined) {
      const regex = new RegExp(check.pattern, check.flags);
      if (!regex.test(line)) {
        return this.fail(`First line does not match ${check.pattern}: ${line}`, lineNumber);
      }
    }

    return this.pass();
  }
}
