import type { MaxLineLengthCheck, MaxLinesCheck } from '../schema.js';
import type { Artifact, PredicateOutcome } from '../types.js';
import { BaseCheckEvaluator } from './base.js';

export class MaxLineLengthEvaluator extends BaseCheckEvaluator<MaxLineLengthCheck> {
  readonly type = 'max_line_length' as const;

  compile(check: MaxLineLengthCheck): void {
    if (check.ignore_pattern !== undefined) {
      this.buildRegex(check.ignore_pattern, '');
    }
  }

  evaluate(check: MaxLineLengthCheck, artifact: Artifact): PredicateOutcome {
    const ignore = check.ignore_pattern !== undefined
      ? new RegExp(check.ignore_pattern)
      : null;

    const offending: number[] = [];
    artifact.lines.forEach((line, index) => {
      if (line.length > check.max && !(ignore && ignore.test(line))) {
        offending.push(index + 1);
      }
    });

    if (offending.length === 0) {
      return this.pass();
    }
    const shown = offending.slice(0, 5).join(', ');
    const more = offending.length > 5 ? ` (+${offending.length - 5} more)` : '';
    return this.fail(`Lines longer than ${check.max} characters: ${shown}${more}`, offending[0]);
  }
}

export class MaxLinesEvaluator extends BaseCheckEvaluator<MaxLinesCheck> {
  readonly type = 'max_lines' as const;

  compile(): void {
    // Nothing beyond the schema to check
  }

  evaluate(check: MaxLinesCheck, artifact: Artifact): PredicateOutcome {
    const count = artifact.lines.length;
    return count <= check.max
      ? this.pass()
      : this.fail(`Artifact has ${count} lines, limit is ${check.max}`);
  }
}
