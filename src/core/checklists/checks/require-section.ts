import type { RequireSectionCheck } from '../schema.js';
import type { Artifact, PredicateOutcome } from '../types.js';
import { BaseCheckEvaluator } from './base.js';

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Requires a Markdown heading, matched case-insensitively.
 */
export class RequireSectionEvaluator extends BaseCheckEvaluator<RequireSectionCheck> {
  readonly type = 'require_section' as const;

  compile(): void {
    // Headings are matched literally
  }

  evaluate(check: RequireSectionCheck, artifact: Artifact): PredicateOutcome {
    const hashes = check.level !== undefined ? `#{${check.level}}` : '#{1,6}';
    const regex = new RegExp(`^${hashes}\\s+${escapeRegex(check.heading)}\\s*#*\\s*$`, 'im');
    if (regex.test(artifact.text)) {
      return this.pass();
    }
    const prefix = check.level !== undefined ? `${'#'.repeat(check.level)} ` : '';
    return this.fail(`Missing section: ${prefix}${check.heading}`);
  }
}
