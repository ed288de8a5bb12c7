import type { ReviewReport } from '../../core/validation/types.js';
import type { IFormatter } from './types.js';

/**
 * One line per non-passing finding, then the status line. Suited to CI logs.
 */
export class CompactFormatter implements IFormatter {
  formatReport(report: ReviewReport): string {
    const prefix = report.artifact ?? report.checklist;
    const lines = report.findings
      .filter(f => f.result !== 'pass')
      .map(f => {
        const line = f.line !== undefined ? `:${f.line}` : '';
        const message = f.message ? ` ${f.message}` : '';
        return `${prefix}${line}: ${f.result} [${f.severity}] ${f.item}${message}`;
      });
    lines.push(`${report.status} ${report.summary.fail} failed, ${report.summary.warning} warnings, ${report.summary.error} errors`);
    return lines.join('\n');
  }
}
