import chalk from 'chalk';
import { SEVERITIES } from '../../core/checklists/types.js';
import type { ReviewFinding, ReviewReport } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'green' | 'red' | 'yellow' | 'magenta' | 'blue' | 'dim';

const RESULT_ICONS: Record<ReviewFinding['result'], string> = {
  pass: '✓',
  fail: '✗',
  warning: '⚠',
  error: '!',
};

const RESULT_COLORS: Record<ReviewFinding['result'], Color> = {
  pass: 'green',
  fail: 'red',
  warning: 'yellow',
  error: 'magenta',
};

/**
 * Human-readable review report.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      showPassing: options.showPassing ?? false,
    };
  }

  formatReport(report: ReviewReport): string {
    const lines: string[] = [];
    const subject = report.artifact ? ` ${report.artifact}` : '';
    lines.push(`Review${subject} against ${this.colorize(report.checklist, 'blue')}`);
    lines.push('');

    for (const finding of report.findings) {
      if (finding.result === 'pass' && !this.options.showPassing) {
        continue;
      }
      lines.push(...this.formatFinding(finding));
    }

    const shown = report.findings.some(f => f.result !== 'pass' || this.options.showPassing);
    if (shown) {
      lines.push('');
    }

    const { pass, fail, warning, error } = report.summary;
    lines.push(
      `Findings: ${this.colorize(`${pass} passed`, 'green')}, ` +
      `${this.colorize(`${fail} failed`, fail > 0 ? 'red' : 'dim')}, ` +
      `${this.colorize(`${warning} warnings`, warning > 0 ? 'yellow' : 'dim')}, ` +
      `${this.colorize(`${error} errors`, error > 0 ? 'magenta' : 'dim')}`
    );
    const items = SEVERITIES.map(severity => `${report.counts[severity]} ${severity}`).join(', ');
    lines.push(this.colorize(`Items: ${items}`, 'dim'));

    lines.push(
      report.status === 'PASS'
        ? this.colorize('Status: PASS', 'green')
        : this.colorize(`Status: BLOCKED (${report.blocking.join(', ')})`, 'red')
    );

    return lines.join('\n');
  }

  private formatFinding(finding: ReviewFinding): string[] {
    const color = RESULT_COLORS[finding.result];
    const icon = this.colorize(RESULT_ICONS[finding.result], color);
    const severity = finding.severity.toUpperCase().padEnd(8);
    const lines = [`  ${icon} ${severity} ${finding.item}: ${finding.description}`];

    if (finding.message) {
      const location = finding.line !== undefined ? `Line ${finding.line}: ` : '';
      lines.push(`      ${this.colorize(`${location}${finding.message}`, color)}`);
    }
    if (finding.why) {
      lines.push(`      ${this.colorize(`Why: ${finding.why}`, 'dim')}`);
    }
    return lines;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    return chalk[color](text);
  }
}
