import type { ReviewReport } from '../../core/validation/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output for machine consumption.
 * Field names follow the report contract: status, findings[{item, severity, result, message}], counts.
 */
export class JsonFormatter implements IFormatter {
  formatReport(report: ReviewReport): string {
    return JSON.stringify(
      {
        status: report.status,
        checklist: report.checklist,
        artifact: report.artifact,
        findings: report.findings.map(f => ({
          item: f.item,
          description: f.description,
          severity: f.severity,
          result: f.result,
          message: f.message,
          line: f.line,
          why: f.why,
          code: f.code,
        })),
        counts: report.counts,
        summary: report.summary,
        blocking: report.blocking,
      },
      null,
      2
    );
  }
}
