/**
 * Formatter type definitions.
 */
import type { ReviewReport } from '../../core/validation/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat };

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Show passing findings (default: false) */
  showPassing: boolean;
}

export interface IFormatter {
  formatReport(report: ReviewReport): string;
}
