/**
 * Review result type definitions.
 */
import type { Severity } from '../checklists/types.js';

export type FindingResult = 'pass' | 'fail' | 'warning' | 'error';

export type ReviewStatus = 'PASS' | 'BLOCKED';

/**
 * Result of evaluating one checklist item against an artifact.
 */
export interface ReviewFinding {
  /** Item id */
  item: string;
  description: string;
  severity: Severity;
  result: FindingResult;
  message?: string;
  line?: number;
  why?: string;
  /** Error code when result is 'error' */
  code?: string;
}

/** Number of findings per item severity; sums to the checklist length. */
export type SeverityCounts = Record<Severity, number>;

/** Number of findings per result. */
export type ResultSummary = Record<FindingResult, number>;

export interface ReviewReport {
  status: ReviewStatus;
  checklist: string;
  artifact?: string;
  /** One finding per item, in checklist order */
  findings: ReviewFinding[];
  counts: SeverityCounts;
  summary: ResultSummary;
  /** Findings that caused BLOCKED */
  blocking: string[];
}

export interface ChecklistValidatorOptions {
  /** Severities whose failures block (default: critical, high) */
  blockingSeverities?: readonly Severity[];
  /**
   * Whether a predicate error on an item with a blocking severity blocks the review.
   * Defaults to true, so an item that could not be evaluated blocks like a failed one.
   * Set false to block on failures only.
   */
  errorsBlock?: boolean;
}
