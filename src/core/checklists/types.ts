/**
 * Checklist type definitions.
 */
import type { z } from 'zod';
import type { SeveritySchema } from '../config/schema.js';
import type { Check } from './schema.js';

export type Severity = z.infer<typeof SeveritySchema>;

/** Severities from most to least serious. */
export const SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

/** Outcome of one predicate: the review adds `error` for predicates that throw. */
export type PredicateResult = 'pass' | 'fail' | 'warning';

export interface ChecklistItem {
  readonly id: string;
  readonly description: string;
  readonly severity: Severity;
  readonly why?: string;
  readonly onFail: 'fail' | 'warning';
  readonly check?: Check;
}

export type ChecklistOrigin = 'memory' | 'project' | 'builtin';

/**
 * An ordered, frozen list of items.
 */
export interface Checklist {
  readonly name: string;
  readonly description?: string;
  readonly items: readonly ChecklistItem[];
  readonly origin: ChecklistOrigin;
  readonly filePath?: string;
}

/**
 * The text under review.
 */
export interface Artifact {
  readonly text: string;
  readonly lines: readonly string[];
  /** File name or other label, for messages */
  readonly name?: string;
}

export interface PredicateOutcome {
  result: PredicateResult;
  message?: string;
  /** 1-based line the outcome refers to */
  line?: number;
}

/**
 * Machine check for one item. Returning a boolean is shorthand for pass/fail.
 */
export type ChecklistPredicate = (artifact: Artifact, item: ChecklistItem) => PredicateOutcome | boolean;

/**
 * Caller-supplied predicates keyed by item id.
 */
export type PredicateMap = ReadonlyMap<string, ChecklistPredicate> | Readonly<Record<string, ChecklistPredicate>>;

/**
 * Evaluator for one declarative check type.
 */
export interface ICheckEvaluator<C extends Check = Check> {
  readonly type: C['type'];
  /** Reject malformed checks (bad regexes) at load time. */
  compile(check: C): void;
  evaluate(check: C, artifact: Artifact): PredicateOutcome;
}

export interface ChecklistListing {
  name: string;
  origin: ChecklistOrigin;
}
