/**
 * Check evaluator registry - maps declarative check types to evaluators.
 */
import type { Check, CheckType } from '../schema.js';
import type { Artifact, ChecklistPredicate, ICheckEvaluator, PredicateOutcome } from '../types.js';
import { ForbidPatternEvaluator } from './forbid-pattern.js';
import { RequirePatternEvaluator } from './require-pattern.js';
import { MaxLineLengthEvaluator, MaxLinesEvaluator } from './line-limits.js';
import { FirstLineEvaluator } from './first-line.js';
import { RequireSectionEvaluator } from './require-section.js';

type EvaluatorRegistry = { [K in CheckType]: ICheckEvaluator<Extract<Check, { type: K }>> };

const evaluators: EvaluatorRegistry = {
  forbid_pattern: new ForbidPatternEvaluator(),
  require_pattern: new RequirePatternEvaluator(),
  max_line_length: new MaxLineLengthEvaluator(),
  max_lines: new MaxLinesEvaluator(),
  first_line: new FirstLineEvaluator(),
  require_section: new RequireSectionEvaluator(),
};

/**
 * Validate a check's patterns without running it.
 */
export function compileCheck(check: Check): void {
  switch (check.type) {
    case 'forbid_pattern': return evaluators.forbid_pattern.compile(check);
    case 'require_pattern': return evaluators.require_pattern.compile(check);
    case 'max_line_length': return evaluators.max_line_length.compile(check);
    case 'max_lines': return evaluators.max_lines.compile(check);
    case 'first_line': return evaluators.first_line.compile(check);
    case 'require_section': return evaluators.require_section.compile(check);
  }
}

export function evaluateCheck(check: Check, artifact: Artifact): PredicateOutcome {
  switch (check.type) {
    case 'forbid_pattern': return evaluators.forbid_pattern.evaluate(check, artifact);
    case 'require_pattern': return evaluators.require_pattern.evaluate(check, artifact);
    case 'max_line_length': return evaluators.max_line_length.evaluate(check, artifact);
    case 'max_lines': return evaluators.max_lines.evaluate(check, artifact);
    case 'first_line': return evaluators.first_line.evaluate(check, artifact);
    case 'require_section': return evaluators.require_section.evaluate(check, artifact);
  }
}

/**
 * Turn a declarative check into a predicate.
 */
export function predicateForCheck(check: Check): ChecklistPredicate {
  return (artifact) => evaluateCheck(check, artifact);
}

export function getCheckTypes(): CheckType[] {
  return Object.keys(evaluators).filter(isCheckType);
}

export function isCheckType(type: string): type is CheckType {
  return Object.prototype.hasOwnProperty.call(evaluators, type);
}
