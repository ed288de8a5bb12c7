/**
 * Checklist validator: evaluates each item of a checklist against an artifact
 * and aggregates the findings into a review report.
 */
import { ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { predicateForCheck } from '../checklists/checks/registry.js';
import type {
  Artifact,
  Checklist,
  ChecklistItem,
  ChecklistPredicate,
  PredicateMap,
  PredicateOutcome,
  Severity,
} from '../checklists/types.js';
import type {
  ChecklistValidatorOptions,
  FindingResult,
  ResultSummary,
  ReviewFinding,
  ReviewReport,
  SeverityCounts,
} from './types.js';

const MANUAL_REVIEW_MESSAGE = 'Requires manual review';

/**
 * Wrap artifact text for predicates.
 */
export function createArtifact(text: string, name?: string): Artifact {
  const normalized = text.replace(/\r\n/g, '\n');
  const body = normalized.endsWith('\n') ? normalized.slice(0, -1) : normalized;
  return Object.freeze({
    text: normalized,
    lines: Object.freeze(body.length === 0 ? [] : body.split('\n')),
    name,
  });
}

function toPredicateMap(predicates?: PredicateMap): Map<string, ChecklistPredicate> {
  if (!predicates) return new Map();
  if (predicates instanceof Map) return new Map(predicates);
  return new Map(Object.entries(predicates));
}

function normalizeOutcome(outcome: PredicateOutcome | boolean): PredicateOutcome {
  if (typeof outcome === 'boolean') {
    return { result: outcome ? 'pass' : 'fail' };
  }
  return outcome;
}

export class ChecklistValidator {
  private readonly blockingSeverities: readonly Severity[];
  private readonly errorsBlock: boolean;
  private readonly log = logger.child('review');

  constructor(options: ChecklistValidatorOptions = {}) {
    this.blockingSeverities = options.blockingSeverities ?? ['critical', 'high'];
    this.errorsBlock = options.errorsBlock ?? true;
  }

  /**
   * Review an artifact.
   *
   * Caller-supplied predicates take precedence over an item's declarative
   * check; items with neither become `warning` findings for manual review.
   * A predicate that throws yields an `error` finding and the review continues.
   */
  validate(artifact: Artifact | string, checklist: Checklist, predicates?: PredicateMap): ReviewReport {
    const subject = typeof artifact === 'string' ? createArtifact(artifact) : artifact;
    const overrides = toPredicateMap(predicates);

    for (const id of overrides.keys()) {
      if (!checklist.items.some(item => item.id === id)) {
        this.log.warn(`Predicate supplied for unknown item '${id}' in checklist '${checklist.name}'`);
      }
    }

    const findings = checklist.items.map(item => this.evaluateItem(item, subject, overrides.get(item.id)));

    const counts: SeverityCounts = { critical: 0, high: 0, medium: 0, low: 0 };
    const summary: ResultSummary = { pass: 0, fail: 0, warning: 0, error: 0 };
    for (const finding of findings) {
      counts[finding.severity] += 1;
      summary[finding.result] += 1;
    }

    const blocking = findings
      .filter(finding => this.isBlocking(finding))
      .map(finding => finding.item);

    return {
      status: blocking.length > 0 ? 'BLOCKED' : 'PASS',
      checklist: checklist.name,
      artifact: subject.name,
      findings,
      counts,
      summary,
      blocking,
    };
  }

  private evaluateItem(
    item: ChecklistItem,
    artifact: Artifact,
    override?: ChecklistPredicate
  ): ReviewFinding {
    const base: ReviewFinding = {
      item: item.id,
      description: item.description,
      severity: item.severity,
      result: 'pass',
    };

    const predicate = override ?? (item.check ? predicateForCheck(item.check) : undefined);
    if (!predicate) {
      return { ...base, result: 'warning', message: MANUAL_REVIEW_MESSAGE };
    }

    let outcome: PredicateOutcome;
    try {
      outcome = normalizeOutcome(predicate(artifact, item));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.debug(`Predicate for '${item.id}' threw: ${message}`);
      return {
        ...base,
        result: 'error',
        code: ErrorCodes.CHECKLIST_ITEM_PREDICATE_ERROR,
        message: `Predicate failed: ${message}`,
      };
    }

    const result: FindingResult = outcome.result === 'fail' && item.onFail === 'warning'
      ? 'warning'
      : outcome.result;

    const finding: ReviewFinding = { ...base, result };
    if (outcome.message !== undefined) finding.message = outcome.message;
    if (outcome.line !== undefined) finding.line = outcome.line;
    if (result !== 'pass' && item.why !== undefined) finding.why = item.why;
    return finding;
  }

  private isBlocking(finding: ReviewFinding): boolean {
    if (!this.blockingSeverities.includes(finding.severity)) return false;
    return finding.result === 'fail' || (this.errorsBlock && finding.result === 'error');
  }
}
