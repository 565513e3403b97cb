/**
 * Decision Policy
 *
 * Combines hard business rules with the classifier's mismatch probability.
 * Rules are evaluated in order; the first that applies decides:
 *
 * 1. Any material issue (PO missing, vendor mismatch, amount delta > 0.01,
 *    no GRN) → mismatch, confidence = p
 * 2. p ≥ 0.8 → mismatch, confidence = p
 * 3. p ≥ 0.6 → partial, confidence = p
 * 4. otherwise → match, confidence = 1 − p
 */

import { DEFAULT_FACTS, MATERIAL_AMOUNT_DELTA, PROBABILITY_THRESHOLDS, TIMING_CONCERN_DAYS } from './constants';
import type { MatchFacts, MatchResult, MatchStatus } from './types';

const clamp01 = (value: number): number => (Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0);

export function hasMaterialIssues(facts: MatchFacts): boolean {
  return facts.poMissing || !facts.vendorMatch || facts.amountDelta > MATERIAL_AMOUNT_DELTA || !facts.hasGrn;
}

/**
 * Human-readable issues, in a fixed order.
 */
export function listIssues(facts: MatchFacts): string[] {
  const issues: string[] = [];

  if (facts.poMissing) {
    issues.push('PO reference was not found');
  }
  if (!facts.vendorMatch) {
    issues.push('Vendor on invoice does not match vendor on PO');
  }
  if (facts.amountDelta > MATERIAL_AMOUNT_DELTA) {
    issues.push(`Amount discrepancy of ${facts.amountDelta.toFixed(2)}`);
  }
  if (!facts.hasGrn) {
    issues.push('No GRN found for this PO');
  }

  const days = Math.abs(facts.daysDelta);
  if (days > TIMING_CONCERN_DAYS) {
    issues.push(`Invoice timing concern: ${days} days from PO date`);
  }

  return issues;
}

/**
 * @example
 * buildExplanation({ ...facts, poMissing: true }, 'mismatch', 0.1)
 * // 'Mismatch detected: PO reference was not found. Confidence: 0.10'
 */
export function buildExplanation(facts: MatchFacts, status: MatchStatus, confidence: number): string {
  const issues = listIssues(facts);
  const joined = issues.join('; ');
  const conf = confidence.toFixed(2);

  switch (status) {
    case 'mismatch':
      return issues.length > 0
        ? `Mismatch detected: ${joined}. Confidence: ${conf}`
        : `Model detected potential mismatch (confidence: ${conf}). Manual review recommended.`;
    case 'partial':
      return `Uncertain match requiring review (confidence: ${conf}). ${
        issues.length > 0 ? joined : 'Model suggests possible issues.'
      }`;
    case 'match':
      return issues.length > 0
        ? `Match confirmed despite minor issues: ${joined}. Confidence: ${conf}`
        : `Clean match with no material differences. Confidence: ${conf}`;
  }
}

/**
 * Turns a mismatch probability and the pair's facts into a verdict.
 */
export function decide(probability: number, facts: MatchFacts): MatchResult {
  const p = clamp01(probability);
  let status: MatchStatus;
  let confidence: number;

  if (hasMaterialIssues(facts)) {
    status = 'mismatch';
    confidence = p;
  } else if (p >= PROBABILITY_THRESHOLDS.MISMATCH) {
    status = 'mismatch';
    confidence = p;
  } else if (p >= PROBABILITY_THRESHOLDS.PARTIAL) {
    status = 'partial';
    confidence = p;
  } else {
    status = 'match';
    confidence = 1 - p;
  }

  confidence = clamp01(confidence);

  return {
    status,
    confidence,
    facts: { ...facts },
    explanation: buildExplanation(facts, status, confidence),
  };
}

/**
 * Verdict for a pair the scorer has no feature row for.
 */
export function undeterminedResult(): MatchResult {
  return {
    status: 'partial',
    confidence: 0.5,
    facts: { ...DEFAULT_FACTS },
    explanation: 'No features available for this pair.',
  };
}

export default decide;
