/**
 * Pair Scorer
 *
 * Rebuilds the whole feature table from the raw records, picks the requested
 * (invoice, PO) row and applies the classifier. Every request recomputes the
 * pipeline from scratch; there is no per-pair index.
 */

import { DataNotFoundError } from '../utils/errors';
import { predictProba } from './classifier';
import { engineerFeatureTable } from './features';
import { buildLinks } from './linker';
import { aggregateInvoiceLines } from './normalize';
import type { FeatureRow, MatchFacts, RecordSets, ScoreResult, TrainedModel } from './types';

/**
 * Full pipeline: normalize → link → features.
 */
export function buildFeatureTable(records: RecordSets): FeatureRow[] {
  const invoices = aggregateInvoiceLines(records.invoiceLines);
  const pairs = buildLinks(invoices, records.purchaseOrders);
  return engineerFeatureTable(pairs);
}

/**
 * Finds the feature row for a pair. The PO number matches the linked PO, or
 * the candidate PO when the invoice could not be linked.
 *
 * @throws DataNotFoundError
 */
export function findFeatureRow(rows: readonly FeatureRow[], invoiceId: string, poNumber: string): FeatureRow {
  const row = rows.find(
    (candidate) => candidate.invoiceId === invoiceId && (candidate.poNumber ?? candidate.candidatePo) === poNumber
  );
  if (!row) {
    throw new DataNotFoundError(invoiceId, poNumber);
  }
  return row;
}

export function factsFromRow(row: FeatureRow): MatchFacts {
  return {
    amountDelta: row.amountDeltaAbs,
    vendorMatch: row.vendorMatch === 1,
    poMissing: row.poMissing === 1,
    hasGrn: row.hasGrn === 1,
    daysDelta: row.daysDelta,
  };
}

/**
 * Scores one (invoice, PO) pair against an already-loaded dataset and model.
 *
 * @example
 * scorePair(records, model, 'INV0012', 'PO0012')
 * // { found: true, probability: 0.07, facts: { amountDelta: 0, vendorMatch: true, ... } }
 */
export function scorePair(
  records: RecordSets,
  model: TrainedModel,
  invoiceId: string,
  poNumber: string
): ScoreResult {
  let row: FeatureRow;
  try {
    row = findFeatureRow(buildFeatureTable(records), invoiceId, poNumber);
  } catch (error) {
    if (error instanceof DataNotFoundError) {
      return { found: false, message: error.message };
    }
    throw error;
  }

  return {
    found: true,
    probability: predictProba(model, row),
    facts: factsFromRow(row),
  };
}

export default scorePair;
