/**
 * Feature Engine
 *
 * Derives the fixed numeric/boolean feature vector for a linked pair.
 * Total by construction: missing PO data, missing dates and division by zero
 * all collapse to 0 instead of throwing or producing NaN.
 *
 * Feature reference:
 * | Feature                | Definition                                         |
 * |------------------------|----------------------------------------------------|
 * | vendorSimilarity       | token Jaccard of invoice vs PO vendor names        |
 * | vendorMatch            | vendorSimilarity > 0.8                             |
 * | hasGrn                 | PO carries a GRN number                            |
 * | amountDelta(Abs/Pct)   | invoice − PO total; pct clipped to [−1, 1]         |
 * | amount(Pct)OverTol.    | |delta| > 100, |pct| > 5%                          |
 * | daysDelta              | invoice date − PO date                             |
 * | daysSinceGrn           | invoice date − GRN date                            |
 * | invoiceBeforePo        | daysDelta < −2                                     |
 * | invoiceTooLate         | daysDelta > 120                                    |
 * | invoiceBeforeGrn       | daysSinceGrn < −3                                  |
 * | poMissing              | no PO linked                                       |
 * | currencyMatch          | PO currency equals invoice currency                |
 */

import { AMOUNT_TOLERANCE, DATE_TOLERANCE, VENDOR_MATCH_THRESHOLD } from './constants';
import { daysBetween } from './dateParsing';
import { calculateVendorSimilarity } from './vendorSimilarity';
import type { FeatureRow, FeatureVector, Flag, LinkedPair } from './types';

/** NaN and ±Infinity become 0 */
export const finite = (value: number): number => (Number.isFinite(value) ? value : 0);

export const flag = (condition: boolean): Flag => (condition ? 1 : 0);

const clip = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/**
 * Amount delta and its derived tolerance flags.
 * Shared with label-noise injection, which rewrites the delta after the fact.
 */
export function amountFeatures(
  amountDelta: number,
  poTotal: number | null
): Pick<FeatureVector, 'amountDelta' | 'amountDeltaAbs' | 'amountDeltaPct' | 'amountOverTolerance' | 'amountPctOverTolerance'> {
  const delta = finite(amountDelta);
  const pct = poTotal === null || poTotal === 0 ? 0 : clip(finite(delta / poTotal), -1, 1);

  return {
    amountDelta: delta,
    amountDeltaAbs: Math.abs(delta),
    amountDeltaPct: pct,
    amountOverTolerance: flag(Math.abs(delta) > AMOUNT_TOLERANCE.ABSOLUTE),
    amountPctOverTolerance: flag(Math.abs(pct) > AMOUNT_TOLERANCE.PERCENT),
  };
}

/**
 * Computes the feature vector for one linked pair.
 */
export function engineerFeatures(pair: LinkedPair): FeatureVector {
  const { invoice, po } = pair;

  const vendorSimilarity = finite(calculateVendorSimilarity(invoice.vendorName, po?.vendorName));

  const poTotal = po?.poTotal ?? null;
  const rawDelta = poTotal === null ? 0 : invoice.invoiceTotal - poTotal;

  const daysDelta = finite(daysBetween(invoice.invoiceDate, po?.poDate ?? null) ?? 0);
  const daysSinceGrn = finite(daysBetween(invoice.invoiceDate, po?.grnDate ?? null) ?? 0);

  return {
    vendorSimilarity,
    vendorMatch: flag(vendorSimilarity > VENDOR_MATCH_THRESHOLD),
    hasGrn: flag(po !== null && po.grnNumber !== null),
    ...amountFeatures(rawDelta, poTotal),
    daysDelta,
    daysSinceGrn,
    invoiceBeforePo: flag(daysDelta < -DATE_TOLERANCE.BEFORE_PO_GRACE),
    invoiceTooLate: flag(daysDelta > DATE_TOLERANCE.TOO_LATE),
    invoiceBeforeGrn: flag(daysSinceGrn < -DATE_TOLERANCE.BEFORE_GRN_GRACE),
    poMissing: flag(po === null),
    currencyMatch: flag(po === null || po.currency === invoice.currency),
  };
}

/**
 * Computes feature rows (identity columns + features) for every pair, in order.
 */
export function engineerFeatureTable(pairs: readonly LinkedPair[]): FeatureRow[] {
  return pairs.map((pair) => ({
    invoiceId: pair.invoice.invoiceId,
    candidatePo: pair.candidatePo,
    poNumber: pair.po?.poNumber ?? null,
    vendorId: pair.invoice.vendorId,
    currency: pair.invoice.currency,
    invoiceVendorName: pair.invoice.vendorName,
    poVendorName: pair.po?.vendorName ?? null,
    invoiceTotal: pair.invoice.invoiceTotal,
    poTotal: pair.po?.poTotal ?? null,
    ...engineerFeatures(pair),
  }));
}

export default engineerFeatures;
