/**
 * Synthetic Corruption (offline evaluation only)
 *
 * Clean synthetic datasets link every invoice perfectly, which leaves the
 * classifier nothing to learn. These functions degrade links, features and
 * labelled examples in controlled proportions so training sees realistic
 * failure modes.
 *
 * Everything here draws from a caller-supplied `SeededRandom`; nothing in the
 * inference path imports this module.
 */

import { amountFeatures } from '../matching/features';
import type { FeatureRow, LabelledExample, LabelledMismatchRecord, LinkedPair } from '../matching';
import { logger } from '../utils';
import type { SeededRandom } from '../utils/random';

// ============================================
// Configuration
// ============================================

export interface CorruptionRates {
  /** Share of PO links broken outright */
  brokenLinks: number;
  /** Share of rows whose GRN is dropped */
  missingGrn: number;
  /** Share of rows whose PO is dropped after linking */
  additionalMissingPo: number;
  /** Share of rows flagged with a currency mismatch */
  currencyMismatch: number;
}

export const DEFAULT_CORRUPTION_RATES: Readonly<CorruptionRates> = {
  brokenLinks: 0.15,
  missingGrn: 0.15,
  additionalMissingPo: 0.05,
  currencyMismatch: 0.05,
};

export const LABEL_NOISE_LIMITS = {
  /** TAX_MISCODE invoices given a vendor mismatch */
  VENDOR_MISMATCHES: 8,
  /** Mismatch invoices given a currency mismatch */
  CURRENCY_MISMATCHES: 5,
  /** Mismatch invoices flagged as invoiced too late */
  DATE_ISSUES: 10,
  VENDOR_SIMILARITY_RANGE: [0.3, 0.7],
} as const;

export interface LabelNoiseStats {
  missingPo: number;
  priceVariances: number;
  vendorMismatches: number;
  currencyMismatches: number;
  dateIssues: number;
}

// ============================================
// Link & feature corruption
// ============================================

/**
 * Drops the PO from a share of linked pairs.
 */
export function corruptLinks(
  pairs: readonly LinkedPair[],
  rng: SeededRandom,
  rate: number = DEFAULT_CORRUPTION_RATES.brokenLinks
): LinkedPair[] {
  let broken = 0;
  const result = pairs.map((pair): LinkedPair => {
    if (rng.next() < rate && pair.po !== null) {
      broken++;
      return { ...pair, po: null };
    }
    return pair;
  });

  logger.info(`Synthetic corruption: broke ${broken}/${pairs.length} PO links`);
  return result;
}

/**
 * Drops GRNs, drops additional POs and flags currency mismatches, each
 * independently at its own rate.
 */
export function corruptFeatures(
  rows: readonly FeatureRow[],
  rng: SeededRandom,
  rates: Omit<CorruptionRates, 'brokenLinks'> = DEFAULT_CORRUPTION_RATES
): FeatureRow[] {
  const counts = { missingGrn: 0, missingPo: 0, currency: 0 };

  const result = rows.map((original): FeatureRow => {
    let row = original;

    if (rng.next() < rates.missingGrn) {
      counts.missingGrn++;
      row = { ...row, hasGrn: 0 };
    }

    if (rng.next() < rates.additionalMissingPo) {
      counts.missingPo++;
      row = { ...row, poMissing: 1, poNumber: null, poTotal: null };
    }

    if (rng.next() < rates.currencyMismatch) {
      counts.currency++;
      row = { ...row, currencyMatch: 0 };
    }

    return row;
  });

  logger.info(
    `Synthetic corruption: ${counts.missingGrn} missing GRN, ${counts.missingPo} extra missing PO, ${counts.currency} currency mismatches over ${rows.length} rows`
  );
  return result;
}

// ============================================
// Label noise
// ============================================

function pairKey(invoiceId: string, poNumber: string | null): string {
  return JSON.stringify([invoiceId, poNumber]);
}

const unique = (values: readonly string[]): string[] => [...new Set(values)];

/**
 * Makes labelled mismatches visible in their features:
 * - MISSING_PO → poMissing 1, hasGrn 0
 * - PRICE_VARIANCE → amount delta taken from the recorded difference, with
 *   percentage and tolerance flags recomputed
 * - up to 8 TAX_MISCODE invoices → vendor mismatch with similarity in [0.3, 0.7)
 * - up to 5 mismatch invoices → currency mismatch
 * - up to 10 mismatch invoices → invoiced too late
 */
export function injectLabelNoise(
  examples: readonly LabelledExample[],
  mismatches: readonly LabelledMismatchRecord[],
  rng: SeededRandom
): { examples: LabelledExample[]; stats: LabelNoiseStats } {
  const ofType = (type: string): LabelledMismatchRecord[] =>
    mismatches.filter((record) => record.mismatchType === type);

  const missingPo = new Set(ofType('MISSING_PO').map((record) => record.invoiceId));

  const priceDifferences = new Map<string, number>();
  for (const record of ofType('PRICE_VARIANCE')) {
    const key = pairKey(record.invoiceId, record.poNumber);
    if (record.difference !== null && !priceDifferences.has(key)) {
      priceDifferences.set(key, record.difference);
    }
  }

  const vendorMismatch = new Map<string, number>();
  const [low, high] = LABEL_NOISE_LIMITS.VENDOR_SIMILARITY_RANGE;
  for (const invoiceId of rng.sample(unique(ofType('TAX_MISCODE').map((r) => r.invoiceId)), LABEL_NOISE_LIMITS.VENDOR_MISMATCHES)) {
    vendorMismatch.set(invoiceId, rng.uniform(low, high));
  }

  const positives = unique(examples.filter((example) => example.isMismatch === 1).map((example) => example.invoiceId));
  const currencyMismatch = new Set(rng.sample(positives, LABEL_NOISE_LIMITS.CURRENCY_MISMATCHES));
  const dateIssues = new Set(rng.sample(positives, LABEL_NOISE_LIMITS.DATE_ISSUES));

  let priceVariances = 0;

  const result = examples.map((original): LabelledExample => {
    let example = original;

    if (missingPo.has(example.invoiceId)) {
      example = { ...example, poMissing: 1, hasGrn: 0 };
    }

    const difference = priceDifferences.get(pairKey(example.invoiceId, example.poNumber));
    if (difference !== undefined) {
      priceVariances++;
      example = { ...example, ...amountFeatures(difference, example.poTotal) };
    }

    const similarity = vendorMismatch.get(example.invoiceId);
    if (similarity !== undefined) {
      example = { ...example, vendorMatch: 0, vendorSimilarity: similarity };
    }

    if (currencyMismatch.has(example.invoiceId)) {
      example = { ...example, currencyMatch: 0 };
    }

    if (dateIssues.has(example.invoiceId)) {
      example = { ...example, invoiceTooLate: 1 };
    }

    return example;
  });

  const stats: LabelNoiseStats = {
    missingPo: missingPo.size,
    priceVariances,
    vendorMismatches: vendorMismatch.size,
    currencyMismatches: currencyMismatch.size,
    dateIssues: dateIssues.size,
  };

  logger.info(`Applied label noise: ${JSON.stringify(stats)}`);

  return { examples: result, stats };
}
