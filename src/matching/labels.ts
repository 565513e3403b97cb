/**
 * Label Attacher (training only)
 *
 * Joins historical mismatch records onto feature rows by (invoiceId, poNumber).
 */

import type { FeatureRow, LabelledExample, LabelledMismatchRecord } from './types';

/**
 * What to do with a feature row that has no historical record:
 * - `assume-match`: keep it as a negative example
 * - `exclude`: drop it
 */
export type UnlabelledPolicy = 'assume-match' | 'exclude';

export interface AttachLabelsOptions {
  unlabelled?: UnlabelledPolicy;
}

function labelKey(invoiceId: string, poNumber: string | null): string {
  return JSON.stringify([invoiceId, poNumber]);
}

/**
 * Collapses repeated historical records; the first record for a pair wins.
 */
export function dedupeMismatches(
  mismatches: readonly LabelledMismatchRecord[]
): Map<string, LabelledMismatchRecord> {
  const byPair = new Map<string, LabelledMismatchRecord>();
  for (const record of mismatches) {
    const key = labelKey(record.invoiceId, record.poNumber);
    if (!byPair.has(key)) {
      byPair.set(key, record);
    }
  }
  return byPair;
}

/**
 * Attaches `isMismatch`, `mismatchType` and `difference` to every feature row.
 *
 * @example
 * attachLabels(rows, [{ invoiceId: 'INV001', poNumber: 'PO001', mismatchType: 'PRICE_VARIANCE', difference: 12.5 }])
 * // row INV001/PO001 → isMismatch 1; every other row → isMismatch 0
 */
export function attachLabels(
  rows: readonly FeatureRow[],
  mismatches: readonly LabelledMismatchRecord[],
  options: AttachLabelsOptions = {}
): LabelledExample[] {
  const policy = options.unlabelled ?? 'assume-match';
  const byPair = dedupeMismatches(mismatches);
  const examples: LabelledExample[] = [];

  for (const row of rows) {
    const record = byPair.get(labelKey(row.invoiceId, row.poNumber));

    if (record) {
      examples.push({
        ...row,
        isMismatch: 1,
        mismatchType: record.mismatchType,
        difference: record.difference,
      });
    } else if (policy === 'assume-match') {
      examples.push({ ...row, isMismatch: 0, mismatchType: null, difference: null });
    }
  }

  return examples;
}

export default attachLabels;
