import { attachLabels, dedupeMismatches } from '../../src/matching/labels';
import { engineerFeatureTable } from '../../src/matching/features';
import { aggregateInvoiceLines } from '../../src/matching/normalize';
import { buildLinks } from '../../src/matching/linker';
import type { FeatureRow } from '../../src/matching';
import { invoiceLine, purchaseOrder } from '../helpers';

const featureRows = (): FeatureRow[] =>
  engineerFeatureTable(
    buildLinks(
      aggregateInvoiceLines([
        invoiceLine({ invoiceId: 'INV0001' }),
        invoiceLine({ invoiceId: 'INV0002' }),
        invoiceLine({ invoiceId: 'INV0003' }),
      ]),
      [purchaseOrder({ poNumber: 'PO0001' }), purchaseOrder({ poNumber: 'PO0002' })]
    )
  );

describe('Label Attacher', () => {
  describe('dedupeMismatches', () => {
    it('should keep the first record per pair', () => {
      const byPair = dedupeMismatches([
        { invoiceId: 'INV0001', poNumber: 'PO0001', mismatchType: 'PRICE_VARIANCE', difference: 10 },
        { invoiceId: 'INV0001', poNumber: 'PO0001', mismatchType: 'TAX_MISCODE', difference: 99 },
      ]);

      expect(byPair.size).toBe(1);
      expect([...byPair.values()][0].mismatchType).toBe('PRICE_VARIANCE');
    });
  });

  describe('attachLabels', () => {
    const mismatches = [
      { invoiceId: 'INV0002', poNumber: 'PO0002', mismatchType: 'PRICE_VARIANCE', difference: 12.5 },
      { invoiceId: 'INV0003', poNumber: null, mismatchType: 'MISSING_PO', difference: null },
    ];

    it('should label known mismatches by invoice and linked PO', () => {
      const examples = attachLabels(featureRows(), mismatches);

      expect(examples.map((example) => [example.invoiceId, example.isMismatch, example.mismatchType])).toEqual([
        ['INV0001', 0, null],
        ['INV0002', 1, 'PRICE_VARIANCE'],
        ['INV0003', 1, 'MISSING_PO'],
      ]);
      expect(examples[1].difference).toBe(12.5);
    });

    it('should drop unlabelled rows under the exclude policy', () => {
      const examples = attachLabels(featureRows(), mismatches, { unlabelled: 'exclude' });

      expect(examples.map((example) => example.invoiceId)).toEqual(['INV0002', 'INV0003']);
    });

    it('should not match a record whose PO differs from the linked PO', () => {
      const examples = attachLabels(featureRows(), [
        { invoiceId: 'INV0001', poNumber: 'PO9999', mismatchType: 'PRICE_VARIANCE', difference: 1 },
      ]);

      expect(examples.every((example) => example.isMismatch === 0)).toBe(true);
    });
  });
});
