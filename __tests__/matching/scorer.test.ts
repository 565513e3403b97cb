import { buildFeatureTable, findFeatureRow, factsFromRow, scorePair } from '../../src/matching/scorer';
import type { RecordSets } from '../../src/matching';
import { DataNotFoundError } from '../../src/utils/errors';
import { buildModel, invoiceLine, purchaseOrder } from '../helpers';

const records: RecordSets = {
  invoiceLines: [
    invoiceLine({ invoiceId: 'INV0001', lineTotal: 100, invoiceDate: '2024-03-05' }),
    invoiceLine({ invoiceId: 'INV0002', lineTotal: 250, invoiceDate: '2024-03-05' }),
    invoiceLine({ invoiceId: 'INV0003', lineTotal: 80, invoiceDate: '2024-03-05' }),
  ],
  purchaseOrders: [
    purchaseOrder({ poNumber: 'PO0001', poTotal: 100 }),
    purchaseOrder({ poNumber: 'PO0002', poTotal: 50 }),
  ],
  mismatches: [],
};

describe('Pair Scorer', () => {
  describe('buildFeatureTable', () => {
    it('should produce one row per aggregated invoice', () => {
      const rows = buildFeatureTable(records);

      expect(rows.map((row) => [row.invoiceId, row.poNumber, row.candidatePo])).toEqual([
        ['INV0001', 'PO0001', 'PO0001'],
        ['INV0002', 'PO0002', 'PO0002'],
        ['INV0003', null, 'PO0003'],
      ]);
    });
  });

  describe('findFeatureRow', () => {
    it('should find an unlinked invoice by its candidate PO', () => {
      const row = findFeatureRow(buildFeatureTable(records), 'INV0003', 'PO0003');

      expect(row.poMissing).toBe(1);
    });

    it('should throw for an unknown pair', () => {
      expect(() => findFeatureRow(buildFeatureTable(records), 'INV0001', 'PO0002')).toThrow(DataNotFoundError);
    });
  });

  describe('factsFromRow', () => {
    it('should report the absolute amount delta', () => {
      const row = findFeatureRow(buildFeatureTable(records), 'INV0002', 'PO0002');

      expect(factsFromRow(row)).toEqual({
        amountDelta: 200,
        vendorMatch: true,
        poMissing: false,
        hasGrn: true,
        daysDelta: 4,
      });
    });
  });

  describe('scorePair', () => {
    it('should score a clean pair', () => {
      const result = scorePair(records, buildModel(), 'INV0001', 'PO0001');

      expect(result.found).toBe(true);
      if (result.found) {
        expect(result.probability).toBeCloseTo(0.2, 10);
        expect(result.facts).toEqual({
          amountDelta: 0,
          vendorMatch: true,
          poMissing: false,
          hasGrn: true,
          daysDelta: 4,
        });
      }
    });

    it('should score an invoice whose PO is missing', () => {
      const result = scorePair(records, buildModel(), 'INV0003', 'PO0003');

      expect(result.found).toBe(true);
      if (result.found) {
        expect(result.probability).toBeCloseTo(1 / (1 + Math.exp(-(2 - Math.log(4)))), 10);
        expect(result.facts.poMissing).toBe(true);
        expect(result.facts.hasGrn).toBe(false);
      }
    });

    it('should report a missing pair instead of throwing', () => {
      expect(scorePair(records, buildModel(), 'INV0009', 'PO0009')).toEqual({
        found: false,
        message: 'No feature row for invoice INV0009 / PO PO0009',
      });
    });

    it('should return a probability within [0, 1]', () => {
      for (const [invoiceId, poNumber] of [
        ['INV0001', 'PO0001'],
        ['INV0002', 'PO0002'],
        ['INV0003', 'PO0003'],
      ]) {
        const result = scorePair(records, buildModel(), invoiceId, poNumber);
        if (!result.found) throw new Error(`expected a row for ${invoiceId}`);
        expect(result.probability).toBeGreaterThanOrEqual(0);
        expect(result.probability).toBeLessThanOrEqual(1);
      }
    });
  });
});
