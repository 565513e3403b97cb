import { score, matchPair } from '../../src/services/scoring.service';
import { CsvDirectoryDataSource, JsonFileArtifactStore, createResourceCache } from '../../src/data';
import { ConfigurationError } from '../../src/utils/errors';
import { FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH } from '../helpers';

describe('Scoring Service', () => {
  const source = new CsvDirectoryDataSource(FIXTURE_DATA_DIR);
  const store = new JsonFileArtifactStore(FIXTURE_MODEL_PATH);

  describe('score', () => {
    it('should score a fixture pair', async () => {
      const result = await score(source, store, 'INV0002', 'PO0002', createResourceCache());

      expect(result.found).toBe(true);
      if (result.found) {
        expect(result.probability).toBeCloseTo(1 / (1 + Math.exp(-(2 - Math.log(4)))), 10);
        expect(result.facts).toEqual({
          amountDelta: 200,
          vendorMatch: false,
          poMissing: false,
          hasGrn: false,
          daysDelta: 55,
        });
      }
    });

    it('should fail on a missing model', async () => {
      await expect(
        score(source, new JsonFileArtifactStore('/nonexistent/model.json'), 'INV0001', 'PO0001', createResourceCache())
      ).rejects.toThrow(ConfigurationError);
    });
  });

  describe('matchPair', () => {
    it('should decide a clean pair', async () => {
      const result = await matchPair(source, store, 'INV0001', 'PO0001', createResourceCache());

      expect(result.status).toBe('match');
      expect(result.explanation).toBe('Clean match with no material differences. Confidence: 0.80');
      expect(result.facts.daysDelta).toBe(4);
    });

    it('should decide an unlinked invoice as a mismatch', async () => {
      const result = await matchPair(source, store, 'INV0003', 'PO0003', createResourceCache());

      expect(result.status).toBe('mismatch');
      expect(result.explanation).toBe(
        'Mismatch detected: PO reference was not found; Vendor on invoice does not match vendor on PO; No GRN found for this PO. Confidence: 0.65'
      );
    });

    it('should treat an invoice whose PO currency differs as unlinked', async () => {
      const result = await matchPair(source, store, 'INV0004', 'PO0004', createResourceCache());

      expect(result.status).toBe('mismatch');
      expect(result.facts.poMissing).toBe(true);
    });

    it('should return an undetermined verdict for an unknown pair', async () => {
      const result = await matchPair(source, store, 'INV0009', 'PO0009', createResourceCache());

      expect(result).toEqual({
        status: 'partial',
        confidence: 0.5,
        facts: { amountDelta: 0, vendorMatch: true, poMissing: false, hasGrn: true, daysDelta: 0 },
        explanation: 'No features available for this pair.',
      });
    });
  });
});
