import { ReconciliationService, type ReconciliationSettings } from '../../src/services/reconciliation.service';
import { defaultToolDependencies } from '../../src/agent';
import { createResourceCache } from '../../src/data';
import { AppError } from '../../src/utils/AppError';
import { FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH } from '../helpers';

const settings: ReconciliationSettings = {
  dataDir: FIXTURE_DATA_DIR,
  modelPath: FIXTURE_MODEL_PATH,
  minConf: 0.75,
  backgroundRuns: false,
};

const buildService = (overrides: Partial<ReconciliationSettings> = {}): ReconciliationService =>
  new ReconciliationService(
    { ...defaultToolDependencies(), resources: createResourceCache() },
    { ...settings, ...overrides }
  );

describe('ReconciliationService', () => {
  describe('scoreInvoice', () => {
    it('should return a verdict with the model probability', async () => {
      const verdict = await buildService().scoreInvoice('INV0001', 'PO0001');

      expect(verdict.invoiceId).toBe('INV0001');
      expect(verdict.poNumber).toBe('PO0001');
      expect(verdict.found).toBe(true);
      expect(verdict.probability).toBeCloseTo(0.2, 10);
      expect(verdict.status).toBe('match');
      expect(verdict.confidence).toBeCloseTo(0.8, 10);
    });

    it('should return an undetermined verdict for an unknown pair', async () => {
      const verdict = await buildService().scoreInvoice('INV0009', 'PO0009');

      expect(verdict).toMatchObject({
        invoiceId: 'INV0009',
        poNumber: 'PO0009',
        found: false,
        probability: null,
        status: 'partial',
        confidence: 0.5,
      });
    });

    it('should fail when the dataset directory is missing', async () => {
      await expect(buildService({ dataDir: '/nonexistent/data' }).scoreInvoice('INV0001', 'PO0001')).rejects.toThrow(
        'Dataset directory not found: /nonexistent/data'
      );
    });
  });

  describe('runBatch', () => {
    it('should use the configured confidence floor', async () => {
      const result = await buildService({ minConf: 0.9 }).runBatch([
        { invoiceId: 'INV0001', poNumber: 'PO0001', vendorName: 'Acme Supplies Ltd' },
      ]);

      expect(result.tasks[0].needsEmail).toBe(true);
      expect(result.status).toBe('AWAITING_APPROVAL');
    });

    it('should let the request override the confidence floor', async () => {
      const result = await buildService({ minConf: 0.9 }).runBatch(
        [{ invoiceId: 'INV0001', poNumber: 'PO0001', vendorName: 'Acme Supplies Ltd' }],
        0.5
      );

      expect(result.tasks[0].needsEmail).toBe(false);
      expect(result.status).toBe('COMPLETED');
    });
  });

  describe('background runs', () => {
    it('should refuse to queue without Redis', async () => {
      const service = buildService();

      await expect(service.enqueueRun([])).rejects.toThrow(AppError);
      await expect(service.enqueueRun([])).rejects.toThrow('Background runs require Redis (REDIS_ENABLED=true)');
    });

    it('should find no run state without Redis', async () => {
      await expect(buildService().getRun('5d0f8a2e-8d1c-4f4e-9a8b-3c2d1e0f9a7b')).resolves.toBeNull();
    });
  });
});
