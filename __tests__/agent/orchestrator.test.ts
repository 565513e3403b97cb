import {
  run,
  initialState,
  plan,
  emailDecision,
  summarize,
  approve,
  EMAIL_REASONS,
  type RunState,
  type Task,
} from '../../src/agent/orchestrator';
import type { ToolDependencies } from '../../src/agent/guardrail';
import { JsonFileArtifactStore, openCsvDirectory, createResourceCache } from '../../src/data';
import { decide, undeterminedResult } from '../../src/matching';
import { ConfigurationError } from '../../src/utils/errors';
import { cleanFacts, FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH } from '../helpers';

const buildDependencies = (overrides: Partial<ToolDependencies> = {}): ToolDependencies => ({
  resolveDataSource: openCsvDirectory,
  resolveModelArtifact: (ref) => new JsonFileArtifactStore(ref),
  resources: createResourceCache(),
  contact: { email: 'ap@example.com', phone: '555-0100', companyName: 'Example Corp' },
  ...overrides,
});

const invoices = [
  { invoiceId: 'INV0001', poNumber: 'PO0001', vendorName: 'Acme Supplies Ltd' },
  { invoiceId: 'INV0002', poNumber: 'PO0002', vendorName: 'Globex Inc' },
  { invoiceId: 'INV0009', poNumber: 'PO0009', vendorName: 'Hooli' },
];

const task = (overrides: Partial<Task> = {}): Task => ({
  invoiceId: 'INV0001',
  poNumber: 'PO0001',
  vendorName: 'Acme Supplies Ltd',
  matchResult: null,
  needsEmail: false,
  emailReason: null,
  emailDraft: null,
  error: null,
  ...overrides,
});

describe('Reconciliation Orchestrator', () => {
  describe('stages', () => {
    it('should start in planning with the default confidence floor', () => {
      const state = initialState('data', 'model.json', invoices, { runId: 'run-1' });

      expect(state).toEqual({
        runId: 'run-1',
        status: 'PLANNING',
        dataSource: 'data',
        modelArtifact: 'model.json',
        minConf: 0.75,
        invoices,
        tasks: [],
        summary: null,
      });
    });

    it('should plan one task per invoice without mutating the input state', () => {
      const state = initialState('data', 'model.json', invoices);
      const planned = plan(state);

      expect(planned.status).toBe('RECONCILING');
      expect(planned.tasks.map((t) => t.invoiceId)).toEqual(['INV0001', 'INV0002', 'INV0009']);
      expect(planned.tasks[0]).toEqual(task());
      expect(state.tasks).toEqual([]);
      expect(state.status).toBe('PLANNING');
    });

    it('should complete a batch that needs no approval', () => {
      const state: RunState = {
        ...initialState('data', 'model.json', []),
        tasks: [task({ matchResult: decide(0.1, cleanFacts()), emailReason: EMAIL_REASONS.CLEAN })],
      };

      const approved = approve(state);

      expect(approved.status).toBe('COMPLETED');
      expect(approved.summary?.approvalRequired).toBe(false);
    });
  });

  describe('emailDecision', () => {
    it('should email every mismatch', () => {
      expect(emailDecision(decide(0.1, cleanFacts({ poMissing: true })), 0.75)).toEqual({
        needsEmail: true,
        emailReason: 'Material discrepancies detected',
      });
    });

    it('should email partial matches', () => {
      expect(emailDecision(undeterminedResult(), 0.75)).toEqual({
        needsEmail: true,
        emailReason: 'Uncertain match requires clarification',
      });
    });

    it('should email matches below the confidence floor', () => {
      expect(emailDecision(decide(0.3, cleanFacts()), 0.75)).toEqual({
        needsEmail: true,
        emailReason: 'Low confidence match requires review',
      });
    });

    it('should skip confident clean matches', () => {
      expect(emailDecision(decide(0.2, cleanFacts()), 0.75)).toEqual({
        needsEmail: false,
        emailReason: 'Clean match - no action required',
      });
    });
  });

  describe('summarize', () => {
    it('should count statuses, emails and failures', () => {
      expect(
        summarize([
          task({ matchResult: decide(0.1, cleanFacts()) }),
          task({ matchResult: decide(0.7, cleanFacts()), needsEmail: true }),
          task({ error: "Tool 'matcher' execution failed: disk gone" }),
        ])
      ).toEqual({
        total: 3,
        cleanMatches: 1,
        partialMatches: 1,
        mismatches: 0,
        emailsToSend: 1,
        failedTasks: 1,
        approvalRequired: true,
      });
    });
  });

  describe('run', () => {
    it('should reconcile a batch and stop at the approval checkpoint', async () => {
      const result = await run(FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH, invoices, {
        dependencies: buildDependencies(),
      });

      expect(result.status).toBe('AWAITING_APPROVAL');
      expect(result.summary).toEqual({
        total: 3,
        cleanMatches: 1,
        partialMatches: 1,
        mismatches: 1,
        emailsToSend: 2,
        failedTasks: 0,
        approvalRequired: true,
      });

      const [clean, mismatch, missing] = result.tasks;

      expect(clean.matchResult?.status).toBe('match');
      expect(clean.needsEmail).toBe(false);
      expect(clean.emailDraft).toBeNull();

      expect(mismatch.matchResult?.explanation).toBe(
        'Mismatch detected: Vendor on invoice does not match vendor on PO; Amount discrepancy of 200.00; No GRN found for this PO; Invoice timing concern: 55 days from PO date. Confidence: 0.65'
      );
      expect(mismatch.emailReason).toBe(EMAIL_REASONS.MISMATCH);
      expect(mismatch.emailDraft?.split('\n')[0]).toBe(
        'Subject: URGENT: Invoice Discrepancy - Invoice INV0002 / PO PO0002'
      );

      expect(missing.matchResult).toEqual(undeterminedResult());
      expect(missing.emailReason).toBe(EMAIL_REASONS.PARTIAL);
      expect(missing.emailDraft?.split('\n')[0]).toBe('Subject: Review Required - Invoice INV0009 / PO PO0009');
    });

    it('should complete when every task is a confident clean match', async () => {
      const result = await run(FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH, [invoices[0]], {
        runId: 'run-clean',
        dependencies: buildDependencies(),
      });

      expect(result.runId).toBe('run-clean');
      expect(result.status).toBe('COMPLETED');
      expect(result.summary.approvalRequired).toBe(false);
    });

    it('should email a clean match below a raised confidence floor', async () => {
      const result = await run(FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH, [invoices[0]], {
        minConf: 0.9,
        dependencies: buildDependencies(),
      });

      expect(result.tasks[0].emailReason).toBe(EMAIL_REASONS.LOW_CONFIDENCE);
      expect(result.status).toBe('AWAITING_APPROVAL');
    });

    it('should report every stage in order', async () => {
      const stages: string[] = [];

      await run(FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH, [invoices[0]], {
        dependencies: buildDependencies(),
        onStage: (state) => {
          stages.push(state.status);
        },
      });

      expect(stages).toEqual(['PLANNING', 'RECONCILING', 'DRAFTING', 'DRAFTING', 'COMPLETED']);
    });

    it('should return the summary and status set at the approval checkpoint', async () => {
      const states: RunState[] = [];

      const result = await run(FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH, invoices, {
        dependencies: buildDependencies(),
        onStage: (state) => {
          states.push(state);
        },
      });

      const checkpoint = states[states.length - 1];
      expect(checkpoint.status).toBe('AWAITING_APPROVAL');
      expect(result.status).toBe(checkpoint.status);
      expect(result.summary).toBe(checkpoint.summary);
      expect(result.tasks).toBe(checkpoint.tasks);
    });

    it('should record a failing task and carry on', async () => {
      const resolveDataSource = jest
        .fn()
        .mockImplementationOnce(openCsvDirectory)
        .mockRejectedValue(new Error('disk gone'));

      const result = await run(FIXTURE_DATA_DIR, FIXTURE_MODEL_PATH, invoices.slice(0, 2), {
        dependencies: buildDependencies({ resolveDataSource }),
      });

      expect(result.tasks.map((t) => t.error)).toEqual([
        "Tool 'matcher' execution failed: disk gone",
        "Tool 'matcher' execution failed: disk gone",
      ]);
      expect(result.tasks.every((t) => t.matchResult === null && !t.needsEmail)).toBe(true);
      expect(result.summary.failedTasks).toBe(2);
      expect(result.status).toBe('AWAITING_APPROVAL');
    });

    it('should stop before scoring when the model is missing', async () => {
      await expect(
        run(FIXTURE_DATA_DIR, '/nonexistent/model.json', invoices, { dependencies: buildDependencies() })
      ).rejects.toThrow(ConfigurationError);
    });
  });
});
