/**
 * Reconciliation Orchestrator
 *
 * PLANNING → RECONCILING → DRAFTING → AWAITING_APPROVAL | COMPLETED
 *
 * Each stage takes the previous (readonly) state and returns a new one. A task
 * whose tool call fails keeps its error and the batch carries on. Nothing runs
 * after the approval checkpoint: drafted emails wait for a human.
 *
 * @example
 * const result = await run('./data', './reports/model.json', [
 *   { invoiceId: 'INV0012', poNumber: 'PO0012', vendorName: 'Acme Supplies Ltd' },
 * ]);
 * result.status; // 'AWAITING_APPROVAL' | 'COMPLETED'
 */

import { randomUUID } from 'crypto';
import { DEFAULT_MIN_CONFIDENCE } from '../matching/constants';
import type { MatchResult } from '../matching';
import { logger } from '../utils';
import { ToolExecutionError } from '../utils/errors';
import { Guardrail, defaultToolDependencies, type ToolDependencies } from './guardrail';

// ============================================
// Types
// ============================================

export type RunStatus = 'PLANNING' | 'RECONCILING' | 'DRAFTING' | 'AWAITING_APPROVAL' | 'COMPLETED';

export type FinalRunStatus = Extract<RunStatus, 'AWAITING_APPROVAL' | 'COMPLETED'>;

export interface InvoiceRequest {
  invoiceId: string;
  poNumber: string;
  vendorName: string;
}

export interface Task {
  readonly invoiceId: string;
  readonly poNumber: string;
  readonly vendorName: string;
  readonly matchResult: MatchResult | null;
  readonly needsEmail: boolean;
  readonly emailReason: string | null;
  readonly emailDraft: string | null;
  /** Set when a tool call for this task failed */
  readonly error: string | null;
}

export interface RunSummary {
  total: number;
  cleanMatches: number;
  partialMatches: number;
  mismatches: number;
  emailsToSend: number;
  failedTasks: number;
  approvalRequired: boolean;
}

export interface RunState {
  readonly runId: string;
  readonly status: RunStatus;
  readonly dataSource: string;
  readonly modelArtifact: string;
  readonly minConf: number;
  readonly invoices: readonly InvoiceRequest[];
  readonly tasks: readonly Task[];
  readonly summary: RunSummary | null;
}

/** State after the approval checkpoint */
export interface ApprovedRunState extends RunState {
  readonly status: FinalRunStatus;
  readonly summary: RunSummary;
}

export interface RunResult {
  runId: string;
  tasks: readonly Task[];
  summary: RunSummary;
  status: FinalRunStatus;
}

export interface RunOptions {
  minConf?: number;
  runId?: string;
  dependencies?: ToolDependencies;
  /** Called with every intermediate state, in order */
  onStage?: (state: RunState) => void | Promise<void>;
}

export const EMAIL_REASONS = {
  MISMATCH: 'Material discrepancies detected',
  PARTIAL: 'Uncertain match requires clarification',
  LOW_CONFIDENCE: 'Low confidence match requires review',
  CLEAN: 'Clean match - no action required',
} as const;

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Only capability failures are recorded per task; anything else is a bug
 * or a guardrail violation and propagates.
 */
function taskFailure(error: unknown, task: InvoiceRequest): string {
  if (!(error instanceof ToolExecutionError)) {
    throw error;
  }
  logger.warn(`Task ${task.invoiceId}/${task.poNumber} failed: ${describeError(error)}`);
  return error.message;
}

// ============================================
// Stages
// ============================================

export function initialState(
  dataSource: string,
  modelArtifact: string,
  invoices: readonly InvoiceRequest[],
  options: Pick<RunOptions, 'minConf' | 'runId'> = {}
): RunState {
  return {
    runId: options.runId ?? randomUUID(),
    status: 'PLANNING',
    dataSource,
    modelArtifact,
    minConf: options.minConf ?? DEFAULT_MIN_CONFIDENCE,
    invoices: [...invoices],
    tasks: [],
    summary: null,
  };
}

/**
 * One task per requested invoice.
 */
export function plan(state: RunState): RunState {
  const tasks = state.invoices.map(
    (invoice): Task => ({
      invoiceId: invoice.invoiceId,
      poNumber: invoice.poNumber,
      vendorName: invoice.vendorName,
      matchResult: null,
      needsEmail: false,
      emailReason: null,
      emailDraft: null,
      error: null,
    })
  );

  return { ...state, status: 'RECONCILING', tasks };
}

/**
 * Whether a verdict needs a vendor email, and why.
 */
export function emailDecision(result: MatchResult, minConf: number): { needsEmail: boolean; emailReason: string } {
  if (result.status === 'mismatch') {
    return { needsEmail: true, emailReason: EMAIL_REASONS.MISMATCH };
  }
  if (result.status === 'partial') {
    return { needsEmail: true, emailReason: EMAIL_REASONS.PARTIAL };
  }
  if (result.confidence < minConf) {
    return { needsEmail: true, emailReason: EMAIL_REASONS.LOW_CONFIDENCE };
  }
  return { needsEmail: false, emailReason: EMAIL_REASONS.CLEAN };
}

export async function reconcile(state: RunState, guardrail: Guardrail): Promise<RunState> {
  const tasks: Task[] = [];

  for (const task of state.tasks) {
    try {
      const matchResult = await guardrail.callTool({
        tool: 'matcher',
        args: [task.invoiceId, task.poNumber, state.dataSource, state.modelArtifact],
      });
      tasks.push({ ...task, matchResult, ...emailDecision(matchResult, state.minConf) });
    } catch (error) {
      tasks.push({ ...task, error: taskFailure(error, task) });
    }
  }

  return { ...state, status: 'DRAFTING', tasks };
}

export async function draft(state: RunState, guardrail: Guardrail): Promise<RunState> {
  const tasks: Task[] = [];

  for (const task of state.tasks) {
    if (!task.needsEmail || task.matchResult === null) {
      tasks.push({ ...task, emailDraft: null });
      continue;
    }

    try {
      const emailDraft = await guardrail.callTool({
        tool: 'email_drafter',
        args: [task.vendorName, task.invoiceId, task.poNumber, task.matchResult.facts, task.matchResult.status],
      });
      tasks.push({ ...task, emailDraft });
    } catch (error) {
      tasks.push({ ...task, error: taskFailure(error, task) });
    }
  }

  return { ...state, tasks };
}

export function summarize(tasks: readonly Task[]): RunSummary {
  const countStatus = (status: MatchResult['status']): number =>
    tasks.filter((task) => task.matchResult?.status === status).length;

  const mismatches = countStatus('mismatch');
  const emailsToSend = tasks.filter((task) => task.needsEmail).length;
  const failedTasks = tasks.filter((task) => task.error !== null).length;

  return {
    total: tasks.length,
    cleanMatches: countStatus('match'),
    partialMatches: countStatus('partial'),
    mismatches,
    emailsToSend,
    failedTasks,
    approvalRequired: emailsToSend > 0 || mismatches > 0 || failedTasks > 0,
  };
}

/**
 * Approval checkpoint. Terminal: no later stage exists.
 */
export function approve(state: RunState): ApprovedRunState {
  const summary = summarize(state.tasks);
  return {
    ...state,
    summary,
    status: summary.approvalRequired ? 'AWAITING_APPROVAL' : 'COMPLETED',
  };
}

// ============================================
// Run
// ============================================

/**
 * Runs a batch through every stage.
 *
 * The dataset and model are acquired before any task is scored, so a
 * `ConfigurationError` stops the run instead of failing every task.
 */
export async function run(
  dataSource: string,
  modelArtifact: string,
  invoices: readonly InvoiceRequest[],
  options: RunOptions = {}
): Promise<RunResult> {
  const dependencies = options.dependencies ?? defaultToolDependencies();
  const guardrail = new Guardrail(dependencies);
  const notify = async <S extends RunState>(state: S): Promise<S> => {
    if (options.onStage) {
      await options.onStage(state);
    }
    return state;
  };

  // Preflight
  const source = await dependencies.resolveDataSource(dataSource);
  await Promise.all([
    dependencies.resources.getRecords(source),
    dependencies.resources.getModel(dependencies.resolveModelArtifact(modelArtifact)),
  ]);

  let state = await notify(initialState(dataSource, modelArtifact, invoices, options));
  logger.info(`Run ${state.runId}: ${invoices.length} invoice(s) planned`);

  state = await notify(plan(state));
  state = await notify(await reconcile(state, guardrail));
  state = await notify(await draft(state, guardrail));
  const approved = await notify(approve(state));
  const { summary, status } = approved;

  logger.info(
    `Run ${approved.runId} ${status}: ${summary.cleanMatches} clean, ${summary.partialMatches} partial, ${summary.mismatches} mismatch, ${summary.emailsToSend} email(s), ${summary.failedTasks} failed`
  );

  return { runId: approved.runId, tasks: approved.tasks, summary, status };
}

export default run;
