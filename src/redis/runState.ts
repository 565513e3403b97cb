/**
 * Run State Module
 *
 * Redis mirror of background run progress for polling clients.
 *
 * - The queue job stays the SOURCE OF TRUTH for background runs
 * - Redis failures never affect the run itself
 * - Entries expire after RUN_STATE_TTL_SECONDS
 *
 * KEY FORMAT: run:{runId}:state
 */

import { z } from 'zod';
import { env } from '../config';
import type { RunResult } from '../agent';
import { safeRedisOperation, safeRedisWrite } from './client';

// ============================================
// Data Structure
// ============================================

export type RunLifecycle = 'queued' | 'processing' | 'AWAITING_APPROVAL' | 'COMPLETED' | 'failed';

export interface CachedRunState {
  runId: string;
  status: RunLifecycle;
  result: RunResult | null;
  error: string | null;
  updatedAt: string;
}

const factsSchema = z.object({
  amountDelta: z.number(),
  vendorMatch: z.boolean(),
  poMissing: z.boolean(),
  hasGrn: z.boolean(),
  daysDelta: z.number(),
});

const taskSchema = z.object({
  invoiceId: z.string(),
  poNumber: z.string(),
  vendorName: z.string(),
  matchResult: z
    .object({
      status: z.enum(['match', 'partial', 'mismatch']),
      confidence: z.number(),
      facts: factsSchema,
      explanation: z.string(),
    })
    .nullable(),
  needsEmail: z.boolean(),
  emailReason: z.string().nullable(),
  emailDraft: z.string().nullable(),
  error: z.string().nullable(),
});

const runResultSchema = z.object({
  runId: z.string(),
  tasks: z.array(taskSchema),
  summary: z.object({
    total: z.number(),
    cleanMatches: z.number(),
    partialMatches: z.number(),
    mismatches: z.number(),
    emailsToSend: z.number(),
    failedTasks: z.number(),
    approvalRequired: z.boolean(),
  }),
  status: z.enum(['AWAITING_APPROVAL', 'COMPLETED']),
});

const cachedRunStateSchema = z.object({
  runId: z.string(),
  status: z.enum(['queued', 'processing', 'AWAITING_APPROVAL', 'COMPLETED', 'failed']),
  result: runResultSchema.nullable(),
  error: z.string().nullable(),
  updatedAt: z.string(),
});

/**
 * Validates a run state read back from storage.
 */
export function parseRunState(raw: unknown): CachedRunState | null {
  const parsed = cachedRunStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// ============================================
// Key Generation
// ============================================

export function getRunStateKey(runId: string): string {
  return `run:${runId}:state`;
}

// ============================================
// Cache Operations
// ============================================

export async function getCachedRunState(runId: string): Promise<CachedRunState | null> {
  return safeRedisOperation(
    async (client) => {
      const data = await client.get(getRunStateKey(runId));
      if (!data) return null;
      return parseRunState(JSON.parse(data));
    },
    null,
    `Run state GET (${runId})`
  );
}

export async function setCachedRunState(state: CachedRunState): Promise<void> {
  await safeRedisWrite(
    (client) => client.set(getRunStateKey(state.runId), JSON.stringify(state), 'EX', env.RUN_STATE_TTL_SECONDS),
    `Run state SET (${state.runId})`
  );
}

export function buildRunState(
  runId: string,
  status: RunLifecycle,
  result: RunResult | null = null,
  error: string | null = null
): CachedRunState {
  return { runId, status, result, error, updatedAt: new Date().toISOString() };
}

export const markRunQueued = (runId: string): Promise<void> => setCachedRunState(buildRunState(runId, 'queued'));

export const markRunProcessing = (runId: string): Promise<void> =>
  setCachedRunState(buildRunState(runId, 'processing'));

export const markRunFinished = (result: RunResult): Promise<void> =>
  setCachedRunState(buildRunState(result.runId, result.status, result));

export const markRunFailed = (runId: string, error: string): Promise<void> =>
  setCachedRunState(buildRunState(runId, 'failed', null, error));
