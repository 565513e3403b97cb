/**
 * Capability Guardrail
 *
 * The orchestrator reaches the outside world only through two tools:
 * `matcher` and `email_drafter`. The set is closed:
 *
 * - `callTool(call)` takes a typed call from the `ToolCall` union
 * - `invokeTool(name, args)` is the runtime gate for untyped callers: it
 *   rejects unknown names, validates arity and argument types before
 *   dispatching, then delegates to `callTool`
 *
 * Anything a tool throws comes back wrapped in a `ToolExecutionError`.
 */

import { z } from 'zod';
import { openCsvDirectory, JsonFileArtifactStore, sharedResources } from '../data';
import type { DataSource, ModelArtifactStore, ResourceCache } from '../data';
import type { MatchFacts, MatchResult, MatchStatus } from '../matching';
import { matchPair } from '../services/scoring.service';
import { ToolArgumentError, ToolExecutionError, ToolNotPermittedError } from '../utils/errors';
import { draftDisputeEmail, type ContactDetails } from './emailDrafter';

// ============================================
// Types
// ============================================

export const ALLOWED_TOOLS = ['matcher', 'email_drafter'] as const;

export type ToolName = (typeof ALLOWED_TOOLS)[number];

export interface MatcherCall {
  tool: 'matcher';
  args: [invoiceId: string, poNumber: string, dataSource: string, modelArtifact: string];
}

export interface EmailDrafterCall {
  tool: 'email_drafter';
  args: [vendorName: string, invoiceId: string, poNumber: string, facts: MatchFacts, status: MatchStatus];
}

export type ToolCall = MatcherCall | EmailDrafterCall;

export type ToolOutcome =
  | { tool: 'matcher'; result: MatchResult }
  | { tool: 'email_drafter'; result: string };

/**
 * How tool arguments (plain strings) become resources.
 */
export interface ToolDependencies {
  resolveDataSource(ref: string): Promise<DataSource>;
  resolveModelArtifact(ref: string): ModelArtifactStore;
  resources: ResourceCache;
  /** Email signature; falls back to configuration */
  contact?: ContactDetails;
}

export const defaultToolDependencies = (): ToolDependencies => ({
  resolveDataSource: openCsvDirectory,
  resolveModelArtifact: (ref) => new JsonFileArtifactStore(ref),
  resources: sharedResources,
});

// ============================================
// Argument schemas
// ============================================

const nonEmpty = z.string().min(1, 'must be a non-empty string');

const factsSchema = z.object({
  amountDelta: z.number().finite(),
  vendorMatch: z.boolean(),
  poMissing: z.boolean(),
  hasGrn: z.boolean(),
  daysDelta: z.number().finite(),
});

const statusSchema = z.enum(['match', 'partial', 'mismatch']);

const matcherArgs = z.tuple([nonEmpty, nonEmpty, nonEmpty, nonEmpty]);
const emailDrafterArgs = z.tuple([z.string(), nonEmpty, nonEmpty, factsSchema, statusSchema]);

const ARG_NAMES: Record<ToolName, readonly string[]> = {
  matcher: ['invoiceId', 'poNumber', 'dataSource', 'modelArtifact'],
  email_drafter: ['vendorName', 'invoiceId', 'poNumber', 'facts', 'status'],
};

const isToolName = (name: string): name is ToolName => ALLOWED_TOOLS.some((tool) => tool === name);

function validateArgs<T>(tool: ToolName, schema: z.ZodType<T>, args: readonly unknown[]): T {
  const expected = ARG_NAMES[tool];
  if (args.length !== expected.length) {
    throw new ToolArgumentError(
      tool,
      `expected ${expected.length} arguments (${expected.join(', ')}), received ${args.length}`
    );
  }

  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const detail = parsed.error.errors
      .map((issue) => {
        const [position, ...rest] = issue.path;
        const name = typeof position === 'number' ? expected[position] : String(position);
        return `${[name, ...rest].join('.')}: ${issue.message}`;
      })
      .join('; ');
    throw new ToolArgumentError(tool, detail);
  }

  return parsed.data;
}

// ============================================
// Guardrail
// ============================================

export class Guardrail {
  constructor(private readonly deps: ToolDependencies = defaultToolDependencies()) {}

  callTool(call: MatcherCall): Promise<MatchResult>;
  callTool(call: EmailDrafterCall): Promise<string>;
  callTool(call: ToolCall): Promise<MatchResult | string>;
  async callTool(call: ToolCall): Promise<MatchResult | string> {
    try {
      switch (call.tool) {
        case 'matcher':
          return await this.runMatcher(...call.args);
        case 'email_drafter':
          return draftDisputeEmail(...call.args, this.deps.contact);
      }
    } catch (error) {
      throw new ToolExecutionError(call.tool, error);
    }
  }

  /**
   * @throws ToolNotPermittedError for a name outside the allowed set
   * @throws ToolArgumentError when arity or argument types are wrong
   * @throws ToolExecutionError when the tool itself fails
   */
  async invokeTool(name: string, args: readonly unknown[]): Promise<ToolOutcome> {
    if (!isToolName(name)) {
      throw new ToolNotPermittedError(name, ALLOWED_TOOLS);
    }

    if (name === 'matcher') {
      const call: MatcherCall = { tool: 'matcher', args: validateArgs(name, matcherArgs, args) };
      return { tool: 'matcher', result: await this.callTool(call) };
    }

    const call: EmailDrafterCall = { tool: 'email_drafter', args: validateArgs(name, emailDrafterArgs, args) };
    return { tool: 'email_drafter', result: await this.callTool(call) };
  }

  private async runMatcher(
    invoiceId: string,
    poNumber: string,
    dataSourceRef: string,
    modelArtifactRef: string
  ): Promise<MatchResult> {
    const dataSource = await this.deps.resolveDataSource(dataSourceRef);
    const modelArtifact = this.deps.resolveModelArtifact(modelArtifactRef);
    return matchPair(dataSource, modelArtifact, invoiceId, poNumber, this.deps.resources);
  }
}

export default Guardrail;
