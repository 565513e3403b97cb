export {
  run,
  initialState,
  plan,
  reconcile,
  draft,
  approve,
  summarize,
  emailDecision,
  EMAIL_REASONS,
  type RunStatus,
  type FinalRunStatus,
  type InvoiceRequest,
  type Task,
  type RunSummary,
  type RunState,
  type ApprovedRunState,
  type RunResult,
  type RunOptions,
} from './orchestrator';
export {
  Guardrail,
  ALLOWED_TOOLS,
  defaultToolDependencies,
  type ToolName,
  type ToolCall,
  type MatcherCall,
  type EmailDrafterCall,
  type ToolOutcome,
  type ToolDependencies,
} from './guardrail';
export {
  draftDisputeEmail,
  issueBullets,
  defaultContactDetails,
  FALLBACK_BULLET,
  type ContactDetails,
} from './emailDrafter';
