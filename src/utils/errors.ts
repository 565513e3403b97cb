/**
 * Reconciliation error taxonomy
 *
 * Structural problems (configuration, guardrail violations) propagate to the
 * caller. Data absence is recovered locally and surfaced as `found: false`.
 * Capability failures are wrapped so the orchestrator can record them per task.
 */

import { AppError } from './AppError';

/**
 * A required dataset or model artifact is missing or unreadable.
 * Raised before any scoring happens.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 503);
  }
}

/**
 * No feature row exists for the requested (invoice, PO) pair.
 */
export class DataNotFoundError extends AppError {
  public readonly invoiceId: string;
  public readonly poNumber: string;

  constructor(invoiceId: string, poNumber: string) {
    super(`No feature row for invoice ${invoiceId} / PO ${poNumber}`, 404);
    this.invoiceId = invoiceId;
    this.poNumber = poNumber;
  }
}

export class ToolNotPermittedError extends AppError {
  public readonly tool: string;

  constructor(tool: string, allowed: readonly string[]) {
    super(`Tool '${tool}' not permitted. Allowed: ${allowed.join(', ')}`, 403);
    this.tool = tool;
  }
}

export class ToolArgumentError extends AppError {
  public readonly tool: string;

  constructor(tool: string, detail: string) {
    super(`Invalid arguments for tool '${tool}': ${detail}`, 400);
    this.tool = tool;
  }
}

/**
 * Wraps anything thrown inside a dispatched capability.
 */
export class ToolExecutionError extends AppError {
  public readonly tool: string;
  public readonly originalError: unknown;

  constructor(tool: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Tool '${tool}' execution failed: ${detail}`, 502);
    this.tool = tool;
    this.originalError = cause;
  }
}

/**
 * The labelled feature table cannot train a classifier
 * (a single class, or every candidate feature constant).
 */
export class InsufficientTrainingDataError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}
