/**
 * Failure taxonomy. Every error that reaches a workflow's terminal event is
 * reported by its kind and message only.
 */

import type { FailureKind } from '@boardscout/schemas';

export class ScraperError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/** Hop budget and candidate list both exhausted without a STAY verdict. */
export class NavigationExhaustedError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NavigationExhausted', message, options);
  }
}

export class SynthesisRejectedError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SynthesisRejected', message, options);
  }
}

/** A flat configuration that cannot be turned into a ScrapingConfiguration. */
export class InvalidConfigurationError extends SynthesisRejectedError {
  constructor(message: string) {
    super(`Invalid scraping configuration: ${message}`);
    this.name = 'InvalidConfigurationError';
  }
}

export class ExtractionFailureError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ExtractionFailure', message, options);
  }
}

export class RuntimeFailureError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RuntimeFailure', message, options);
  }
}

export class PageTimeoutError extends RuntimeFailureError {
  readonly url: string;

  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Page timed out after ${timeoutMs}ms: ${url}`, options);
    this.name = 'PageTimeoutError';
    this.url = url;
  }
}

export class PersistenceConflictError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PersistenceConflict', message, options);
  }
}

export class OracleUnavailableError extends ScraperError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('OracleUnavailable', message, options);
    this.status = options?.status;
  }
}

export class WorkflowTimeoutError extends ScraperError {
  constructor(timeoutMs: number) {
    super('WorkflowTimeout', `Workflow exceeded its ${Math.round(timeoutMs / 1000)}s time limit`);
  }
}

/**
 * An agent was handed input its schema rejects. This is the caller's bug, not
 * a failure of the step, so it is thrown rather than reported as a result.
 */
export class AgentInputError extends Error {
  readonly agent: string;
  readonly issues: string[];

  constructor(agent: string, issues: string[]) {
    super(`${agent} received invalid input: ${issues.join('; ')}`);
    this.name = 'AgentInputError';
    this.agent = agent;
    this.issues = issues;
  }
}

export function isScraperError(err: unknown): err is ScraperError {
  return err instanceof ScraperError;
}

/** Errors that escape contained retry loops instead of counting as an attempt. */
export function isEscalatingError(err: unknown): boolean {
  return err instanceof OracleUnavailableError || err instanceof WorkflowTimeoutError;
}

export function failureKindOf(err: unknown): FailureKind {
  return isScraperError(err) ? err.kind : 'RuntimeFailure';
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
