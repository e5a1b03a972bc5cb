/**
 * Error taxonomy for research runs.
 *
 * Callers get either a digest or one of these. Timeouts and cancellations are
 * separate classes so they can be told apart from hard stage failures.
 */

export type ResearchErrorCode =
  | "stage_failed"
  | "stage_contract"
  | "unknown_state_field"
  | "collaborator"
  | "malformed_output"
  | "timeout"
  | "aborted"
  | "invalid_request"
  | "configuration"
  | "incomplete_run";

export class ResearchError extends Error {
  readonly code: ResearchErrorCode;

  constructor(code: ResearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResearchError";
    this.code = code;
  }
}

/**
 * A stage threw. Carries the originating stage name.
 */
export class StageError extends ResearchError {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super("stage_failed", `Stage "${stage}" failed: ${describeError(cause)}`, { cause });
    this.name = "StageError";
    this.stage = stage;
  }
}

/**
 * A stage returned a field it does not own.
 */
export class StageContractError extends ResearchError {
  constructor(stage: string, field: string) {
    super("stage_contract", `Stage "${stage}" is not allowed to write "${field}"`);
    this.name = "StageContractError";
  }
}

export class UnknownStateFieldError extends ResearchError {
  readonly field: string;

  constructor(field: string) {
    super("unknown_state_field", `Unknown research state field "${field}"`);
    this.name = "UnknownStateFieldError";
    this.field = field;
  }
}

export class CollaboratorError extends ResearchError {
  readonly service: string;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(
    service: string,
    message: string,
    details: { status?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super("collaborator", `${service}: ${message}`, { cause: details.cause });
    this.name = "CollaboratorError";
    this.service = service;
    this.status = details.status;
    this.retryable = details.retryable ?? false;
  }
}

export class MalformedOutputError extends ResearchError {
  readonly issues: string[];

  constructor(schemaName: string, issues: string[]) {
    super("malformed_output", `Model output does not match ${schemaName}: ${issues.join("; ")}`);
    this.name = "MalformedOutputError";
    this.issues = issues;
  }
}

export class ResearchTimeoutError extends ResearchError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super("timeout", `Research run timed out after ${timeoutMs}ms`, options);
    this.name = "ResearchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ResearchAbortedError extends ResearchError {
  constructor(options?: { cause?: unknown }) {
    super("aborted", "Research run was cancelled by the caller", options);
    this.name = "ResearchAbortedError";
  }
}

export class InvalidRequestError extends ResearchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_request", `Invalid research request: ${issues.join("; ")}`);
    this.name = "InvalidRequestError";
    this.issues = issues;
  }
}

export class ConfigurationError extends ResearchError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
