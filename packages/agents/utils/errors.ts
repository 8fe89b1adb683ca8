// Error taxonomy
//   specialist-level  -> ToolCallError, ToolTransportError (absorbed into a finding)
//   synthesis-tier    -> ReasoningBackendError, MalformedOutputError (absorbed by fallback)
//   request-level     -> InvalidRequestError (client error)
//   fatal             -> SynthesisConfigurationError

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class InvalidRequestError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }
}

export type BackendFailureReason =
  | 'rate-limited'
  | 'http'
  | 'connection'
  | 'timeout'
  | 'not-configured'
  | 'empty';

export class ReasoningBackendError extends Error {
  readonly backend: string;
  readonly reason: BackendFailureReason;
  readonly status?: number;

  constructor(backend: string, reason: BackendFailureReason, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ReasoningBackendError';
    this.backend = backend;
    this.reason = reason;
    this.status = options.status;
  }
}

/** Model answered, but not with the JSON shape we asked for */
export class MalformedOutputError extends Error {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'MalformedOutputError';
    this.raw = raw.slice(0, 500);
  }
}

export class ToolCallError extends Error {
  readonly toolName: string;

  constructor(toolName: string, message: string, options: { cause?: unknown } = {}) {
    super(`${toolName}: ${message}`, { cause: options.cause });
    this.name = 'ToolCallError';
    this.toolName = toolName;
  }
}

/** The connection to the tool server itself failed; the bridge must be rebuilt */
export class ToolTransportError extends ToolCallError {
  constructor(toolName: string, message: string, options: { cause?: unknown } = {}) {
    super(toolName, message, options);
    this.name = 'ToolTransportError';
  }
}

export class SynthesisConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SynthesisConfigurationError';
  }
}
