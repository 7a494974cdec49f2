/**
 * Error taxonomy shared by the tool server client, the invoker, the
 * conversation loop and the session lifecycle.
 *
 * Every error carries a stable `code` so callers and logs can tell a remote
 * failure apart from a local contract violation without string matching.
 */

export type AgentErrorCode =
  | 'connection_error'
  | 'protocol_error'
  | 'policy_error'
  | 'timeout'
  | 'round_limit_exceeded'
  | 'cancelled'
  | 'model_error';

export interface AgentErrorOptions {
  cause?: unknown;
  details?: unknown;
}

/**
 * Base class for every error raised by this package
 */
export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly details?: unknown;

  constructor(code: AgentErrorCode, message: string, options: AgentErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;
  }
}

/**
 * The tool server (or another remote endpoint) could not be reached
 */
export class ConnectionError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super('connection_error', message, options);
  }
}

/**
 * A remote peer answered with something that does not match the expected shape
 */
export class ProtocolError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super('protocol_error', message, options);
  }
}

/**
 * A call was attempted for a tool outside the filtered registry.
 * This is a local programming error, never a remote failure.
 */
export class PolicyError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string, message?: string) {
    super('policy_error', message ?? `Tool '${toolName}' is not in the filtered registry`);
    this.toolName = toolName;
  }
}

/**
 * A caller-supplied bound was exceeded
 */
export class TimeoutError extends AgentError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('timeout', `${operation} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The conversation loop hit its tool-round limit
 */
export class RoundLimitExceededError extends AgentError {
  readonly maxToolRounds: number;

  constructor(maxToolRounds: number) {
    super('round_limit_exceeded', `Model kept requesting tools after ${maxToolRounds} round(s)`);
    this.maxToolRounds = maxToolRounds;
  }
}

/**
 * The caller aborted the operation
 */
export class CancelledError extends AgentError {
  constructor(operation: string) {
    super('cancelled', `${operation} was cancelled`);
  }
}

/**
 * The language model backend reported a failure
 */
export class ModelBackendError extends AgentError {
  constructor(message: string, options?: AgentErrorOptions) {
    super('model_error', message, options);
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
