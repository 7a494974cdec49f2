/**
 * Errors - shared error taxonomy
 */

export {
  AgentError,
  ConnectionError,
  ProtocolError,
  PolicyError,
  TimeoutError,
  RoundLimitExceededError,
  CancelledError,
  ModelBackendError,
  isAgentError,
  errorMessage,
  type AgentErrorCode,
  type AgentErrorOptions,
} from './errors.js';
