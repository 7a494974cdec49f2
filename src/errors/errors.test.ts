import { describe, it, expect } from 'vitest';
import {
  AgentError,
  CancelledError,
  ConnectionError,
  ModelBackendError,
  PolicyError,
  ProtocolError,
  RoundLimitExceededError,
  TimeoutError,
  errorMessage,
  isAgentError,
} from './errors.js';

describe('error taxonomy', () => {
  it.each([
    [new ConnectionError('down'), 'connection_error', 'ConnectionError'],
    [new ProtocolError('bad shape'), 'protocol_error', 'ProtocolError'],
    [new PolicyError('esql'), 'policy_error', 'PolicyError'],
    [new TimeoutError('tools/list', 50), 'timeout', 'TimeoutError'],
    [new RoundLimitExceededError(5), 'round_limit_exceeded', 'RoundLimitExceededError'],
    [new CancelledError('Model response'), 'cancelled', 'CancelledError'],
    [new ModelBackendError('run failed'), 'model_error', 'ModelBackendError'],
  ])('%s carries code %s and its class name', (error, code, name) => {
    expect(error).toBeInstanceOf(AgentError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
    expect(isAgentError(error)).toBe(true);
  });

  it('builds readable default messages', () => {
    expect(new PolicyError('esql').message).toBe("Tool 'esql' is not in the filtered registry");
    expect(new TimeoutError("Tool 'search'", 30000).message).toBe("Tool 'search' timed out after 30000ms");
    expect(new RoundLimitExceededError(2).message).toBe('Model kept requesting tools after 2 round(s)');
    expect(new CancelledError('Model response').message).toBe('Model response was cancelled');
  });

  it('keeps the cause and details', () => {
    const cause = new Error('socket hang up');
    const error = new ConnectionError('tools/list failed', { cause, details: { attempt: 1 } });

    expect(error.cause).toBe(cause);
    expect(error.details).toEqual({ attempt: 1 });
  });

  it('leaves cause unset when none is given', () => {
    expect('cause' in new ProtocolError('x')).toBe(false);
  });

  it('does not treat plain errors as agent errors', () => {
    expect(isAgentError(new Error('plain'))).toBe(false);
    expect(isAgentError('string')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });
});
