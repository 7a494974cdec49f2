import { z } from 'zod';
import { AgentError, CancelledError, PolicyError, errorMessage } from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import type { ToolServerConnection } from '../mcp/connection.js';
import { withTimeout } from '../utils/timeout.js';
import type { ToolRegistrySnapshot } from './tool-registry.js';

/**
 * A request to run one tool
 */
export interface ToolCallRequest {
  toolName: string;
  arguments: Record<string, unknown>;
}

export type ToolFailureKind =
  | 'timeout'
  | 'connection_error'
  | 'protocol_error'
  | 'tool_error'
  | 'policy_error';

export interface ToolCallSuccess {
  success: true;
  /** The tool server's result, untouched */
  payload: unknown;
}

export interface ToolCallFailure {
  success: false;
  kind: ToolFailureKind;
  message: string;
}

/**
 * Outcome of one tool call; failures are values, not exceptions
 */
export type ToolCallResult = ToolCallSuccess | ToolCallFailure;

export interface InvokeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

const callToolResultSchema = z
  .object({
    content: z.array(z.object({ type: z.string() }).passthrough()).optional(),
    isError: z.boolean().optional(),
  })
  .passthrough();

export function toolFailure(kind: ToolFailureKind, message: string): ToolCallFailure {
  return { success: false, kind, message };
}

/**
 * Joins the text parts of a tools/call result
 */
export function extractText(payload: unknown): string {
  const parsed = callToolResultSchema.safeParse(payload);
  if (!parsed.success || !parsed.data.content) {
    return '';
  }
  return parsed.data.content
    .map((part) => (part.type === 'text' && typeof part.text === 'string' ? part.text : ''))
    .filter((text) => text.length > 0)
    .join('\n');
}

function failureKindFor(error: AgentError): ToolFailureKind | undefined {
  switch (error.code) {
    case 'timeout':
      return 'timeout';
    case 'connection_error':
      return 'connection_error';
    case 'protocol_error':
      return 'protocol_error';
    default:
      return undefined;
  }
}

/**
 * ToolInvoker - dispatches tool calls for one session.
 *
 * Bound to the session's filtered registry: a name outside it is refused
 * with PolicyError before anything reaches the network. Remote failures come
 * back as ToolCallFailure so the conversation can carry on. Calls are never
 * retried; a call that reached the server may already have had effects.
 */
export class ToolInvoker {
  private connection: ToolServerConnection;
  private registry: ToolRegistrySnapshot;
  private logger: Logger;

  constructor(connection: ToolServerConnection, registry: ToolRegistrySnapshot, logger: Logger) {
    this.connection = connection;
    this.registry = registry;
    this.logger = logger;
  }

  async invoke(request: ToolCallRequest, options: InvokeOptions): Promise<ToolCallResult> {
    const { toolName } = request;

    if (!this.registry.has(toolName)) {
      throw new PolicyError(toolName);
    }

    const started = Date.now();
    let payload: unknown;
    try {
      payload = await withTimeout(
        (signal) => this.connection.callTool(toolName, request.arguments, { timeoutMs: options.timeoutMs, signal }),
        { timeoutMs: options.timeoutMs, signal: options.signal, operation: `Tool '${toolName}'` }
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const kind = error instanceof AgentError ? failureKindFor(error) : undefined;
      const failure = toolFailure(kind ?? 'connection_error', errorMessage(error));
      await this.logger.warn('Tool call failed', {
        operation: 'tools/call',
        toolName,
        kind: failure.kind,
        error: failure.message,
      });
      return failure;
    }

    const parsed = callToolResultSchema.safeParse(payload);
    if (!parsed.success) {
      await this.logger.warn('Tool server returned a malformed result', { operation: 'tools/call', toolName });
      return toolFailure('protocol_error', `Tool '${toolName}' returned a malformed result`);
    }

    if (parsed.data.isError === true) {
      const message = extractText(payload) || `Tool '${toolName}' reported an error`;
      await this.logger.warn('Tool reported an error', { operation: 'tools/call', toolName, error: message });
      return toolFailure('tool_error', message);
    }

    await this.logger.info('Tool call succeeded', {
      operation: 'tools/call',
      toolName,
      durationMs: Date.now() - started,
    });
    return { success: true, payload };
  }
}
