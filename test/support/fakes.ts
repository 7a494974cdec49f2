/**
 * In-process stand-ins for the tool server, the model and the log file
 */

import type { ConversationTurn } from '../../src/agent/conversation.js';
import type { ModelBackend, ModelOutput, ModelRequestOptions, ModelThread } from '../../src/agent/model-backend.js';
import { Logger, type LogContext, type LogEntry } from '../../src/logging/logger.js';
import type { CallOptions, ToolServerConnection } from '../../src/mcp/connection.js';
import type { ToolDescriptor } from '../../src/tools/tool-registry.js';

/**
 * Logger that keeps entries in memory; children share the same array
 */
export class MemoryLogger extends Logger {
  readonly entries: LogEntry[];

  constructor(entries: LogEntry[] = [], context: LogContext = {}) {
    super({ level: 'debug', path: 'memory.log' }, context);
    this.entries = entries;
  }

  child(context: LogContext): MemoryLogger {
    return new MemoryLogger(this.entries, { ...this.defaultContext, ...context });
  }

  async write(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
  }

  messages(level?: LogEntry['level']): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }
}

/**
 * Logger whose every write fails, as with a full or read-only disk
 */
export class FailingLogger extends MemoryLogger {
  readonly failure: Error;

  constructor(failure: Error = new Error('EACCES: permission denied'), context: LogContext = {}) {
    super([], context);
    this.failure = failure;
  }

  child(context: LogContext): FailingLogger {
    return new FailingLogger(this.failure, { ...this.defaultContext, ...context });
  }

  async write(): Promise<void> {
    throw this.failure;
  }
}

export function descriptor(name: string, description = `${name} tool`): ToolDescriptor {
  return {
    name,
    description,
    inputSchema: { type: 'object', properties: {} },
  };
}

export function textResult(text: string, isError = false): { content: Array<{ type: 'text'; text: string }>; isError: boolean } {
  return { content: [{ type: 'text', text }], isError };
}

type CallHandler = (args: Record<string, unknown>, options: CallOptions) => Promise<unknown>;

/**
 * Tool server connection answering from a fixed listing and per-tool handlers
 */
export class FakeToolServerConnection implements ToolServerConnection {
  listing: unknown;
  listError: Error | undefined;
  closeError: Error | undefined;
  closeCount = 0;
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  private handlers = new Map<string, CallHandler>();

  constructor(tools: readonly ToolDescriptor[] = []) {
    this.listing = { tools };
  }

  on(name: string, handler: CallHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  async listTools(): Promise<unknown> {
    if (this.listError) throw this.listError;
    return this.listing;
  }

  async callTool(name: string, args: Record<string, unknown>, options: CallOptions): Promise<unknown> {
    this.calls.push({ name, args });
    const handler = this.handlers.get(name);
    return handler ? handler(args, options) : textResult(`${name} ok`);
  }

  async close(): Promise<void> {
    this.closeCount++;
    if (this.closeError) throw this.closeError;
  }
}

export type ModelStep =
  | ModelOutput
  | Error
  | ((turns: readonly ConversationTurn[], options: ModelRequestOptions) => Promise<ModelOutput>);

/**
 * Model thread replaying scripted outputs in order
 */
export class ScriptedThread implements ModelThread {
  readonly id: string;
  readonly sent: ConversationTurn[][] = [];
  closeCount = 0;
  closeError: Error | undefined;
  private steps: ModelStep[];

  constructor(steps: ModelStep[], id = 'thread-1') {
    this.steps = [...steps];
    this.id = id;
  }

  async send(turns: readonly ConversationTurn[], options: ModelRequestOptions): Promise<ModelOutput> {
    this.sent.push([...turns]);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('No scripted model output left');
    }
    if (step instanceof Error) {
      throw step;
    }
    return typeof step === 'function' ? step(turns, options) : step;
  }

  async close(): Promise<void> {
    this.closeCount++;
    if (this.closeError) throw this.closeError;
  }
}

export class ScriptedModelBackend implements ModelBackend {
  readonly thread: ScriptedThread;
  openedWith: readonly ToolDescriptor[] | undefined;
  openError: Error | undefined;

  constructor(steps: ModelStep[]) {
    this.thread = new ScriptedThread(steps);
  }

  async openThread(tools: readonly ToolDescriptor[]): Promise<ScriptedThread> {
    if (this.openError) throw this.openError;
    this.openedWith = tools;
    return this.thread;
  }
}

export function toolCalls(...calls: Array<[id: string, name: string, args?: Record<string, unknown>]>): ModelOutput {
  return {
    type: 'tool_calls',
    calls: calls.map(([id, name, args]) => ({ id, name, arguments: args ?? {} })),
  };
}

export function finalAnswer(text: string): ModelOutput {
  return { type: 'final', text };
}
