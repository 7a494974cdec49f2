import type { ToolDescriptor } from '../tools/tool-registry.js';
import type { ConversationTurn } from './conversation.js';

/**
 * A tool invocation requested by the model
 */
export interface ModelToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ModelFinalOutput {
  type: 'final';
  text: string;
}

export interface ModelToolCallsOutput {
  type: 'tool_calls';
  calls: ModelToolCall[];
}

/**
 * What the model produced for one request
 */
export type ModelOutput = ModelFinalOutput | ModelToolCallsOutput;

export interface ModelRequestOptions {
  signal?: AbortSignal;
}

/**
 * A remote conversation thread with the model.
 *
 * The thread keeps history on its side: `send` receives only the turns
 * appended since the previous call (the user message first, then the tool
 * results answering the last requested calls).
 */
export interface ModelThread {
  readonly id: string;
  send(turns: readonly ConversationTurn[], options: ModelRequestOptions): Promise<ModelOutput>;
  /** Releases the remote thread; calling it twice is harmless */
  close(): Promise<void>;
}

/**
 * Creates model threads that can call the given tools
 */
export interface ModelBackend {
  openThread(tools: readonly ToolDescriptor[], options: ModelRequestOptions): Promise<ModelThread>;
}
