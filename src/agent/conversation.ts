import type { ToolCallResult } from '../tools/tool-invoker.js';

export interface UserTurn {
  role: 'user';
  content: string;
  timestamp: number;
}

export interface AssistantTurn {
  role: 'assistant';
  content: string;
  timestamp: number;
}

/**
 * Result of one tool call, fed back to the model
 */
export interface ToolTurn {
  role: 'tool';
  callId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  result: ToolCallResult;
  timestamp: number;
}

export type ConversationTurn = UserTurn | AssistantTurn | ToolTurn;

/**
 * Conversation - append-only turn log of a conversation loop or a whole session
 */
export class Conversation {
  private entries: ConversationTurn[] = [];
  private sealed = false;

  get length(): number {
    return this.entries.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  append(turn: ConversationTurn): void {
    if (this.sealed) {
      throw new Error('Conversation is finished; no further turns can be appended');
    }
    this.entries.push(Object.freeze(turn));
  }

  /**
   * Marks the conversation done
   */
  seal(): void {
    this.sealed = true;
  }

  turns(): readonly ConversationTurn[] {
    return Object.freeze([...this.entries]);
  }
}

/**
 * Serialises a tool result the way the model receives it
 */
export function formatToolOutput(result: ToolCallResult): string {
  if (result.success) {
    return typeof result.payload === 'string' ? result.payload : JSON.stringify(result.payload);
  }
  return JSON.stringify({
    success: false,
    kind: result.kind,
    error: `Tool execution failed: ${result.message}`,
  });
}
