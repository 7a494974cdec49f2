/**
 * Terminal formatting for conversation progress, answers and tool output
 */

import type { ConversationEvent } from '../../agent/conversation-loop.js';
import type { ConversationTurn } from '../../agent/conversation.js';
import { extractText, type ToolCallResult } from '../../tools/tool-invoker.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const GRAY = '\x1b[90m';

export interface FormatOptions {
  color: boolean;
}

function paint(text: string, code: string, options: FormatOptions): string {
  return options.color ? `${code}${text}${RESET}` : text;
}

/**
 * Light markdown rendering for model answers: headings, bold, inline code
 * and bullets. With color off the text is returned unchanged.
 */
export function formatAnswer(text: string, options: FormatOptions): string {
  if (!options.color) return text;

  return text
    .replace(/^#{1,6} (.+)$/gm, `${BOLD}$1${RESET}`)
    .replace(/\*\*([^*]+)\*\*/g, `${BOLD}$1${RESET}`)
    .replace(/`([^`]+)`/g, `${CYAN}$1${RESET}`)
    .replace(/^(\s*)[-*] /gm, '$1• ');
}

function formatArguments(args: Record<string, unknown>): string {
  const json = JSON.stringify(args);
  return json.length > 120 ? `${json.slice(0, 117)}...` : json;
}

/**
 * Readable text of a tool result: the server's text parts, or the failure
 */
export function formatToolResult(result: ToolCallResult): string {
  if (!result.success) {
    return `${result.kind}: ${result.message}`;
  }
  const text = extractText(result.payload);
  return text.length > 0 ? text : JSON.stringify(result.payload);
}

/**
 * One progress line per interesting loop event; phases other than the
 * model wait print nothing
 */
export function formatEvent(event: ConversationEvent, options: FormatOptions): string | undefined {
  switch (event.type) {
    case 'phase':
      return event.phase === 'awaiting_model' ? paint('… waiting for the model', GRAY, options) : undefined;
    case 'tool_call':
      return paint(
        `→ [round ${event.round}] ${event.call.name} ${formatArguments(event.call.arguments)}`,
        CYAN,
        options
      );
    case 'tool_result': {
      const { result, toolName } = event.turn;
      return result.success
        ? paint(`✓ ${toolName}`, GREEN, options)
        : paint(`✗ ${toolName} (${result.kind}: ${result.message})`, RED, options);
    }
    case 'done':
      return undefined;
  }
}

/**
 * A stored turn as shown by `transcripts show`
 */
export function formatTurn(turn: ConversationTurn, options: FormatOptions): string {
  switch (turn.role) {
    case 'user':
      return `${paint('user', BOLD, options)}: ${turn.content}`;
    case 'assistant':
      return `${paint('assistant', BOLD, options)}: ${formatAnswer(turn.content, options)}`;
    case 'tool':
      return `${paint(`tool ${turn.toolName}`, BOLD, options)} ${formatArguments(turn.arguments)}\n${formatToolResult(turn.result)}`;
  }
}
