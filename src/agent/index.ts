/**
 * Agent - conversation loop and model backends
 */

export {
  Conversation,
  formatToolOutput,
  type ConversationTurn,
  type UserTurn,
  type AssistantTurn,
  type ToolTurn,
} from './conversation.js';

export {
  ConversationLoop,
  DEFAULT_CONVERSATION_CONFIG,
  type ConversationLoopConfig,
  type ConversationPhase,
  type ConversationOutcome,
  type ConversationResult,
  type RoundLimitFailure,
  type ConversationEvent,
  type PhaseEvent,
  type ToolCallEvent,
  type ToolResultEvent,
  type DoneEvent,
  type RunOptions,
  type ExecuteOptions,
} from './conversation-loop.js';

export type {
  ModelBackend,
  ModelThread,
  ModelOutput,
  ModelFinalOutput,
  ModelToolCallsOutput,
  ModelToolCall,
  ModelRequestOptions,
} from './model-backend.js';

export {
  FoundryModelBackend,
  FoundryThread,
  createFoundryAgentsApi,
  latestAssistantText,
  toFunctionTool,
  type FoundryAgentsApi,
  type FoundryConfig,
  type FoundryFunctionTool,
  type FoundryMessage,
  type FoundryRun,
  type FoundryToolOutput,
} from './foundry-backend.js';
