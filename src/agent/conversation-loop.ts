import { CancelledError, PolicyError, ProtocolError, RoundLimitExceededError } from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import { toolFailure, type ToolCallResult, type ToolInvoker } from '../tools/tool-invoker.js';
import { withTimeout } from '../utils/timeout.js';
import { Conversation, type ConversationTurn, type ToolTurn, type UserTurn } from './conversation.js';
import type { ModelThread, ModelToolCall } from './model-backend.js';

/**
 * Conversation loop configuration
 */
export interface ConversationLoopConfig {
  /** Tool-call rounds allowed before the conversation is cut off */
  maxToolRounds: number;
  modelTimeoutMs: number;
  toolTimeoutMs: number;
  /** Dispatch the calls of one round concurrently */
  parallelToolCalls: boolean;
}

export const DEFAULT_CONVERSATION_CONFIG: ConversationLoopConfig = {
  maxToolRounds: 5,
  modelTimeoutMs: 120000,
  toolTimeoutMs: 30000,
  parallelToolCalls: true,
};

export type ConversationPhase =
  | 'idle'
  | 'awaiting_model'
  | 'model_final'
  | 'model_wants_tool'
  | 'awaiting_tool_result'
  | 'done';

export interface RoundLimitFailure {
  kind: 'round_limit_exceeded';
  message: string;
}

export type ConversationOutcome =
  | { status: 'completed'; answer: string }
  | { status: 'failed'; failure: RoundLimitFailure };

/**
 * Everything a finished conversation hands back to its caller
 */
export interface ConversationResult {
  turns: readonly ConversationTurn[];
  rounds: number;
  outcome: ConversationOutcome;
}

/**
 * Progress events streamed while the loop runs
 */
export interface PhaseEvent {
  type: 'phase';
  phase: ConversationPhase;
}

export interface ToolCallEvent {
  type: 'tool_call';
  round: number;
  call: ModelToolCall;
}

export interface ToolResultEvent {
  type: 'tool_result';
  round: number;
  turn: ToolTurn;
}

export interface DoneEvent {
  type: 'done';
  result: ConversationResult;
}

export type ConversationEvent = PhaseEvent | ToolCallEvent | ToolResultEvent | DoneEvent;

export interface RunOptions {
  signal?: AbortSignal;
}

export interface ExecuteOptions extends RunOptions {
  onEvent?: (event: ConversationEvent) => void;
}

/**
 * ConversationLoop - mediates between the model and the tool server.
 *
 * One user message in, one ConversationResult out:
 * - the model is awaited with only the turns it has not seen yet
 * - a final answer becomes an assistant turn and ends the conversation
 * - requested tools are dispatched (fan-out, then wait for all), each result
 *   becomes a tool turn, and the model is asked again
 * - once `maxToolRounds` rounds have run, a further tool request ends the
 *   conversation with `round_limit_exceeded` and nothing is dispatched
 *
 * Tool failures are turns. Model failures propagate untouched.
 */
export class ConversationLoop {
  private config: ConversationLoopConfig;
  private thread: ModelThread;
  private invoker: ToolInvoker;
  private logger: Logger;
  private conversation = new Conversation();
  private currentPhase: ConversationPhase = 'idle';
  private rounds = 0;
  private started = false;

  constructor(
    thread: ModelThread,
    invoker: ToolInvoker,
    logger: Logger,
    config: Partial<ConversationLoopConfig> = {}
  ) {
    this.thread = thread;
    this.invoker = invoker;
    this.logger = logger;
    this.config = { ...DEFAULT_CONVERSATION_CONFIG, ...config };
  }

  get phase(): ConversationPhase {
    return this.currentPhase;
  }

  get roundCount(): number {
    return this.rounds;
  }

  /**
   * Turns appended so far, including those of a conversation that was aborted
   */
  turns(): readonly ConversationTurn[] {
    return this.conversation.turns();
  }

  getConfig(): ConversationLoopConfig {
    return { ...this.config };
  }

  /**
   * Runs the conversation for one user message, streaming progress
   */
  async *run(userMessage: string, options: RunOptions = {}): AsyncGenerator<ConversationEvent> {
    if (this.started) {
      throw new Error('A conversation loop runs exactly one conversation');
    }
    this.started = true;

    const { signal } = options;
    const userTurn: UserTurn = { role: 'user', content: userMessage, timestamp: Date.now() };
    this.conversation.append(userTurn);
    let pending: ConversationTurn[] = [userTurn];

    try {
      while (true) {
        yield this.enter('awaiting_model');
        const output = await withTimeout(
          (modelSignal) => this.thread.send(pending, { signal: modelSignal }),
          { timeoutMs: this.config.modelTimeoutMs, signal, operation: 'Model response' }
        );

        if (output.type === 'final') {
          yield this.enter('model_final');
          this.conversation.append({ role: 'assistant', content: output.text, timestamp: Date.now() });
          await this.logger.info('Conversation completed', { rounds: this.rounds, turns: this.conversation.length });
          yield* this.finish({ status: 'completed', answer: output.text });
          return;
        }

        if (output.calls.length === 0) {
          throw new ProtocolError('Model asked for tools without naming any');
        }

        yield this.enter('model_wants_tool');
        if (this.rounds >= this.config.maxToolRounds) {
          const limit = new RoundLimitExceededError(this.config.maxToolRounds);
          await this.logger.warn('Tool round limit reached', {
            rounds: this.rounds,
            maxToolRounds: this.config.maxToolRounds,
            requested: output.calls.map((call) => call.name),
          });
          yield* this.finish({ status: 'failed', failure: { kind: 'round_limit_exceeded', message: limit.message } });
          return;
        }

        this.rounds++;
        const round = this.rounds;
        yield this.enter('awaiting_tool_result');
        for (const call of output.calls) {
          yield { type: 'tool_call', round, call };
        }

        const toolTurns = await this.dispatchAll(output.calls, signal);
        for (const turn of toolTurns) {
          this.conversation.append(turn);
          yield { type: 'tool_result', round, turn };
        }
        pending = toolTurns;
      }
    } catch (error) {
      this.conversation.seal();
      this.currentPhase = 'done';
      if (error instanceof CancelledError) {
        await this.logger.info('Conversation cancelled', { rounds: this.rounds });
      } else {
        await this.logger.error('Conversation aborted', error, { rounds: this.rounds });
      }
      throw error;
    }
  }

  /**
   * Runs the conversation to completion and returns its result
   */
  async execute(userMessage: string, options: ExecuteOptions = {}): Promise<ConversationResult> {
    for await (const event of this.run(userMessage, options)) {
      options.onEvent?.(event);
      if (event.type === 'done') {
        return event.result;
      }
    }
    throw new Error('Conversation ended without a result');
  }

  private enter(phase: ConversationPhase): PhaseEvent {
    this.currentPhase = phase;
    return { type: 'phase', phase };
  }

  private *finish(outcome: ConversationOutcome): Generator<ConversationEvent> {
    this.conversation.seal();
    yield this.enter('done');
    yield {
      type: 'done',
      result: { turns: this.conversation.turns(), rounds: this.rounds, outcome },
    };
  }

  private async dispatchAll(calls: ModelToolCall[], signal: AbortSignal | undefined): Promise<ToolTurn[]> {
    if (this.config.parallelToolCalls) {
      return Promise.all(calls.map((call) => this.dispatch(call, signal)));
    }

    const turns: ToolTurn[] = [];
    for (const call of calls) {
      turns.push(await this.dispatch(call, signal));
    }
    return turns;
  }

  private async dispatch(call: ModelToolCall, signal: AbortSignal | undefined): Promise<ToolTurn> {
    let result: ToolCallResult;
    try {
      result = await this.invoker.invoke(
        { toolName: call.name, arguments: call.arguments },
        { timeoutMs: this.config.toolTimeoutMs, signal }
      );
    } catch (error) {
      if (!(error instanceof PolicyError)) {
        throw error;
      }
      // a local contract violation, kept apart from remote tool failures
      await this.logger.error('Model requested a tool outside the filtered registry', error, {
        toolName: call.name,
        reason: 'policy',
      });
      result = toolFailure('policy_error', `Tool '${call.name}' is not available in this session`);
    }

    return {
      role: 'tool',
      callId: call.id,
      toolName: call.name,
      arguments: call.arguments,
      result,
      timestamp: Date.now(),
    };
  }
}
