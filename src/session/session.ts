import { randomUUID } from 'node:crypto';
import {
  ConversationLoop,
  DEFAULT_CONVERSATION_CONFIG,
  type ConversationEvent,
  type ConversationLoopConfig,
  type ConversationResult,
  type ExecuteOptions,
  type RunOptions,
} from '../agent/conversation-loop.js';
import { Conversation, type ConversationTurn } from '../agent/conversation.js';
import type { ModelBackend, ModelThread } from '../agent/model-backend.js';
import { CancelledError } from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import type { ToolServerConfig, ToolServerConnection } from '../mcp/connection.js';
import { excludedToolNames, filterTools, type ToolFilterPolicy } from '../tools/tool-filter.js';
import { ToolInvoker } from '../tools/tool-invoker.js';
import { ToolRegistryClient, ToolRegistrySnapshot } from '../tools/tool-registry.js';
import { withTimeout } from '../utils/timeout.js';
import type { TranscriptStore } from './transcript-store.js';

/**
 * Everything one session needs to know, fixed for its whole lifetime
 */
export interface SessionConfig {
  readonly toolServer: Readonly<ToolServerConfig>;
  readonly toolFilter: ToolFilterPolicy;
  readonly conversation: Readonly<ConversationLoopConfig>;
  readonly registryTimeoutMs: number;
}

/**
 * The collaborators a session acquires resources from
 */
export interface SessionDependencies {
  connect(config: ToolServerConfig, options: { signal?: AbortSignal }): Promise<ToolServerConnection>;
  modelBackend: ModelBackend;
  logger: Logger;
  /** Finished conversations are saved here when present */
  transcripts?: TranscriptStore;
}

export interface SessionOptions {
  signal?: AbortSignal;
  sessionId?: string;
}

export type SessionState = 'open' | 'running' | 'closed';

export function createSessionConfig(options: {
  toolServer: ToolServerConfig;
  toolFilter: ToolFilterPolicy;
  conversation?: Partial<ConversationLoopConfig>;
  registryTimeoutMs: number;
}): SessionConfig {
  return Object.freeze({
    toolServer: Object.freeze({ ...options.toolServer }),
    toolFilter: options.toolFilter,
    conversation: Object.freeze({ ...DEFAULT_CONVERSATION_CONFIG, ...options.conversation }),
    registryTimeoutMs: options.registryTimeoutMs,
  });
}

/**
 * Session - one tool server connection and one model thread serving one
 * conversation.
 *
 * The conversation may span several questions: each question runs its own
 * bounded ConversationLoop on the same thread, and the session keeps the
 * append-only log of every turn. Questions run one at a time.
 *
 * Obtain one through openSession or withSession; close() releases both
 * resources once, whatever state the conversation ended in.
 */
export class Session {
  readonly id: string;
  readonly createdAt: number;
  readonly registry: ToolRegistrySnapshot;
  readonly excludedTools: readonly string[];
  readonly invoker: ToolInvoker;
  private connection: ToolServerConnection;
  private thread: ModelThread;
  private config: SessionConfig;
  private logger: Logger;
  private transcripts: TranscriptStore | undefined;
  private log = new Conversation();
  private rounds = 0;
  private questions = 0;
  private currentState: SessionState = 'open';

  constructor(params: {
    id: string;
    connection: ToolServerConnection;
    thread: ModelThread;
    registry: ToolRegistrySnapshot;
    excludedTools: readonly string[];
    config: SessionConfig;
    logger: Logger;
    transcripts?: TranscriptStore;
  }) {
    this.id = params.id;
    this.createdAt = Date.now();
    this.connection = params.connection;
    this.thread = params.thread;
    this.registry = params.registry;
    this.excludedTools = Object.freeze([...params.excludedTools]);
    this.config = params.config;
    this.logger = params.logger;
    this.transcripts = params.transcripts;
    this.invoker = new ToolInvoker(params.connection, params.registry, params.logger);
  }

  get state(): SessionState {
    return this.currentState;
  }

  get threadId(): string {
    return this.thread.id;
  }

  /** Questions asked so far */
  get questionCount(): number {
    return this.questions;
  }

  /**
   * Every turn of the session so far, across all questions
   */
  turns(): readonly ConversationTurn[] {
    return this.log.turns();
  }

  /**
   * Runs one question of the conversation, streaming loop events
   */
  async *run(userMessage: string, options: RunOptions = {}): AsyncGenerator<ConversationEvent> {
    if (this.currentState !== 'open') {
      throw new Error(`Session ${this.id} is ${this.currentState}; wait for the current question or open a new session`);
    }
    this.currentState = 'running';
    this.questions++;

    const loop = new ConversationLoop(this.thread, this.invoker, this.logger, this.config.conversation);
    let recorded = false;
    try {
      for await (const event of loop.run(userMessage, options)) {
        if (event.type === 'done') {
          this.record(event.result.turns, event.result.rounds);
          recorded = true;
          await this.persist(event.result);
        }
        yield event;
      }
    } finally {
      // an aborted question still leaves its turns in the log
      if (!recorded) {
        this.record(loop.turns(), loop.roundCount);
      }
      if (this.currentState === 'running') {
        this.currentState = 'open';
      }
    }
  }

  async ask(userMessage: string, options: ExecuteOptions = {}): Promise<ConversationResult> {
    for await (const event of this.run(userMessage, options)) {
      options.onEvent?.(event);
      if (event.type === 'done') {
        return event.result;
      }
    }
    throw new Error('Conversation ended without a result');
  }

  /**
   * Releases the model thread and the connection. Both releases are
   * attempted; their failures are reported together. Later calls do nothing.
   */
  async close(): Promise<void> {
    if (this.currentState === 'closed') return;
    this.currentState = 'closed';

    const failures: unknown[] = [];
    try {
      await this.thread.close();
    } catch (error) {
      failures.push(error);
      await this.logger.error('Failed to release model thread', error, { threadId: this.thread.id });
    }
    try {
      await this.connection.close();
    } catch (error) {
      failures.push(error);
      await this.logger.error('Failed to close tool server connection', error);
    }

    if (failures.length > 0) {
      throw new AggregateError(failures, `Session ${this.id} did not release cleanly`);
    }
    await this.logger.info('Session closed', { questions: this.questions, turns: this.log.length });
  }

  private record(turns: readonly ConversationTurn[], rounds: number): void {
    for (const turn of turns) {
      this.log.append(turn);
    }
    this.rounds += rounds;
  }

  private async persist(result: ConversationResult): Promise<void> {
    if (!this.transcripts) return;
    try {
      await this.transcripts.save({
        sessionId: this.id,
        createdAt: this.createdAt,
        finishedAt: Date.now(),
        rounds: this.rounds,
        status: result.outcome.status,
        tools: this.registry.names,
        turns: this.log.turns(),
      });
    } catch (error) {
      await this.logger.error('Could not save transcript', error);
    }
  }
}

/**
 * Connects, fetches and filters the registry, then opens a model thread
 * offering the filtered tools. Whatever was acquired is released again if
 * a later step fails.
 */
export async function openSession(
  config: SessionConfig,
  deps: SessionDependencies,
  options: SessionOptions = {}
): Promise<Session> {
  const { signal } = options;
  const id = options.sessionId ?? randomUUID();
  const logger = deps.logger.child({ sessionId: id });

  if (signal?.aborted) {
    throw new CancelledError('Opening session');
  }

  const connection = await deps.connect(config.toolServer, { signal });
  let thread: ModelThread | undefined;
  try {
    const discovered = await new ToolRegistryClient(connection, logger).listTools({
      timeoutMs: config.registryTimeoutMs,
      signal,
    });
    const registry = new ToolRegistrySnapshot(filterTools(discovered, config.toolFilter));
    const excluded = excludedToolNames(discovered, config.toolFilter);
    if (excluded.length > 0) {
      await logger.info('Excluded tools from the registry', { excluded });
    }

    thread = await withTimeout((threadSignal) => deps.modelBackend.openThread(registry.tools, { signal: threadSignal }), {
      timeoutMs: config.conversation.modelTimeoutMs,
      signal,
      operation: 'Opening model thread',
    });

    const session = new Session({
      id,
      connection,
      thread,
      registry,
      excludedTools: excluded,
      config,
      logger,
      transcripts: deps.transcripts,
    });
    await logger.info('Session opened', { tools: registry.names, threadId: thread.id });
    return session;
  } catch (error) {
    if (thread) {
      try {
        await thread.close();
      } catch (releaseError) {
        await logger.error('Failed to release model thread after open failure', releaseError);
      }
    }
    try {
      await connection.close();
    } catch (releaseError) {
      await logger.error('Failed to close connection after open failure', releaseError);
    }
    throw error;
  }
}

export async function closeSession(session: Session): Promise<void> {
  await session.close();
}

/**
 * Runs `body` inside an open session and closes the session on every exit
 * path. A release failure after `body` threw is logged, and the original
 * error is the one rethrown.
 */
export async function withSession<T>(
  config: SessionConfig,
  deps: SessionDependencies,
  body: (session: Session) => Promise<T>,
  options: SessionOptions = {}
): Promise<T> {
  const session = await openSession(config, deps, options);

  let result: T;
  try {
    result = await body(session);
  } catch (error) {
    try {
      await session.close();
    } catch (releaseError) {
      await deps.logger.error('Session release failed after an error', releaseError, { sessionId: session.id });
    }
    throw error;
  }

  await session.close();
  return result;
}
