import { setTimeout as sleep } from 'node:timers/promises';
import { AgentsClient, ToolUtility } from '@azure/ai-agents';
import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import { z } from 'zod';
import {
  AgentError,
  CancelledError,
  ModelBackendError,
  ProtocolError,
  errorMessage,
} from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import type { ToolDescriptor } from '../tools/tool-registry.js';
import { formatToolOutput, type ConversationTurn, type ToolTurn, type UserTurn } from './conversation.js';
import type {
  ModelBackend,
  ModelOutput,
  ModelRequestOptions,
  ModelThread,
  ModelToolCall,
} from './model-backend.js';

/**
 * Azure AI Foundry agent settings
 */
export interface FoundryConfig {
  projectEndpoint: string;
  modelDeploymentName: string;
  agentName: string;
  agentInstructions: string;
  pollIntervalMs: number;
}

export interface FoundryFunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: unknown;
  };
}

/**
 * The slice of a Foundry run the backend looks at
 */
export interface FoundryRun {
  id: string;
  status: string;
  requiredAction?: unknown;
  lastError?: { code?: string; message?: string } | null;
}

export interface FoundryMessage {
  role: string;
  content: unknown;
}

export interface FoundryToolOutput {
  toolCallId: string;
  output: string;
}

/**
 * The Foundry agents operations the backend uses
 */
export interface FoundryAgentsApi {
  createAgent(params: {
    model: string;
    name: string;
    instructions: string;
    tools: FoundryFunctionTool[];
  }): Promise<{ id: string }>;
  deleteAgent(agentId: string): Promise<void>;
  createThread(): Promise<{ id: string }>;
  deleteThread(threadId: string): Promise<void>;
  createMessage(threadId: string, content: string): Promise<void>;
  listRunMessages(threadId: string, runId: string): Promise<FoundryMessage[]>;
  createRun(threadId: string, agentId: string): Promise<FoundryRun>;
  getRun(threadId: string, runId: string): Promise<FoundryRun>;
  submitToolOutputs(threadId: string, runId: string, outputs: FoundryToolOutput[]): Promise<FoundryRun>;
  cancelRun(threadId: string, runId: string): Promise<void>;
}

/**
 * Adapts the @azure/ai-agents client to FoundryAgentsApi
 */
export function createFoundryAgentsApi(client: AgentsClient): FoundryAgentsApi {
  return {
    async createAgent(params) {
      const agent = await client.createAgent(params.model, {
        name: params.name,
        instructions: params.instructions,
        tools: params.tools.map((tool) => ToolUtility.createFunctionTool(tool.function).definition),
      });
      return { id: agent.id };
    },
    async deleteAgent(agentId) {
      await client.deleteAgent(agentId);
    },
    async createThread() {
      const thread = await client.threads.create();
      return { id: thread.id };
    },
    async deleteThread(threadId) {
      await client.threads.delete(threadId);
    },
    async createMessage(threadId, content) {
      await client.messages.create(threadId, 'user', content);
    },
    async listRunMessages(threadId, runId) {
      const messages: FoundryMessage[] = [];
      for await (const message of client.messages.list(threadId, { runId })) {
        messages.push({ role: message.role, content: message.content });
      }
      return messages;
    },
    async createRun(threadId, agentId) {
      return toFoundryRun(await client.runs.create(threadId, agentId));
    },
    async getRun(threadId, runId) {
      return toFoundryRun(await client.runs.get(threadId, runId));
    },
    async submitToolOutputs(threadId, runId, outputs) {
      return toFoundryRun(await client.runs.submitToolOutputs(threadId, runId, outputs));
    },
    async cancelRun(threadId, runId) {
      await client.runs.cancel(threadId, runId);
    },
  };
}

function toFoundryRun(run: FoundryRun): FoundryRun {
  return {
    id: run.id,
    status: run.status,
    requiredAction: run.requiredAction,
    lastError: run.lastError,
  };
}

/**
 * Describes a registry tool as a Foundry function tool
 */
export function toFunctionTool(descriptor: ToolDescriptor): FoundryFunctionTool {
  return {
    type: 'function',
    function: {
      name: descriptor.name,
      description: descriptor.description,
      parameters: descriptor.inputSchema,
    },
  };
}

const requiredActionSchema = z.object({
  type: z.literal('submit_tool_outputs'),
  submitToolOutputs: z.object({
    toolCalls: z.array(
      z
        .object({
          id: z.string(),
          type: z.string(),
          function: z.object({ name: z.string(), arguments: z.string() }).optional(),
        })
        .passthrough()
    ),
  }),
});

const messageContentSchema = z.array(
  z
    .object({
      type: z.string(),
      text: z.object({ value: z.string() }).passthrough().optional(),
    })
    .passthrough()
);

const PENDING_RUN_STATUSES = new Set(['queued', 'in_progress', 'cancelling']);
const FAILED_RUN_STATUSES = new Set(['failed', 'cancelled', 'expired']);

function ensureNotCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation);
  }
}

async function callFoundry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AgentError) throw error;
    throw new ModelBackendError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * FoundryThread - one Foundry agent and thread driven run by run.
 *
 * A user message starts a run; tool results are submitted to the run that
 * asked for them. Either way the run is polled until it needs tools or is
 * finished.
 */
export class FoundryThread implements ModelThread {
  readonly id: string;
  readonly agentId: string;
  private api: FoundryAgentsApi;
  private pollIntervalMs: number;
  private logger: Logger;
  private activeRunId: string | undefined;
  private closed = false;

  constructor(api: FoundryAgentsApi, agentId: string, threadId: string, pollIntervalMs: number, logger: Logger) {
    this.api = api;
    this.agentId = agentId;
    this.id = threadId;
    this.pollIntervalMs = pollIntervalMs;
    this.logger = logger;
  }

  async send(turns: readonly ConversationTurn[], options: ModelRequestOptions): Promise<ModelOutput> {
    if (this.closed) {
      throw new ModelBackendError(`Thread ${this.id} is closed`);
    }

    const toolTurns = turns.filter((turn): turn is ToolTurn => turn.role === 'tool');
    const userTurns = turns.filter((turn): turn is UserTurn => turn.role === 'user');

    let run: FoundryRun;
    if (toolTurns.length > 0) {
      const runId = this.activeRunId;
      if (runId === undefined) {
        throw new ProtocolError('Tool results were sent but no run is waiting for them');
      }
      const outputs = toolTurns.map((turn) => ({ toolCallId: turn.callId, output: formatToolOutput(turn.result) }));
      run = await callFoundry('Submitting tool outputs', () => this.api.submitToolOutputs(this.id, runId, outputs));
    } else if (userTurns.length > 0) {
      await this.cancelActiveRun(options.signal);
      for (const turn of userTurns) {
        ensureNotCancelled(options.signal, 'Sending message');
        await callFoundry('Creating message', () => this.api.createMessage(this.id, turn.content));
      }
      run = await callFoundry('Starting run', () => this.api.createRun(this.id, this.agentId));
    } else {
      throw new ProtocolError('Nothing to send to the model');
    }

    this.activeRunId = run.id;
    const settled = await this.waitForRun(run, options.signal);
    return this.interpret(settled);
  }

  /**
   * Cancels a run still in flight, then deletes the thread and the agent
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const runId = this.activeRunId;
    if (runId !== undefined) {
      this.activeRunId = undefined;
      try {
        await this.api.cancelRun(this.id, runId);
      } catch (error) {
        await this.logger.warn('Could not cancel pending run', { threadId: this.id, runId, error: errorMessage(error) });
      }
    }

    const failures: string[] = [];
    try {
      await this.api.deleteThread(this.id);
    } catch (error) {
      failures.push(`thread: ${errorMessage(error)}`);
    }
    try {
      await this.api.deleteAgent(this.agentId);
    } catch (error) {
      failures.push(`agent: ${errorMessage(error)}`);
    }

    if (failures.length > 0) {
      throw new ModelBackendError(`Releasing Foundry thread ${this.id} failed (${failures.join('; ')})`, {
        details: failures,
      });
    }
    await this.logger.debug('Foundry thread released', { threadId: this.id, agentId: this.agentId });
  }

  /**
   * A new question cannot start while a run still waits for tool outputs,
   * which is where a round limit or a cancellation leaves it
   */
  private async cancelActiveRun(signal: AbortSignal | undefined): Promise<void> {
    const runId = this.activeRunId;
    if (runId === undefined) return;

    this.activeRunId = undefined;
    await callFoundry('Cancelling run', () => this.api.cancelRun(this.id, runId));
    const run = await callFoundry('Polling run', () => this.api.getRun(this.id, runId));
    await this.waitForRun(run, signal);
    await this.logger.info('Cancelled run left waiting for tool outputs', { threadId: this.id, runId });
  }

  private async waitForRun(run: FoundryRun, signal: AbortSignal | undefined): Promise<FoundryRun> {
    let current = run;
    while (PENDING_RUN_STATUSES.has(current.status)) {
      try {
        await sleep(this.pollIntervalMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) throw new CancelledError('Waiting for run');
        throw error;
      }
      current = await callFoundry('Polling run', () => this.api.getRun(this.id, current.id));
      await this.logger.debug('Run status', { threadId: this.id, runId: current.id, status: current.status });
    }
    return current;
  }

  private async interpret(run: FoundryRun): Promise<ModelOutput> {
    if (run.status === 'requires_action') {
      return { type: 'tool_calls', calls: await this.readToolCalls(run) };
    }

    this.activeRunId = undefined;

    if (run.status === 'completed') {
      const messages = await callFoundry('Listing messages', () => this.api.listRunMessages(this.id, run.id));
      return { type: 'final', text: latestAssistantText(messages) };
    }

    if (FAILED_RUN_STATUSES.has(run.status)) {
      const reason = run.lastError?.message ?? 'no details';
      throw new ModelBackendError(`Run ${run.id} ${run.status}: ${reason}`, { details: run.lastError });
    }

    throw new ProtocolError(`Run ${run.id} reported unexpected status '${run.status}'`);
  }

  private async readToolCalls(run: FoundryRun): Promise<ModelToolCall[]> {
    const parsed = requiredActionSchema.safeParse(run.requiredAction);
    if (!parsed.success) {
      throw new ProtocolError(`Run ${run.id} requires an action this client does not support`, {
        details: parsed.error.issues,
      });
    }

    const calls: ModelToolCall[] = [];
    for (const toolCall of parsed.data.submitToolOutputs.toolCalls) {
      if (toolCall.type !== 'function' || !toolCall.function) {
        throw new ProtocolError(`Run ${run.id} requested a '${toolCall.type}' tool call`);
      }
      calls.push({
        id: toolCall.id,
        name: toolCall.function.name,
        arguments: await this.parseArguments(toolCall.function.name, toolCall.function.arguments),
      });
    }
    return calls;
  }

  private async parseArguments(toolName: string, raw: string): Promise<Record<string, unknown>> {
    try {
      const value: unknown = JSON.parse(raw);
      if (isRecord(value)) {
        return value;
      }
    } catch {
      // fall through to the warning below
    }
    await this.logger.warn('Model sent tool arguments that are not a JSON object', { toolName, arguments: raw });
    return {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text of the newest assistant message; messages arrive newest first
 */
export function latestAssistantText(messages: readonly FoundryMessage[]): string {
  for (const message of messages) {
    if (message.role !== 'assistant') continue;
    const parsed = messageContentSchema.safeParse(message.content);
    if (!parsed.success) {
      throw new ProtocolError('Assistant message content has an unexpected shape');
    }
    return parsed.data
      .map((part) => (part.type === 'text' && part.text ? part.text.value : ''))
      .filter((text) => text.length > 0)
      .join('\n');
  }
  throw new ProtocolError('Completed run produced no assistant message');
}

/**
 * FoundryModelBackend - opens an Azure AI Foundry agent and thread per
 * session, exposing the session's filtered tools as function tools
 */
export class FoundryModelBackend implements ModelBackend {
  private api: FoundryAgentsApi;
  private config: FoundryConfig;
  private logger: Logger;

  constructor(api: FoundryAgentsApi, config: FoundryConfig, logger: Logger) {
    this.api = api;
    this.config = config;
    this.logger = logger;
  }

  static fromConfig(
    config: FoundryConfig,
    logger: Logger,
    credential: TokenCredential = new DefaultAzureCredential()
  ): FoundryModelBackend {
    const client = new AgentsClient(config.projectEndpoint, credential);
    return new FoundryModelBackend(createFoundryAgentsApi(client), config, logger);
  }

  async openThread(tools: readonly ToolDescriptor[], options: ModelRequestOptions): Promise<FoundryThread> {
    ensureNotCancelled(options.signal, 'Opening model thread');

    const agent = await callFoundry('Creating agent', () =>
      this.api.createAgent({
        model: this.config.modelDeploymentName,
        name: this.config.agentName,
        instructions: this.config.agentInstructions,
        tools: tools.map(toFunctionTool),
      })
    );

    let threadId: string;
    try {
      ensureNotCancelled(options.signal, 'Opening model thread');
      threadId = (await callFoundry('Creating thread', () => this.api.createThread())).id;
    } catch (error) {
      try {
        await this.api.deleteAgent(agent.id);
      } catch (cleanupError) {
        await this.logger.error('Could not delete agent after failed thread creation', cleanupError, {
          agentId: agent.id,
        });
      }
      throw error;
    }

    if (options.signal?.aborted) {
      await this.discard(agent.id, threadId);
      throw new CancelledError('Opening model thread');
    }

    await this.logger.info('Foundry agent ready', {
      agentId: agent.id,
      threadId,
      model: this.config.modelDeploymentName,
      tools: tools.length,
    });
    return new FoundryThread(this.api, agent.id, threadId, this.config.pollIntervalMs, this.logger);
  }

  /**
   * Deletes a thread and agent whose opener has already given up on them
   */
  private async discard(agentId: string, threadId: string): Promise<void> {
    try {
      await this.api.deleteThread(threadId);
    } catch (error) {
      await this.logger.error('Could not delete abandoned thread', error, { threadId });
    }
    try {
      await this.api.deleteAgent(agentId);
    } catch (error) {
      await this.logger.error('Could not delete abandoned agent', error, { agentId });
    }
    await this.logger.info('Discarded agent opened after cancellation', { agentId, threadId });
  }
}
