import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { ConversationLoop, type ConversationEvent, type ConversationLoopConfig } from './conversation-loop.js';
import type { ModelStep } from '../../test/support/fakes.js';
import {
  FakeToolServerConnection,
  MemoryLogger,
  ScriptedThread,
  descriptor,
  finalAnswer,
  textResult,
  toolCalls,
} from '../../test/support/fakes.js';
import { ToolInvoker } from '../tools/tool-invoker.js';
import { ToolRegistrySnapshot } from '../tools/tool-registry.js';
import { CancelledError, ModelBackendError, ProtocolError, TimeoutError } from '../errors/errors.js';

function setup(steps: ModelStep[], config: Partial<ConversationLoopConfig> = {}) {
  const tools = ['search', 'list_indices', 'get_shards'].map((name) => descriptor(name));
  const connection = new FakeToolServerConnection([...tools, descriptor('esql')]);
  const logger = new MemoryLogger();
  const thread = new ScriptedThread(steps);
  const invoker = new ToolInvoker(connection, new ToolRegistrySnapshot(tools), logger);
  const loop = new ConversationLoop(thread, invoker, logger, { toolTimeoutMs: 1000, modelTimeoutMs: 1000, ...config });
  return { connection, logger, thread, loop };
}

async function collect(loop: ConversationLoop, message: string, signal?: AbortSignal): Promise<ConversationEvent[]> {
  const events: ConversationEvent[] = [];
  for await (const event of loop.run(message, { signal })) {
    events.push(event);
  }
  return events;
}

describe('ConversationLoop', () => {
  it('returns the first final answer without calling tools', async () => {
    const { loop, connection, thread } = setup([finalAnswer('There are 12 galleries.')]);

    const result = await loop.execute('How many galleries?');

    expect(result.outcome).toEqual({ status: 'completed', answer: 'There are 12 galleries.' });
    expect(result.rounds).toBe(0);
    expect(result.turns.map((turn) => turn.role)).toEqual(['user', 'assistant']);
    expect(connection.calls).toEqual([]);
    expect(thread.sent).toHaveLength(1);
    expect(loop.phase).toBe('done');
  });

  it('runs a tool round and feeds only the new results back', async () => {
    const { loop, connection, thread } = setup([
      toolCalls(['call-1', 'search', { index: 'galleries' }]),
      finalAnswer('Found 3 galleries.'),
    ]);
    connection.on('search', async () => textResult('3 hits'));

    const events = await collect(loop, 'Find galleries');

    expect(events.map((event) => (event.type === 'phase' ? event.phase : event.type))).toEqual([
      'awaiting_model',
      'model_wants_tool',
      'awaiting_tool_result',
      'tool_call',
      'tool_result',
      'awaiting_model',
      'model_final',
      'done',
      'done',
    ]);
    expect(connection.calls).toEqual([{ name: 'search', args: { index: 'galleries' } }]);
    expect(thread.sent[1]).toEqual([
      expect.objectContaining({
        role: 'tool',
        callId: 'call-1',
        toolName: 'search',
        result: { success: true, payload: textResult('3 hits') },
      }),
    ]);
    expect(loop.roundCount).toBe(1);
  });

  it('records tool failures as turns and carries on', async () => {
    const { loop, connection } = setup([toolCalls(['call-1', 'search']), finalAnswer('The index is missing.')]);
    connection.on('search', async () => textResult('index_not_found_exception', true));

    const result = await loop.execute('Search');

    expect(result.turns[1]).toMatchObject({
      role: 'tool',
      result: { success: false, kind: 'tool_error', message: 'index_not_found_exception' },
    });
    expect(result.outcome.status).toBe('completed');
  });

  it('stops at the round limit without dispatching the extra request', async () => {
    const { loop, connection, logger } = setup(
      [toolCalls(['call-1', 'search']), toolCalls(['call-2', 'get_shards'])],
      { maxToolRounds: 1 }
    );

    const result = await loop.execute('Keep searching');

    expect(result.outcome).toEqual({
      status: 'failed',
      failure: { kind: 'round_limit_exceeded', message: 'Model kept requesting tools after 1 round(s)' },
    });
    expect(result.rounds).toBe(1);
    expect(connection.calls.map((call) => call.name)).toEqual(['search']);
    expect(logger.messages('warn')).toContain('Tool round limit reached');
  });

  it('fails immediately when no rounds are allowed', async () => {
    const { loop, connection } = setup([toolCalls(['call-1', 'search'])], { maxToolRounds: 0 });

    const result = await loop.execute('Search');

    expect(result.outcome.status).toBe('failed');
    expect(result.turns.map((turn) => turn.role)).toEqual(['user']);
    expect(connection.calls).toEqual([]);
  });

  it('answers a tool outside the registry with a policy failure', async () => {
    const { loop, connection, logger } = setup([toolCalls(['call-1', 'esql', { query: 'FROM x' }]), finalAnswer('ok')]);

    const result = await loop.execute('Run ES|QL');

    expect(result.turns[1]).toMatchObject({
      role: 'tool',
      toolName: 'esql',
      result: { success: false, kind: 'policy_error', message: "Tool 'esql' is not available in this session" },
    });
    expect(connection.calls).toEqual([]);
    const entry = logger.entries.find((item) => item.level === 'error');
    expect(entry?.message).toBe('Model requested a tool outside the filtered registry');
    expect(entry?.context).toEqual({ toolName: 'esql', reason: 'policy' });
  });

  it.each([
    [true, 2],
    [false, 1],
  ])('dispatches a round with parallelToolCalls=%s at concurrency %i', async (parallelToolCalls, expected) => {
    const { loop, connection } = setup(
      [toolCalls(['call-1', 'search'], ['call-2', 'list_indices']), finalAnswer('done')],
      { parallelToolCalls }
    );
    let active = 0;
    let peak = 0;
    const slow = async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(10);
      active--;
      return textResult('ok');
    };
    connection.on('search', slow).on('list_indices', slow);

    const result = await loop.execute('Both');

    expect(peak).toBe(expected);
    expect(result.turns.slice(1, 3).map((turn) => (turn.role === 'tool' ? turn.callId : ''))).toEqual([
      'call-1',
      'call-2',
    ]);
  });

  it('propagates model failures', async () => {
    const failure = new ModelBackendError('Run run-1 failed: quota exceeded');
    const { loop, logger } = setup([failure]);

    await expect(loop.execute('Hello')).rejects.toBe(failure);
    expect(logger.messages('error')).toEqual(['Conversation aborted']);
    expect(loop.phase).toBe('done');
  });

  it('bounds the wait for the model', async () => {
    const { loop } = setup([() => new Promise<never>(() => {})], { modelTimeoutMs: 20 });

    await expect(loop.execute('Hello')).rejects.toThrow(new TimeoutError('Model response', 20));
  });

  it('rejects a tool request that names no tools', async () => {
    const { loop } = setup([{ type: 'tool_calls', calls: [] }]);

    await expect(loop.execute('Hello')).rejects.toBeInstanceOf(ProtocolError);
  });

  it('stops when cancelled while waiting for the model', async () => {
    const controller = new AbortController();
    const { loop, logger } = setup([
      () => {
        controller.abort();
        return new Promise<never>(() => {});
      },
    ]);

    await expect(collect(loop, 'Hello', controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(logger.messages('info')).toContain('Conversation cancelled');
  });

  it('stops when cancelled while a tool call is running', async () => {
    const controller = new AbortController();
    const { loop, logger, connection, thread } = setup([toolCalls(['call-1', 'search']), finalAnswer('unused')]);
    connection.on('search', () => {
      controller.abort();
      return new Promise<never>(() => {});
    });

    await expect(collect(loop, 'Hello', controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(logger.messages('info')).toContain('Conversation cancelled');
    expect(thread.sent).toHaveLength(1);
    expect(loop.turns().map((turn) => turn.role)).toEqual(['user']);
    expect(loop.phase).toBe('done');
  });

  it('runs a single conversation', async () => {
    const { loop } = setup([finalAnswer('one')]);
    await loop.execute('first');

    await expect(loop.execute('second')).rejects.toThrow('A conversation loop runs exactly one conversation');
  });
});
