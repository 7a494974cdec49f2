import { describe, it, expect, vi } from 'vitest';
import { ToolInvoker, extractText } from './tool-invoker.js';
import { ToolRegistrySnapshot } from './tool-registry.js';
import { CancelledError, ConnectionError, PolicyError, ProtocolError, TimeoutError } from '../errors/errors.js';
import {
  FailingLogger,
  FakeToolServerConnection,
  MemoryLogger,
  descriptor,
  textResult,
} from '../../test/support/fakes.js';

function setup(names: string[] = ['search', 'get_shards']) {
  const tools = names.map((name) => descriptor(name));
  const connection = new FakeToolServerConnection([...tools, descriptor('esql')]);
  const logger = new MemoryLogger();
  const invoker = new ToolInvoker(connection, new ToolRegistrySnapshot(tools), logger);
  return { connection, logger, invoker };
}

describe('ToolInvoker', () => {
  it('returns the payload of a successful call', async () => {
    const { connection, invoker } = setup();
    connection.on('search', async () => textResult('3 hits'));

    const result = await invoker.invoke({ toolName: 'search', arguments: { index: 'galleries' } }, { timeoutMs: 1000 });

    expect(result).toEqual({ success: true, payload: textResult('3 hits') });
    expect(connection.calls).toEqual([{ name: 'search', args: { index: 'galleries' } }]);
  });

  it('refuses a tool outside the registry without calling the server', async () => {
    const { connection, invoker } = setup();

    await expect(invoker.invoke({ toolName: 'esql', arguments: {} }, { timeoutMs: 1000 })).rejects.toBeInstanceOf(
      PolicyError
    );
    expect(connection.calls).toEqual([]);
  });

  it('turns a timeout into a failure', async () => {
    const { connection, invoker, logger } = setup();
    connection.on('search', () => new Promise<never>(() => {}));

    const result = await invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 20 });

    expect(result).toEqual({ success: false, kind: 'timeout', message: "Tool 'search' timed out after 20ms" });
    expect(logger.messages('warn')).toEqual(['Tool call failed']);
  });

  it('keeps the kind of classified connection errors', async () => {
    const { connection, invoker } = setup();
    connection.on('search', async () => {
      throw new ConnectionError('Tool search failed: ECONNRESET');
    });

    const result = await invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 1000 });

    expect(result).toEqual({ success: false, kind: 'connection_error', message: 'Tool search failed: ECONNRESET' });
  });

  it('keeps protocol and timeout kinds reported by the connection', async () => {
    const { connection, invoker } = setup();
    connection.on('search', async () => {
      throw new ProtocolError('rejected by tool server');
    });
    connection.on('get_shards', async () => {
      throw new TimeoutError('Tool get_shards', 5);
    });

    const search = await invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 1000 });
    const shards = await invoker.invoke({ toolName: 'get_shards', arguments: {} }, { timeoutMs: 1000 });

    expect(search.success ? undefined : search.kind).toBe('protocol_error');
    expect(shards.success ? undefined : shards.kind).toBe('timeout');
  });

  it('treats unclassified errors as connection errors', async () => {
    const { connection, invoker } = setup();
    connection.on('search', async () => {
      throw new Error('socket hang up');
    });

    const result = await invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 1000 });

    expect(result).toEqual({ success: false, kind: 'connection_error', message: 'socket hang up' });
  });

  it('reports a tool-side error as tool_error with its text', async () => {
    const { connection, invoker } = setup();
    connection.on('search', async () => textResult('index_not_found_exception', true));

    const result = await invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 1000 });

    expect(result).toEqual({ success: false, kind: 'tool_error', message: 'index_not_found_exception' });
  });

  it('reports a malformed result as protocol_error', async () => {
    const { connection, invoker } = setup();
    connection.on('search', async () => ({ content: 'not a list' }));

    const result = await invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 1000 });

    expect(result).toEqual({
      success: false,
      kind: 'protocol_error',
      message: "Tool 'search' returned a malformed result",
    });
  });

  it('rethrows cancellation instead of reporting a failure', async () => {
    const { connection, invoker } = setup();
    const controller = new AbortController();
    connection.on('search', () => new Promise<never>(() => {}));

    const pending = invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 1000, signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('hands the call a signal that fires on timeout', async () => {
    const { connection, invoker } = setup();
    let seen: AbortSignal | undefined;
    connection.on('search', (_args, options) => {
      seen = options.signal;
      return new Promise<never>(() => {});
    });

    await invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 20 });

    expect(seen?.aborted).toBe(true);
  });

  it('returns results even when the log cannot be written', async () => {
    const tools = [descriptor('search')];
    const connection = new FakeToolServerConnection(tools);
    connection.on('search', async () => textResult('3 hits'));
    connection.on('get_shards', async () => textResult('shard missing', true));
    const invoker = new ToolInvoker(
      connection,
      new ToolRegistrySnapshot([...tools, descriptor('get_shards')]),
      new FailingLogger(new Error('ENOSPC: no space left on device'))
    );
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    try {
      const success = await invoker.invoke({ toolName: 'search', arguments: {} }, { timeoutMs: 1000 });
      const failure = await invoker.invoke({ toolName: 'get_shards', arguments: {} }, { timeoutMs: 1000 });

      expect(success).toEqual({ success: true, payload: textResult('3 hits') });
      expect(failure).toEqual({ success: false, kind: 'tool_error', message: 'shard missing' });
      expect(connection.calls).toHaveLength(2);
    } finally {
      stderr.mockRestore();
    }
  });
});

describe('extractText', () => {
  it('joins text parts and skips other content', () => {
    const payload = {
      content: [
        { type: 'text', text: 'first' },
        { type: 'image', data: 'xyz', mimeType: 'image/png' },
        { type: 'text', text: 'second' },
      ],
    };

    expect(extractText(payload)).toBe('first\nsecond');
  });

  it('returns an empty string for payloads without content', () => {
    expect(extractText({})).toBe('');
    expect(extractText('plain')).toBe('');
  });
});
