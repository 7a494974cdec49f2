import { describe, it, expect } from 'vitest';
import { ToolRegistryClient, ToolRegistrySnapshot, parseToolListing } from './tool-registry.js';
import { ConnectionError, ProtocolError, TimeoutError } from '../errors/errors.js';
import { FakeToolServerConnection, MemoryLogger, descriptor } from '../../test/support/fakes.js';

describe('parseToolListing', () => {
  it('reads name, description and input schema', () => {
    const tools = parseToolListing({
      tools: [
        {
          name: 'search',
          description: 'Run a query',
          inputSchema: {
            type: 'object',
            properties: { index: { type: 'string', description: 'Index name' } },
            required: ['index'],
          },
        },
      ],
    });

    expect(tools).toEqual([
      {
        name: 'search',
        description: 'Run a query',
        inputSchema: {
          type: 'object',
          properties: { index: { type: 'string', description: 'Index name' } },
          required: ['index'],
        },
      },
    ]);
  });

  it('defaults a missing description to empty', () => {
    const [tool] = parseToolListing({ tools: [{ name: 'get_shards', inputSchema: { type: 'object' } }] });

    expect(tool?.description).toBe('');
  });

  it('returns frozen descriptors', () => {
    const [tool] = parseToolListing({ tools: [descriptor('search')] });

    expect(Object.isFrozen(tool)).toBe(true);
    expect(Object.isFrozen(tool?.inputSchema)).toBe(true);
  });

  it('keeps extra listing fields out of the descriptor', () => {
    const [tool] = parseToolListing({
      tools: [{ ...descriptor('search'), annotations: { readOnlyHint: true } }],
      nextCursor: 'abc',
    });

    expect(Object.keys(tool ?? {})).toEqual(['name', 'description', 'inputSchema']);
  });

  it('rejects a listing without tools', () => {
    expect(() => parseToolListing({})).toThrow(ProtocolError);
    expect(() => parseToolListing({})).toThrow(/^Malformed tool listing: tools: /);
  });

  it('rejects a tool whose schema is not an object schema', () => {
    expect(() => parseToolListing({ tools: [{ name: 'search', inputSchema: { type: 'string' } }] })).toThrow(
      /tools\.0\.inputSchema\.type/
    );
  });

  it('rejects duplicate names', () => {
    expect(() => parseToolListing({ tools: [descriptor('search'), descriptor('search')] })).toThrow(
      "Tool listing names 'search' more than once"
    );
  });

  it('accepts an empty listing', () => {
    expect(parseToolListing({ tools: [] })).toEqual([]);
  });
});

describe('ToolRegistryClient', () => {
  it('fetches and parses the listing', async () => {
    const connection = new FakeToolServerConnection([descriptor('search'), descriptor('esql')]);
    const client = new ToolRegistryClient(connection, new MemoryLogger());

    const tools = await client.listTools({ timeoutMs: 1000 });

    expect(tools.map((tool) => tool.name)).toEqual(['search', 'esql']);
  });

  it('passes connection failures through', async () => {
    const connection = new FakeToolServerConnection();
    connection.listError = new ConnectionError('tools/list failed: ECONNREFUSED');

    await expect(new ToolRegistryClient(connection, new MemoryLogger()).listTools({ timeoutMs: 1000 })).rejects.toBe(
      connection.listError
    );
  });

  it('raises ProtocolError for a malformed listing', async () => {
    const connection = new FakeToolServerConnection();
    connection.listing = { tools: 'nope' };

    await expect(
      new ToolRegistryClient(connection, new MemoryLogger()).listTools({ timeoutMs: 1000 })
    ).rejects.toBeInstanceOf(ProtocolError);
  });

  it('times out a listing that never arrives', async () => {
    const connection = new FakeToolServerConnection();
    connection.listTools = () => new Promise<never>(() => {});

    await expect(
      new ToolRegistryClient(connection, new MemoryLogger()).listTools({ timeoutMs: 20 })
    ).rejects.toBeInstanceOf(TimeoutError);
  });
});

describe('ToolRegistrySnapshot', () => {
  it('answers membership and lookups', () => {
    const search = descriptor('search');
    const snapshot = new ToolRegistrySnapshot([search, descriptor('get_shards')]);

    expect(snapshot.size).toBe(2);
    expect(snapshot.names).toEqual(['search', 'get_shards']);
    expect(snapshot.has('search')).toBe(true);
    expect(snapshot.has('esql')).toBe(false);
    expect(snapshot.get('search')).toBe(search);
    expect(snapshot.get('esql')).toBeUndefined();
  });

  it('does not follow later changes to the source array', () => {
    const source = [descriptor('search')];
    const snapshot = new ToolRegistrySnapshot(source);

    source.push(descriptor('esql'));

    expect(snapshot.size).toBe(1);
    expect(Object.isFrozen(snapshot.tools)).toBe(true);
  });
});
