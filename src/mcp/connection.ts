import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { TokenCredential } from '@azure/identity';
import {
  AgentError,
  CancelledError,
  ConnectionError,
  ProtocolError,
  TimeoutError,
  errorMessage,
} from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import { buildTunnelHeaders } from './tunnel-auth.js';

/**
 * Bounds and cancellation for one request to the tool server
 */
export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * The two logical operations the core needs from a tool server.
 *
 * Implementations reject with the AgentError taxonomy: ConnectionError,
 * ProtocolError, TimeoutError or CancelledError.
 */
export interface ToolServerConnection {
  listTools(options: CallOptions): Promise<unknown>;
  callTool(name: string, args: Record<string, unknown>, options: CallOptions): Promise<unknown>;
  close(): Promise<void>;
}

/**
 * Where and how to reach the tool server
 */
export interface ToolServerConfig {
  serverUrl: string;
  devtunnelAccessToken?: string;
  connectTimeoutMs: number;
}

export interface ConnectOptions {
  logger: Logger;
  signal?: AbortSignal;
  /** Used for tunnel tokens when no access token is configured */
  credential?: TokenCredential;
}

const CLIENT_INFO = {
  name: 'es-mcp-agent',
  version: '0.1.0',
};

/**
 * Maps whatever the MCP SDK or the transport threw onto the error taxonomy
 */
export function classifyToolServerError(error: unknown, operation: string): AgentError {
  if (error instanceof AgentError) {
    return error;
  }

  if (error instanceof McpError) {
    if (error.code === ErrorCode.RequestTimeout) {
      const timeout: unknown = error.data && typeof error.data === 'object' ? Reflect.get(error.data, 'timeout') : undefined;
      return new TimeoutError(operation, typeof timeout === 'number' ? timeout : 0);
    }
    if (error.code === ErrorCode.ConnectionClosed) {
      return new ConnectionError(`${operation} failed: ${error.message}`, { cause: error });
    }
    return new ProtocolError(`${operation} rejected by tool server: ${error.message}`, {
      cause: error,
      details: { code: error.code },
    });
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return new CancelledError(operation);
  }

  if (error instanceof Error && error.name === 'ZodError') {
    return new ProtocolError(`${operation} returned an unexpected payload: ${error.message}`, { cause: error });
  }

  return new ConnectionError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
}

/**
 * McpToolServerConnection - ToolServerConnection over the MCP SDK client.
 *
 * Works with any SDK transport: streamable HTTP in production, the
 * in-memory pair in tests.
 */
export class McpToolServerConnection implements ToolServerConnection {
  private client: Client;
  private logger: Logger;
  private closed = false;

  private constructor(client: Client, logger: Logger) {
    this.client = client;
    this.logger = logger;
  }

  /**
   * Performs the MCP initialize handshake over the given transport
   */
  static async open(
    transport: Transport,
    options: { timeoutMs: number; logger: Logger; signal?: AbortSignal }
  ): Promise<McpToolServerConnection> {
    const client = new Client(CLIENT_INFO);

    try {
      await client.connect(transport, { timeout: options.timeoutMs, signal: options.signal });
    } catch (error) {
      try {
        await client.close();
      } catch (closeError) {
        await options.logger.warn('Could not close client after failed handshake', {
          operation: 'initialize',
          error: errorMessage(closeError),
        });
      }
      throw classifyToolServerError(error, 'initialize');
    }

    const server = client.getServerVersion();
    await options.logger.info('Connected to tool server', {
      operation: 'initialize',
      server: server ? `${server.name} ${server.version}` : 'unknown',
    });

    return new McpToolServerConnection(client, options.logger);
  }

  async listTools(options: CallOptions): Promise<unknown> {
    try {
      return await this.client.listTools(undefined, { timeout: options.timeoutMs, signal: options.signal });
    } catch (error) {
      throw classifyToolServerError(error, 'tools/list');
    }
  }

  async callTool(name: string, args: Record<string, unknown>, options: CallOptions): Promise<unknown> {
    try {
      return await this.client.callTool({ name, arguments: args }, undefined, {
        timeout: options.timeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      throw classifyToolServerError(error, `tools/call ${name}`);
    }
  }

  /**
   * Closes the client and its transport; later calls are no-ops
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.client.close();
    await this.logger.debug('Tool server connection closed', { operation: 'close' });
  }
}

/**
 * Opens a streamable HTTP connection to the configured tool server,
 * adding the tunnel header when the URL points at a dev tunnel
 */
export async function connectToolServer(
  config: ToolServerConfig,
  options: ConnectOptions
): Promise<McpToolServerConnection> {
  let url: URL;
  try {
    url = new URL(config.serverUrl);
  } catch (error) {
    throw new ConnectionError(`Invalid tool server URL: ${config.serverUrl}`, { cause: error });
  }

  const headers = await buildTunnelHeaders(url, {
    accessToken: config.devtunnelAccessToken,
    credential: options.credential,
    logger: options.logger,
  });

  const transport = new StreamableHTTPClientTransport(url, { requestInit: { headers } });

  return McpToolServerConnection.open(transport, {
    timeoutMs: config.connectTimeoutMs,
    logger: options.logger,
    signal: options.signal,
  });
}
