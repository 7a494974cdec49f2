import { z } from 'zod';
import { ProtocolError } from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import type { CallOptions, ToolServerConnection } from '../mcp/connection.js';
import { withTimeout } from '../utils/timeout.js';

/**
 * JSON schema property as advertised by a tool server
 */
export interface JSONSchemaProperty {
  type?: string | string[];
  description?: string;
  [key: string]: unknown;
}

/**
 * Input schema of a tool; always an object schema
 */
export interface ToolInputSchema {
  type: 'object';
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
  [key: string]: unknown;
}

/**
 * One callable tool exposed by the tool server
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
}

const propertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
  })
  .passthrough();

const inputSchemaSchema = z
  .object({
    type: z.literal('object'),
    properties: z.record(propertySchema).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

const toolSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    inputSchema: inputSchemaSchema,
  })
  .passthrough();

const listToolsResultSchema = z
  .object({
    tools: z.array(toolSchema),
  })
  .passthrough();

/**
 * Parses a raw tools/list result into frozen descriptors.
 * Throws ProtocolError when the shape is wrong or a name repeats.
 */
export function parseToolListing(raw: unknown): ToolDescriptor[] {
  const result = listToolsResultSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ProtocolError(`Malformed tool listing: ${issues.join('; ')}`, { details: issues });
  }

  const seen = new Set<string>();
  return result.data.tools.map((tool) => {
    if (seen.has(tool.name)) {
      throw new ProtocolError(`Tool listing names '${tool.name}' more than once`);
    }
    seen.add(tool.name);

    return Object.freeze({
      name: tool.name,
      description: tool.description ?? '',
      inputSchema: Object.freeze({ ...tool.inputSchema }),
    });
  });
}

/**
 * ToolRegistryClient - discovers the tools a tool server exposes.
 *
 * One round trip per call, no caching and no retries: the session decides
 * when to fetch and whether a failure is worth another attempt.
 */
export class ToolRegistryClient {
  private connection: ToolServerConnection;
  private logger: Logger;

  constructor(connection: ToolServerConnection, logger: Logger) {
    this.connection = connection;
    this.logger = logger;
  }

  async listTools(options: CallOptions): Promise<ToolDescriptor[]> {
    const raw = await withTimeout(
      (signal) => this.connection.listTools({ timeoutMs: options.timeoutMs, signal }),
      { timeoutMs: options.timeoutMs, signal: options.signal, operation: 'tools/list' }
    );

    const tools = parseToolListing(raw);
    await this.logger.debug('Fetched tool registry', {
      operation: 'tools/list',
      tools: tools.map((tool) => tool.name),
    });
    return tools;
  }
}

/**
 * ToolRegistrySnapshot - the filtered, read-only view of the registry a
 * session presents to the model and validates calls against
 */
export class ToolRegistrySnapshot {
  readonly tools: readonly ToolDescriptor[];
  private byName: ReadonlyMap<string, ToolDescriptor>;

  constructor(tools: readonly ToolDescriptor[]) {
    this.tools = Object.freeze([...tools]);
    this.byName = new Map(this.tools.map((tool) => [tool.name, tool]));
  }

  get names(): string[] {
    return this.tools.map((tool) => tool.name);
  }

  get size(): number {
    return this.tools.length;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.byName.get(name);
  }
}
