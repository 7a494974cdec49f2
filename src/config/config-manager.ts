import { z } from 'zod';
import { readFile, writeFile, rename, mkdir, unlink } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { FoundryConfig } from '../agent/foundry-backend.js';
import { errorMessage } from '../errors/errors.js';
import type { LoggerConfig } from '../logging/logger.js';
import { createSessionConfig, type SessionConfig } from '../session/session.js';
import { DEFAULT_EXCLUDED_TOOLS, createToolFilterPolicy } from '../tools/tool-filter.js';

export const DEFAULT_AGENT_INSTRUCTIONS =
  'You are a helpful agent that can search and analyze data using Elasticsearch. ' +
  'You have access to an MCP server that provides Elasticsearch search capabilities. ' +
  'Use the search tools to help users find and analyze data effectively.';

const positiveMs = (fallback: number) => z.number().int().min(1).max(3_600_000).default(fallback);

/**
 * Configuration schema; every section has defaults except the Foundry
 * endpoint and deployment, which only the model-backed commands need
 */
export const AgentConfigSchema = z
  .object({
    foundry: z
      .object({
        projectEndpoint: z
          .string()
          .refine((value) => value.startsWith('https://'), { message: "must start with 'https://'" })
          .refine((value) => value.includes('services.ai.azure.com'), {
            message: "must contain 'services.ai.azure.com'",
          })
          .optional(),
        modelDeploymentName: z.string().min(1).optional(),
        agentName: z.string().min(1).default('elasticsearch-mcp-agent'),
        agentInstructions: z.string().min(1).default(DEFAULT_AGENT_INSTRUCTIONS),
        pollIntervalMs: z.number().int().min(100).max(60_000).default(1000),
      })
      .strict()
      .default({}),

    mcp: z
      .object({
        serverUrl: z.string().url().default('http://localhost:8080/mcp'),
        devtunnelAccessToken: z.string().min(1).optional(),
        connectTimeoutMs: positiveMs(30_000),
        registryTimeoutMs: positiveMs(30_000),
      })
      .strict()
      .default({}),

    tools: z
      .object({
        exclude: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_TOOLS]),
        include: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .default({}),

    conversation: z
      .object({
        maxToolRounds: z.number().int().min(1).max(50).default(5),
        modelTimeoutMs: positiveMs(120_000),
        toolTimeoutMs: positiveMs(30_000),
        parallelToolCalls: z.boolean().default(true),
      })
      .strict()
      .default({}),

    elasticsearch: z
      .object({
        defaultIndex: z.string().min(1).default('default'),
      })
      .strict()
      .default({}),

    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        path: z.string().min(1).default('~/.es-mcp-agent/logs/agent.log'),
        maxSize: z.number().int().min(1024).default(10 * 1024 * 1024),
        maxFiles: z.number().int().min(1).max(100).default(5),
      })
      .strict()
      .default({}),

    transcripts: z
      .object({
        enabled: z.boolean().default(true),
      })
      .strict()
      .default({}),
  })
  .strict();

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

export type PartialAgentConfig = z.input<typeof AgentConfigSchema>;

export const DEFAULT_CONFIG: AgentConfig = AgentConfigSchema.parse({});

type EnvValueKind = 'string' | 'integer' | 'boolean' | 'list';

interface EnvMapping {
  path: [string, string];
  kind: EnvValueKind;
}

/**
 * Environment variables and the config paths they override
 */
export const ENV_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  PROJECT_ENDPOINT: { path: ['foundry', 'projectEndpoint'], kind: 'string' },
  MODEL_DEPLOYMENT_NAME: { path: ['foundry', 'modelDeploymentName'], kind: 'string' },
  AGENT_NAME: { path: ['foundry', 'agentName'], kind: 'string' },
  AGENT_INSTRUCTIONS: { path: ['foundry', 'agentInstructions'], kind: 'string' },
  ES_AGENT_POLL_INTERVAL_MS: { path: ['foundry', 'pollIntervalMs'], kind: 'integer' },
  MCP_SERVER_URL: { path: ['mcp', 'serverUrl'], kind: 'string' },
  DEVTUNNEL_ACCESS_TOKEN: { path: ['mcp', 'devtunnelAccessToken'], kind: 'string' },
  ES_AGENT_CONNECT_TIMEOUT_MS: { path: ['mcp', 'connectTimeoutMs'], kind: 'integer' },
  ES_AGENT_REGISTRY_TIMEOUT_MS: { path: ['mcp', 'registryTimeoutMs'], kind: 'integer' },
  ES_AGENT_EXCLUDED_TOOLS: { path: ['tools', 'exclude'], kind: 'list' },
  ES_AGENT_INCLUDED_TOOLS: { path: ['tools', 'include'], kind: 'list' },
  ES_AGENT_MAX_TOOL_ROUNDS: { path: ['conversation', 'maxToolRounds'], kind: 'integer' },
  ES_AGENT_MODEL_TIMEOUT_MS: { path: ['conversation', 'modelTimeoutMs'], kind: 'integer' },
  ES_AGENT_TOOL_TIMEOUT_MS: { path: ['conversation', 'toolTimeoutMs'], kind: 'integer' },
  ES_AGENT_PARALLEL_TOOL_CALLS: { path: ['conversation', 'parallelToolCalls'], kind: 'boolean' },
  ELASTICSEARCH_INDEX: { path: ['elasticsearch', 'defaultIndex'], kind: 'string' },
  ES_AGENT_LOG_LEVEL: { path: ['logging', 'level'], kind: 'string' },
  ES_AGENT_LOG_PATH: { path: ['logging', 'path'], kind: 'string' },
  ES_AGENT_LOG_MAX_SIZE: { path: ['logging', 'maxSize'], kind: 'integer' },
  ES_AGENT_LOG_MAX_FILES: { path: ['logging', 'maxFiles'], kind: 'integer' },
  ES_AGENT_TRANSCRIPTS: { path: ['transcripts', 'enabled'], kind: 'boolean' },
};

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

export interface ConfigValidationResult {
  success: boolean;
  config?: AgentConfig;
  errors?: string[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Replaces a leading `~` with the home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function parseEnvValue(name: string, raw: string, kind: EnvValueKind): { value: unknown } | { error: string } {
  switch (kind) {
    case 'string':
      return { value: raw };
    case 'integer':
      if (!/^-?\d+$/.test(raw.trim())) {
        return { error: `Environment variable ${name} must be an integer, got '${raw}'` };
      }
      return { value: Number.parseInt(raw, 10) };
    case 'boolean': {
      const normalized = raw.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return { value: true };
      if (FALSE_VALUES.has(normalized)) return { value: false };
      return { error: `Environment variable ${name} must be true or false, got '${raw}'` };
    }
    case 'list':
      return {
        value: raw
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0),
      };
  }
}

function setNestedValue(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  let current = target;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Later values override earlier ones; nested objects merge key by key
 */
function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const existing = result[key];
    result[key] = isRecord(value) && isRecord(existing) ? deepMerge(existing, value) : value;
  }
  return result;
}

/**
 * Reads the overrides the given environment carries
 */
export function readEnvironmentOverrides(env: NodeJS.ProcessEnv): {
  overrides: Record<string, unknown>;
  errors: string[];
} {
  const overrides: Record<string, unknown> = {};
  const errors: string[] = [];

  for (const [name, mapping] of Object.entries(ENV_MAPPINGS)) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;

    const parsed = parseEnvValue(name, raw, mapping.kind);
    if ('error' in parsed) {
      errors.push(parsed.error);
    } else {
      setNestedValue(overrides, mapping.path, parsed.value);
    }
  }

  return { overrides, errors };
}

/**
 * ConfigManager - loads, validates and persists configuration.
 *
 * Precedence: defaults, then the JSON file, then the environment. Only the
 * file layer is ever written back, so values that came from the environment
 * stay out of config.json.
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: AgentConfig;
  private fileLayer: Record<string, unknown> = {};
  private envLayer: Record<string, unknown> = {};

  constructor(configPath: string) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
  }

  get config(): AgentConfig {
    return this.currentConfig;
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Loads the file and applies `env` over it
   */
  async load(env: NodeJS.ProcessEnv = process.env): Promise<ConfigValidationResult> {
    let fileConfig: Record<string, unknown> = {};

    try {
      const parsed: unknown = JSON.parse(await readFile(this.configPath, 'utf-8'));
      if (!isRecord(parsed)) {
        return { success: false, errors: [`Configuration file ${this.configPath} must hold a JSON object`] };
      }
      fileConfig = parsed;
    } catch (error) {
      if (!isMissingFile(error)) {
        return { success: false, errors: [`Failed to read config file: ${errorMessage(error)}`] };
      }
    }

    const { overrides, errors } = readEnvironmentOverrides(env);
    if (errors.length > 0) {
      return { success: false, errors };
    }

    this.fileLayer = fileConfig;
    this.envLayer = overrides;
    return this.validate(deepMerge(fileConfig, overrides));
  }

  /**
   * Validates a candidate configuration; on success it becomes current
   */
  validate(candidate: unknown): ConfigValidationResult {
    const result = AgentConfigSchema.safeParse(candidate);

    if (result.success) {
      this.currentConfig = result.data;
      return { success: true, config: result.data };
    }

    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path.length > 0
        ? `Configuration error at '${path}': ${issue.message}`
        : `Configuration error: ${issue.message}`;
    });
    return { success: false, errors };
  }

  /**
   * Writes the file layer atomically with owner-only permissions
   */
  async save(): Promise<void> {
    const validation = AgentConfigSchema.safeParse(this.fileLayer);
    if (!validation.success) {
      throw new Error(`Invalid configuration: ${validation.error.issues.map((issue) => issue.message).join(', ')}`);
    }

    await mkdir(dirname(this.configPath), { recursive: true, mode: 0o700 });
    await this.atomicWrite(this.configPath, JSON.stringify(this.fileLayer, null, 2) + '\n');
  }

  /**
   * Writes through a temp file and a rename
   */
  async atomicWrite(filePath: string, content: string): Promise<void> {
    const tempPath = join(dirname(filePath), `.config-${randomUUID()}.tmp`);

    try {
      await writeFile(tempPath, content, { mode: 0o600 });
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        if (!isMissingFile(cleanupError)) throw cleanupError;
      });
      throw error;
    }
  }

  /**
   * Value at a dotted path of the current configuration
   */
  get(path: string): unknown {
    let current: unknown = this.currentConfig;
    for (const part of path.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[part];
    }
    return current;
  }

  /**
   * Sets a dotted path in the file layer; nothing changes unless the result validates
   */
  set(path: string, value: unknown): ConfigValidationResult {
    const parts = path.split('.');
    if (parts.some((part) => part.length === 0)) {
      return { success: false, errors: [`Invalid configuration key '${path}'`] };
    }

    const nextFileLayer = structuredClone(this.fileLayer);
    setNestedValue(nextFileLayer, parts, value);

    const result = this.validate(deepMerge(nextFileLayer, this.envLayer));
    if (result.success) {
      this.fileLayer = nextFileLayer;
    }
    return result;
  }
}

/**
 * The immutable per-session view of a validated configuration
 */
export function toSessionConfig(config: AgentConfig): SessionConfig {
  return createSessionConfig({
    toolServer: {
      serverUrl: config.mcp.serverUrl,
      devtunnelAccessToken: config.mcp.devtunnelAccessToken,
      connectTimeoutMs: config.mcp.connectTimeoutMs,
    },
    toolFilter: createToolFilterPolicy({ exclude: config.tools.exclude, include: config.tools.include }),
    conversation: config.conversation,
    registryTimeoutMs: config.mcp.registryTimeoutMs,
  });
}

/**
 * The Foundry settings, or an error naming each missing variable
 */
export function requireFoundryConfig(config: AgentConfig): FoundryConfig {
  const { projectEndpoint, modelDeploymentName, agentName, agentInstructions, pollIntervalMs } = config.foundry;
  const missing: string[] = [];
  if (!projectEndpoint) missing.push('PROJECT_ENDPOINT (foundry.projectEndpoint)');
  if (!modelDeploymentName) missing.push('MODEL_DEPLOYMENT_NAME (foundry.modelDeploymentName)');

  if (!projectEndpoint || !modelDeploymentName) {
    throw new Error(`Azure AI Foundry is not configured; set ${missing.join(' and ')}`);
  }
  return { projectEndpoint, modelDeploymentName, agentName, agentInstructions, pollIntervalMs };
}

/**
 * Logger settings with `~` expanded
 */
export function toLoggerConfig(config: AgentConfig): LoggerConfig {
  return { ...config.logging, path: expandHome(config.logging.path) };
}
