import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';
import { ConfigManager, toLoggerConfig, type AgentConfig } from '../../config/config-manager.js';
import { Logger } from '../../logging/logger.js';
import {
  connectToolServer,
  type ConnectOptions,
  type ToolServerConfig,
  type ToolServerConnection,
} from '../../mcp/connection.js';
import { TranscriptStore } from '../../session/transcript-store.js';
import type { SessionDependencies } from '../../session/session.js';
import type { ModelBackend } from '../../agent/model-backend.js';
import { Workspace } from '../../storage/workspace.js';
import { excludedToolNames, filterTools, createToolFilterPolicy } from '../../tools/tool-filter.js';
import { ToolInvoker } from '../../tools/tool-invoker.js';
import { ToolRegistryClient, ToolRegistrySnapshot } from '../../tools/tool-registry.js';
import { errorMessage, isAgentError } from '../../errors/errors.js';

/**
 * What every command starts from
 */
export interface CliContext {
  workspace: Workspace;
  configManager: ConfigManager;
  config: AgentConfig;
  logger: Logger;
  /** Azure credential for Foundry and for dev tunnel tokens */
  credential: TokenCredential;
}

/**
 * Prints a message to stderr and exits with status 1
 */
export function exitWithError(message: string, details: readonly string[] = []): never {
  console.error(`Error: ${message}`);
  for (const detail of details) {
    console.error(`  - ${detail}`);
  }
  process.exit(1);
}

/**
 * One line describing a failure, with the error code for taxonomy errors
 */
export function describeError(error: unknown): string {
  if (error instanceof AggregateError) {
    return `${error.message}: ${error.errors.map(errorMessage).join('; ')}`;
  }
  if (isAgentError(error)) {
    return `[${error.code}] ${error.message}`;
  }
  return errorMessage(error);
}

/**
 * Loads the workspace and configuration, exiting on invalid configuration
 */
export async function loadCliContext(): Promise<CliContext> {
  const workspace = new Workspace();
  const configManager = new ConfigManager(workspace.configPath);

  const result = await configManager.load(process.env);
  if (!result.success || !result.config) {
    exitWithError('Invalid configuration', result.errors);
  }

  return {
    workspace,
    configManager,
    config: result.config,
    logger: new Logger(toLoggerConfig(result.config)),
    credential: new DefaultAzureCredential(),
  };
}

export function createSessionDependencies(context: CliContext, modelBackend: ModelBackend): SessionDependencies {
  const { config, logger, workspace, credential } = context;
  return {
    connect: (toolServer, options) => connectToolServer(toolServer, { logger, credential, signal: options.signal }),
    modelBackend,
    logger,
    transcripts: config.transcripts.enabled ? new TranscriptStore(workspace, logger) : undefined,
  };
}

/**
 * The filtered registry and an invoker bound to it, without a model
 */
export interface ToolAccess {
  connection: ToolServerConnection;
  registry: ToolRegistrySnapshot;
  excluded: string[];
  invoker: ToolInvoker;
}

export type ToolServerConnector = (config: ToolServerConfig, options: ConnectOptions) => Promise<ToolServerConnection>;

/**
 * Connects to the tool server, runs `body` against the filtered registry and
 * closes the connection afterwards. A close failure after `body` threw is
 * logged, and the original error is the one rethrown.
 */
export async function withToolAccess<T>(
  context: CliContext,
  body: (access: ToolAccess) => Promise<T>,
  signal?: AbortSignal,
  connect: ToolServerConnector = connectToolServer
): Promise<T> {
  const { config, logger, credential } = context;
  const connection = await connect(
    {
      serverUrl: config.mcp.serverUrl,
      devtunnelAccessToken: config.mcp.devtunnelAccessToken,
      connectTimeoutMs: config.mcp.connectTimeoutMs,
    },
    { logger, credential, signal }
  );

  let result: T;
  try {
    const discovered = await new ToolRegistryClient(connection, logger).listTools({
      timeoutMs: config.mcp.registryTimeoutMs,
      signal,
    });
    const policy = createToolFilterPolicy({ exclude: config.tools.exclude, include: config.tools.include });
    const registry = new ToolRegistrySnapshot(filterTools(discovered, policy));
    const excluded = excludedToolNames(discovered, policy);

    result = await body({ connection, registry, excluded, invoker: new ToolInvoker(connection, registry, logger) });
  } catch (error) {
    try {
      await connection.close();
    } catch (releaseError) {
      await logger.error('Closing the tool server connection failed after an error', releaseError);
    }
    throw error;
  }

  await connection.close();
  return result;
}

/**
 * An AbortController tripped by the first Ctrl+C
 */
export function abortOnInterrupt(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error('\nCancelling...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt);
    },
  };
}
