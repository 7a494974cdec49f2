/**
 * Config - file and environment configuration
 */

export {
  ConfigManager,
  AgentConfigSchema,
  DEFAULT_CONFIG,
  DEFAULT_AGENT_INSTRUCTIONS,
  ENV_MAPPINGS,
  expandHome,
  readEnvironmentOverrides,
  requireFoundryConfig,
  toLoggerConfig,
  toSessionConfig,
  type AgentConfig,
  type PartialAgentConfig,
  type ConfigValidationResult,
} from './config-manager.js';
