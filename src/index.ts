/**
 * es-mcp-agent - an Azure AI Foundry chat agent backed by an Elasticsearch
 * MCP tool server
 */

export * from './errors/index.js';
export * from './logging/index.js';
export * from './mcp/index.js';
export * from './tools/index.js';
export * from './agent/index.js';
export * from './session/index.js';
export * from './config/index.js';
export { Workspace } from './storage/workspace.js';
export { withTimeout, type TimeoutOptions } from './utils/timeout.js';
