/**
 * Tools - registry discovery, filtering and invocation
 */

export {
  ToolRegistryClient,
  ToolRegistrySnapshot,
  parseToolListing,
  type ToolDescriptor,
  type ToolInputSchema,
  type JSONSchemaProperty,
} from './tool-registry.js';

export {
  createToolFilterPolicy,
  filterTools,
  isToolAllowed,
  excludedToolNames,
  DEFAULT_EXCLUDED_TOOLS,
  DEFAULT_TOOL_FILTER_POLICY,
  type ToolFilterPolicy,
} from './tool-filter.js';

export {
  ToolInvoker,
  toolFailure,
  extractText,
  type ToolCallRequest,
  type ToolCallResult,
  type ToolCallSuccess,
  type ToolCallFailure,
  type ToolFailureKind,
  type InvokeOptions,
} from './tool-invoker.js';

export {
  ElasticsearchTools,
  buildSearchArguments,
  ELASTICSEARCH_TOOL_NAMES,
  type SearchOptions,
} from './elasticsearch-tools.js';
