import type { InvokeOptions, ToolCallResult, ToolInvoker } from './tool-invoker.js';

/** Tool names served by the Elasticsearch MCP server */
export const ELASTICSEARCH_TOOL_NAMES = {
  search: 'search',
  listIndices: 'list_indices',
  getMappings: 'get_mappings',
  getShards: 'get_shards',
} as const;

export interface SearchOptions {
  index?: string;
  size?: number;
}

/**
 * Builds the `search` arguments for a free-text query_string search
 */
export function buildSearchArguments(query: string, index: string, size: number): Record<string, unknown> {
  return {
    index,
    queryBody: {
      query: {
        query_string: { query },
      },
      size,
    },
  };
}

/**
 * ElasticsearchTools - direct calls to the Elasticsearch MCP tools without
 * going through the model. Calls go through the session's invoker, so the
 * filter policy still applies.
 */
export class ElasticsearchTools {
  private invoker: ToolInvoker;
  private defaultIndex: string;

  constructor(invoker: ToolInvoker, defaultIndex: string) {
    this.invoker = invoker;
    this.defaultIndex = defaultIndex;
  }

  search(query: string, options: SearchOptions & InvokeOptions): Promise<ToolCallResult> {
    const index = options.index || this.defaultIndex || '_all';
    return this.invoker.invoke(
      {
        toolName: ELASTICSEARCH_TOOL_NAMES.search,
        arguments: buildSearchArguments(query, index, options.size ?? 10),
      },
      options
    );
  }

  listIndices(pattern: string, options: InvokeOptions): Promise<ToolCallResult> {
    return this.invoker.invoke(
      { toolName: ELASTICSEARCH_TOOL_NAMES.listIndices, arguments: { indexPattern: pattern || '*' } },
      options
    );
  }

  getMappings(index: string | undefined, options: InvokeOptions): Promise<ToolCallResult> {
    return this.invoker.invoke(
      { toolName: ELASTICSEARCH_TOOL_NAMES.getMappings, arguments: { index: index || this.defaultIndex || '_all' } },
      options
    );
  }

  getShards(index: string | undefined, options: InvokeOptions): Promise<ToolCallResult> {
    return this.invoker.invoke(
      { toolName: ELASTICSEARCH_TOOL_NAMES.getShards, arguments: index ? { index } : {} },
      options
    );
  }
}
