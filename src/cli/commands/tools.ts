/**
 * Tools command - inspect the tool server without the model
 */

import { Command } from 'commander';
import { ElasticsearchTools } from '../../tools/elasticsearch-tools.js';
import type { ToolCallResult } from '../../tools/tool-invoker.js';
import { abortOnInterrupt, describeError, exitWithError, loadCliContext, withToolAccess } from '../utils/context.js';
import { formatToolResult } from '../utils/output.js';

interface ListOptions {
  json?: boolean;
}

export function toolsCommand(): Command {
  const cmd = new Command('tools');

  cmd.description('List the tool server tools and call the Elasticsearch ones directly');

  cmd
    .command('list', { isDefault: true })
    .description('List the tools offered to the model and the ones excluded')
    .option('--json', 'Print the filtered descriptors as JSON')
    .action(async (options: ListOptions) => {
      await listTools(options);
    });

  cmd
    .command('indices [pattern]')
    .description('List indices matching a pattern (default *)')
    .action(async (pattern: string | undefined) => {
      await callElasticsearch((tools, options) => tools.listIndices(pattern ?? '*', options));
    });

  cmd
    .command('mappings [index]')
    .description('Show the field mappings of an index')
    .action(async (index: string | undefined) => {
      await callElasticsearch((tools, options) => tools.getMappings(index, options));
    });

  cmd
    .command('shards [index]')
    .description('Show shard information')
    .action(async (index: string | undefined) => {
      await callElasticsearch((tools, options) => tools.getShards(index, options));
    });

  return cmd;
}

async function listTools(options: ListOptions): Promise<void> {
  const context = await loadCliContext();

  try {
    await withToolAccess(context, async ({ registry, excluded }) => {
      if (options.json) {
        console.log(JSON.stringify(registry.tools, null, 2));
        return;
      }

      console.log(`Tools offered to the model (${registry.size}):`);
      for (const tool of registry.tools) {
        console.log(`  ${tool.name.padEnd(16)} ${tool.description}`);
      }
      if (excluded.length > 0) {
        console.log(`\nExcluded by policy: ${excluded.join(', ')}`);
      }
    });
  } catch (error) {
    exitWithError(describeError(error));
  }
}

/**
 * Runs one direct Elasticsearch tool call and prints its text
 */
export async function callElasticsearch(
  call: (tools: ElasticsearchTools, options: { timeoutMs: number; signal: AbortSignal }) => Promise<ToolCallResult>
): Promise<void> {
  const context = await loadCliContext();
  const interrupt = abortOnInterrupt();

  try {
    const result = await withToolAccess(
      context,
      ({ invoker }) => {
        const tools = new ElasticsearchTools(invoker, context.config.elasticsearch.defaultIndex);
        return call(tools, { timeoutMs: context.config.conversation.toolTimeoutMs, signal: interrupt.signal });
      },
      interrupt.signal
    );

    if (!result.success) {
      exitWithError(formatToolResult(result));
    }
    console.log(formatToolResult(result));
  } catch (error) {
    exitWithError(describeError(error));
  } finally {
    interrupt.dispose();
  }
}
