/**
 * Search command - a query_string search without the model
 */

import { Command, InvalidArgumentError } from 'commander';
import { callElasticsearch } from './tools.js';

interface SearchCommandOptions {
  index?: string;
  size: number;
}

function parseSize(value: string): number {
  const size = Number.parseInt(value, 10);
  if (!Number.isInteger(size) || size < 1) {
    throw new InvalidArgumentError(`Expected a positive size, got '${value}'`);
  }
  return size;
}

export function searchCommand(): Command {
  const cmd = new Command('search');

  cmd
    .description('Search Elasticsearch directly through the tool server')
    .argument('<query...>', 'query_string query')
    .option('-i, --index <name>', 'Index to search (defaults to elasticsearch.defaultIndex)')
    .option('-n, --size <count>', 'Number of hits', parseSize, 10)
    .action(async (words: string[], options: SearchCommandOptions) => {
      const query = words.join(' ');
      await callElasticsearch((tools, callOptions) =>
        tools.search(query, { ...callOptions, index: options.index, size: options.size })
      );
    });

  return cmd;
}
