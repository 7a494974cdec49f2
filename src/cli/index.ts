#!/usr/bin/env node
/**
 * es-mcp-agent CLI - an Azure AI Foundry agent answering questions with the
 * tools of an Elasticsearch MCP server
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';
import { toolsCommand } from './commands/tools.js';
import { searchCommand } from './commands/search.js';
import { transcriptsCommand } from './commands/transcripts.js';
import { configCommand } from './commands/config.js';
import { logsCommand } from './commands/logs.js';

function readVersion(): string {
  const packagePath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
  try {
    const pkg = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(packagePath, 'utf-8')));
    return pkg.success ? pkg.data.version : '0.1.0';
  } catch {
    return '0.1.0';
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('es-mcp-agent')
    .description('Ask an Azure AI Foundry agent questions answered from Elasticsearch through MCP')
    .version(readVersion(), '-v, --version', 'Display version number');

  program.addCommand(askCommand());
  program.addCommand(chatCommand());
  program.addCommand(toolsCommand());
  program.addCommand(searchCommand());
  program.addCommand(transcriptsCommand());
  program.addCommand(configCommand());
  program.addCommand(logsCommand());

  return program;
}

await createProgram().parseAsync(process.argv);
