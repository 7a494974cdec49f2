/**
 * Ask command - one question answered by the Foundry agent using the
 * Elasticsearch tools
 */

import { Command, InvalidArgumentError } from 'commander';
import { FoundryModelBackend, type FoundryConfig } from '../../agent/foundry-backend.js';
import { requireFoundryConfig, toSessionConfig, type AgentConfig } from '../../config/config-manager.js';
import { CancelledError, errorMessage } from '../../errors/errors.js';
import { createSessionConfig, withSession, type SessionConfig } from '../../session/session.js';
import {
  abortOnInterrupt,
  createSessionDependencies,
  describeError,
  exitWithError,
  loadCliContext,
} from '../utils/context.js';
import { formatAnswer, formatEvent } from '../utils/output.js';

export interface ConversationOptions {
  maxRounds?: number;
  sequential?: boolean;
}

interface AskOptions extends ConversationOptions {
  quiet?: boolean;
  color: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Session settings from the configuration, with command-line overrides
 */
export function sessionConfigFor(config: AgentConfig, options: ConversationOptions): SessionConfig {
  const base = toSessionConfig(config);
  return createSessionConfig({
    toolServer: base.toolServer,
    toolFilter: base.toolFilter,
    registryTimeoutMs: base.registryTimeoutMs,
    conversation: {
      ...base.conversation,
      ...(options.maxRounds !== undefined ? { maxToolRounds: options.maxRounds } : {}),
      ...(options.sequential ? { parallelToolCalls: false } : {}),
    },
  });
}

export function askCommand(): Command {
  const cmd = new Command('ask');

  cmd
    .description('Ask the agent a question')
    .argument('<question...>', 'Question for the agent')
    .option('-r, --max-rounds <count>', 'Tool-call rounds allowed', parsePositiveInt)
    .option('--sequential', 'Run the tool calls of one round one after another')
    .option('-q, --quiet', 'Print only the answer')
    .option('--no-color', 'Plain output')
    .action(async (words: string[], options: AskOptions) => {
      await runAsk(words.join(' '), options);
    });

  return cmd;
}

async function runAsk(question: string, options: AskOptions): Promise<void> {
  const context = await loadCliContext();

  let foundry: FoundryConfig;
  try {
    foundry = requireFoundryConfig(context.config);
  } catch (error) {
    exitWithError(errorMessage(error));
  }

  const sessionConfig = sessionConfigFor(context.config, options);
  const deps = createSessionDependencies(context, FoundryModelBackend.fromConfig(foundry, context.logger, context.credential));
  const format = { color: options.color };
  const interrupt = abortOnInterrupt();

  try {
    const result = await withSession(
      sessionConfig,
      deps,
      (session) => {
        if (!options.quiet) {
          console.log(`Session ${session.id}: ${session.registry.size} tool(s) available`);
          if (session.excludedTools.length > 0) {
            console.log(`Excluded: ${session.excludedTools.join(', ')}`);
          }
        }
        return session.ask(question, {
          signal: interrupt.signal,
          onEvent: (event) => {
            const line = options.quiet ? undefined : formatEvent(event, format);
            if (line !== undefined) console.log(line);
          },
        });
      },
      { signal: interrupt.signal }
    );

    if (result.outcome.status === 'completed') {
      console.log(`\n${formatAnswer(result.outcome.answer, format)}`);
    } else {
      exitWithError(result.outcome.failure.message);
    }
  } catch (error) {
    if (error instanceof CancelledError) {
      console.error('Cancelled.');
      process.exit(130);
    }
    exitWithError(describeError(error));
  } finally {
    interrupt.dispose();
  }
}
