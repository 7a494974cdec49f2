/**
 * Chat command - an interactive conversation with follow-up questions on
 * one session and one model thread
 */

import { Command } from 'commander';
import { createInterface, type Interface } from 'node:readline';
import { FoundryModelBackend, type FoundryConfig } from '../../agent/foundry-backend.js';
import { requireFoundryConfig } from '../../config/config-manager.js';
import { CancelledError, errorMessage, isAgentError } from '../../errors/errors.js';
import { withSession, type Session } from '../../session/session.js';
import { createSessionDependencies, describeError, exitWithError, loadCliContext } from '../utils/context.js';
import { formatAnswer, formatEvent, type FormatOptions } from '../utils/output.js';
import { parsePositiveInt, sessionConfigFor, type ConversationOptions } from './ask.js';

interface ChatOptions extends ConversationOptions {
  quiet?: boolean;
  color: boolean;
}

const EXIT_WORDS = new Set(['exit', 'quit']);

export interface ChatIo {
  questions: AsyncIterable<string>;
  print: (line: string) => void;
  format: FormatOptions;
  quiet?: boolean;
  signal?: AbortSignal;
}

/**
 * Asks every question read from `io.questions` on the session until the
 * input ends or an exit word is read. A question that fails with a
 * taxonomy error is reported and the chat goes on; cancellation and other
 * errors end it. Returns the number of questions asked.
 */
export async function runChatLoop(session: Session, io: ChatIo): Promise<number> {
  for await (const line of io.questions) {
    const question = line.trim();
    if (question.length === 0) continue;
    if (EXIT_WORDS.has(question.toLowerCase())) break;

    try {
      const result = await session.ask(question, {
        signal: io.signal,
        onEvent: (event) => {
          const progress = io.quiet ? undefined : formatEvent(event, io.format);
          if (progress !== undefined) io.print(progress);
        },
      });
      io.print(
        result.outcome.status === 'completed'
          ? formatAnswer(result.outcome.answer, io.format)
          : `Stopped: ${result.outcome.failure.message}`
      );
    } catch (error) {
      if (error instanceof CancelledError || !isAgentError(error)) {
        throw error;
      }
      io.print(`Error: ${describeError(error)}`);
    }
  }
  return session.questionCount;
}

async function* promptedLines(rl: Interface): AsyncGenerator<string> {
  const lines = rl[Symbol.asyncIterator]();
  while (true) {
    rl.prompt();
    const next = await lines.next();
    if (next.done) return;
    yield next.value;
  }
}

export function chatCommand(): Command {
  const cmd = new Command('chat');

  cmd
    .description('Talk with the agent; each line is a question, "exit" ends the chat')
    .option('-r, --max-rounds <count>', 'Tool-call rounds allowed per question', parsePositiveInt)
    .option('--sequential', 'Run the tool calls of one round one after another')
    .option('-q, --quiet', 'Print only the answers')
    .option('--no-color', 'Plain output')
    .action(async (options: ChatOptions) => {
      await runChat(options);
    });

  return cmd;
}

async function runChat(options: ChatOptions): Promise<void> {
  const context = await loadCliContext();

  let foundry: FoundryConfig;
  try {
    foundry = requireFoundryConfig(context.config);
  } catch (error) {
    exitWithError(errorMessage(error));
  }

  const deps = createSessionDependencies(context, FoundryModelBackend.fromConfig(foundry, context.logger, context.credential));
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
  const controller = new AbortController();
  // Ctrl+C reaches readline, not the process, while the prompt is active
  rl.on('SIGINT', () => {
    controller.abort();
    rl.close();
  });

  try {
    const asked = await withSession(
      sessionConfigFor(context.config, options),
      deps,
      (session) => {
        console.log(`Session ${session.id}: ${session.registry.size} tool(s) available`);
        return runChatLoop(session, {
          questions: promptedLines(rl),
          print: (line) => console.log(line),
          format: { color: options.color },
          quiet: options.quiet,
          signal: controller.signal,
        });
      },
      { signal: controller.signal }
    );
    console.log(`Asked ${asked} question(s).`);
  } catch (error) {
    if (error instanceof CancelledError) {
      console.error('Cancelled.');
      process.exit(130);
    }
    exitWithError(describeError(error));
  } finally {
    rl.close();
  }
}
