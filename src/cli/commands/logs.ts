/**
 * Logs command - view and follow the agent log
 */

import { Command } from 'commander';
import { createReadStream, watch } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import { toLoggerConfig } from '../../config/config-manager.js';
import { LOG_LEVELS, isLogLevel, type LogEntry, type LogLevel } from '../../logging/logger.js';
import { exitWithError, loadCliContext } from '../utils/context.js';

interface LogsOptions {
  follow?: boolean;
  level?: string;
  lines: number;
  session?: string;
}

interface LogFilter {
  minLevel?: LogLevel;
  sessionId?: string;
}

const logEntrySchema = z.object({
  timestamp: z.string(),
  level: z.enum(['debug', 'info', 'warn', 'error']),
  message: z.string(),
  context: z
    .object({
      sessionId: z.string().optional(),
      operation: z.string().optional(),
      toolName: z.string().optional(),
    })
    .catchall(z.unknown())
    .optional(),
  errorCode: z.string().optional(),
  stack: z.string().optional(),
});

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const GRAY = '\x1b[90m';

export function logsCommand(): Command {
  const cmd = new Command('logs');

  cmd
    .description('View the agent log')
    .option('-f, --follow', 'Keep printing new entries (Ctrl+C to stop)')
    .option('-l, --level <level>', 'Minimum level (debug, info, warn, error)')
    .option('-s, --session <id>', 'Only entries of one session')
    .option('-n, --lines <count>', 'Number of entries to show', (value: string) => Number.parseInt(value, 10), 50)
    .action(async (options: LogsOptions) => {
      await runLogs(options);
    });

  return cmd;
}

async function runLogs(options: LogsOptions): Promise<void> {
  const { config } = await loadCliContext();
  const logPath = toLoggerConfig(config).path;

  if (options.level !== undefined && !isLogLevel(options.level)) {
    exitWithError(`Invalid log level: ${options.level}`, ['Valid levels: debug, info, warn, error']);
  }
  const filter: LogFilter = {
    minLevel: options.level !== undefined && isLogLevel(options.level) ? options.level : undefined,
    sessionId: options.session,
  };

  let content: string;
  try {
    content = await readFile(logPath, 'utf-8');
  } catch {
    console.log(`No log file at ${logPath}.`);
    return;
  }

  printLines(content.trim().split('\n').slice(-options.lines), filter);

  if (options.follow) {
    await followLog(logPath, filter);
  }
}

/**
 * Parses one log line; lines that are not log entries give undefined
 */
export function parseLogLine(line: string): LogEntry | undefined {
  try {
    const parsed = logEntrySchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

export function matchesFilter(entry: LogEntry, filter: LogFilter): boolean {
  if (filter.minLevel && LOG_LEVELS[entry.level] < LOG_LEVELS[filter.minLevel]) {
    return false;
  }
  return filter.sessionId === undefined || entry.context?.sessionId === filter.sessionId;
}

export function formatLogEntry(entry: LogEntry): string {
  const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const color = LEVEL_COLORS[entry.level];
  let output = `${color}[${time}] ${entry.level.toUpperCase().padEnd(5)}${RESET} ${entry.message}`;

  if (entry.errorCode) {
    output += ` ${color}(${entry.errorCode})${RESET}`;
  }
  if (entry.context && Object.keys(entry.context).length > 0) {
    const contextText = Object.entries(entry.context)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(' ');
    output += ` ${GRAY}${contextText}${RESET}`;
  }
  if (entry.stack) {
    output += `\n${GRAY}${entry.stack}${RESET}`;
  }
  return output;
}

function printLines(lines: readonly string[], filter: LogFilter): void {
  for (const line of lines) {
    const entry = parseLogLine(line);
    if (entry && matchesFilter(entry, filter)) {
      console.log(formatLogEntry(entry));
    }
  }
}

async function followLog(logPath: string, filter: LogFilter): Promise<void> {
  console.log('\n--- Following log (Ctrl+C to stop) ---\n');

  let position = (await stat(logPath)).size;

  const readNewEntries = async (): Promise<void> => {
    const { size } = await stat(logPath);
    if (size < position) {
      // rotated
      position = 0;
    }
    if (size === position) return;

    const lines = createInterface({ input: createReadStream(logPath, { start: position, end: size - 1 }) });
    position = size;
    for await (const line of lines) {
      const entry = parseLogLine(line);
      if (entry && matchesFilter(entry, filter)) {
        console.log(formatLogEntry(entry));
      }
    }
  };

  await new Promise<void>((resolve) => {
    const watcher = watch(logPath, () => {
      readNewEntries().catch((error: unknown) => {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          console.error(error);
        }
        position = 0;
      });
    });
    process.once('SIGINT', () => {
      watcher.close();
      resolve();
    });
  });
}
