import { mkdir, readFile, readdir, unlink, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ConversationTurn } from '../agent/conversation.js';
import type { Logger } from '../logging/logger.js';
import type { Workspace } from '../storage/workspace.js';
import type { ToolCallResult } from '../tools/tool-invoker.js';

const TRANSCRIPT_VERSION = 1;

/**
 * A finished conversation as persisted on disk
 */
export interface TranscriptRecord {
  sessionId: string;
  createdAt: number;
  finishedAt: number;
  rounds: number;
  status: 'completed' | 'failed';
  /** Tool names the model was offered */
  tools: string[];
  turns: readonly ConversationTurn[];
}

export interface TranscriptSummary {
  sessionId: string;
  createdAt: number;
  finishedAt: number;
  rounds: number;
  status: 'completed' | 'failed';
  turnCount: number;
}

const headerSchema = z.object({
  sessionId: z.string(),
  createdAt: z.number(),
  finishedAt: z.number(),
  rounds: z.number().int().nonnegative(),
  status: z.enum(['completed', 'failed']),
  tools: z.array(z.string()),
  version: z.number().int(),
});

type TranscriptHeader = z.infer<typeof headerSchema>;

const resultSchema = z.union([
  z.object({ success: z.literal(true), payload: z.unknown() }),
  z.object({
    success: z.literal(false),
    kind: z.enum(['timeout', 'connection_error', 'protocol_error', 'tool_error', 'policy_error']),
    message: z.string(),
  }),
]);

const turnSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('user'), content: z.string(), timestamp: z.number() }),
  z.object({ role: z.literal('assistant'), content: z.string(), timestamp: z.number() }),
  z.object({
    role: z.literal('tool'),
    callId: z.string(),
    toolName: z.string(),
    arguments: z.record(z.unknown()),
    result: resultSchema,
    timestamp: z.number(),
  }),
]);

function parseTurn(value: unknown): ConversationTurn | undefined {
  const parsed = turnSchema.safeParse(value);
  if (!parsed.success) return undefined;

  const turn = parsed.data;
  if (turn.role !== 'tool') return turn;

  const result: ToolCallResult = turn.result.success
    ? { success: true, payload: turn.result.payload }
    : turn.result;
  return { ...turn, result };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseHeader(line: string | undefined): TranscriptHeader | undefined {
  if (line === undefined || !line.startsWith('#')) return undefined;
  try {
    const parsed = headerSchema.safeParse(JSON.parse(line.slice(1)));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

function splitLines(content: string): string[] {
  return content.split('\n').filter((line) => line.trim().length > 0);
}

/**
 * TranscriptStore - finished conversations as JSONL files.
 *
 * The first line is `#` followed by the metadata header; every further line
 * is one conversation turn.
 */
export class TranscriptStore {
  private workspace: Workspace;
  private logger: Logger;

  constructor(workspace: Workspace, logger: Logger) {
    this.workspace = workspace;
    this.logger = logger;
  }

  async save(record: TranscriptRecord): Promise<string> {
    const path = this.workspace.transcriptPath(record.sessionId);
    const header: TranscriptHeader = {
      sessionId: record.sessionId,
      createdAt: record.createdAt,
      finishedAt: record.finishedAt,
      rounds: record.rounds,
      status: record.status,
      tools: record.tools,
      version: TRANSCRIPT_VERSION,
    };
    const lines = [`#${JSON.stringify(header)}`, ...record.turns.map((turn) => JSON.stringify(turn))];

    await mkdir(this.workspace.transcriptsDir, { recursive: true, mode: 0o700 });
    await writeFile(path, lines.join('\n') + '\n', { mode: 0o600 });
    await this.logger.debug('Transcript saved', { sessionId: record.sessionId, turns: record.turns.length });
    return path;
  }

  /**
   * Reads a transcript back; unreadable turn lines are skipped with a warning
   */
  async load(sessionId: string): Promise<TranscriptRecord> {
    const lines = splitLines(await this.read(sessionId));
    const header = parseHeader(lines[0]);
    if (!header) {
      throw new Error(`Transcript ${sessionId} has no valid metadata header`);
    }

    const turns: ConversationTurn[] = [];
    for (const line of lines.slice(1)) {
      let turn: ConversationTurn | undefined;
      try {
        turn = parseTurn(JSON.parse(line));
      } catch {
        turn = undefined;
      }
      if (turn) {
        turns.push(turn);
      } else {
        await this.logger.warn('Skipping malformed transcript entry', { sessionId, line });
      }
    }

    return {
      sessionId: header.sessionId,
      createdAt: header.createdAt,
      finishedAt: header.finishedAt,
      rounds: header.rounds,
      status: header.status,
      tools: header.tools,
      turns,
    };
  }

  /**
   * Summaries of every stored transcript, newest first
   */
  async list(): Promise<TranscriptSummary[]> {
    let files: string[];
    try {
      files = await readdir(this.workspace.transcriptsDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const summaries: TranscriptSummary[] = [];
    for (const file of files) {
      if (!file.endsWith('.jsonl')) continue;

      const sessionId = file.slice(0, -'.jsonl'.length);
      const lines = splitLines(await this.read(sessionId));
      const header = parseHeader(lines[0]);
      if (!header) {
        await this.logger.warn('Skipping transcript without a metadata header', { file });
        continue;
      }
      summaries.push({
        sessionId: header.sessionId,
        createdAt: header.createdAt,
        finishedAt: header.finishedAt,
        rounds: header.rounds,
        status: header.status,
        turnCount: lines.length - 1,
      });
    }

    return summaries.sort((a, b) => b.createdAt - a.createdAt);
  }

  async delete(sessionId: string): Promise<void> {
    try {
      await unlink(this.workspace.transcriptPath(sessionId));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new Error(`Transcript not found: ${sessionId}`);
      }
      throw error;
    }
  }

  private async read(sessionId: string): Promise<string> {
    try {
      return await readFile(this.workspace.transcriptPath(sessionId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new Error(`Transcript not found: ${sessionId}`);
      }
      throw error;
    }
  }
}
