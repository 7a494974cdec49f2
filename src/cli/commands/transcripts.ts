/**
 * Transcripts command - browse saved conversations
 */

import { Command } from 'commander';
import { TranscriptStore } from '../../session/transcript-store.js';
import { errorMessage } from '../../errors/errors.js';
import { exitWithError, loadCliContext } from '../utils/context.js';
import { formatTurn } from '../utils/output.js';

export function transcriptsCommand(): Command {
  const cmd = new Command('transcripts');

  cmd.description('List, show and delete saved conversations');

  cmd
    .command('list', { isDefault: true })
    .description('List saved conversations, newest first')
    .action(async () => {
      await listTranscripts();
    });

  cmd
    .command('show <sessionId>')
    .description('Print a saved conversation')
    .option('--no-color', 'Plain output')
    .action(async (sessionId: string, options: { color: boolean }) => {
      await showTranscript(sessionId, options.color);
    });

  cmd
    .command('delete <sessionId>')
    .description('Delete a saved conversation')
    .action(async (sessionId: string) => {
      await deleteTranscript(sessionId);
    });

  return cmd;
}

async function openStore(): Promise<TranscriptStore> {
  const { workspace, logger } = await loadCliContext();
  return new TranscriptStore(workspace, logger);
}

async function listTranscripts(): Promise<void> {
  const summaries = await (await openStore()).list();

  if (summaries.length === 0) {
    console.log('No saved conversations.');
    return;
  }

  for (const summary of summaries) {
    const created = new Date(summary.createdAt).toISOString();
    console.log(
      `${summary.sessionId}  ${created}  ${summary.status.padEnd(9)} ${summary.turnCount} turn(s), ${summary.rounds} round(s)`
    );
  }
}

async function showTranscript(sessionId: string, color: boolean): Promise<void> {
  try {
    const record = await (await openStore()).load(sessionId);
    console.log(`Session ${record.sessionId} (${record.status}, ${record.rounds} round(s))`);
    console.log(`Tools: ${record.tools.join(', ') || 'none'}\n`);
    for (const turn of record.turns) {
      console.log(formatTurn(turn, { color }));
      console.log('');
    }
  } catch (error) {
    exitWithError(errorMessage(error));
  }
}

async function deleteTranscript(sessionId: string): Promise<void> {
  try {
    await (await openStore()).delete(sessionId);
    console.log(`Deleted ${sessionId}`);
  } catch (error) {
    exitWithError(errorMessage(error));
  }
}
