/**
 * Session - resource lifecycle and transcripts
 */

export {
  Session,
  openSession,
  closeSession,
  withSession,
  createSessionConfig,
  type SessionConfig,
  type SessionDependencies,
  type SessionOptions,
  type SessionState,
} from './session.js';

export { TranscriptStore, type TranscriptRecord, type TranscriptSummary } from './transcript-store.js';
