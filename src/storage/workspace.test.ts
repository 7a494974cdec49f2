import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Workspace } from './workspace.js';
import { rm, access, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir, tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

describe('Workspace', () => {
  let testDir: string;
  let workspace: Workspace;

  beforeEach(() => {
    testDir = join(tmpdir(), `es-mcp-agent-test-${randomUUID()}`);
    workspace = new Workspace(testDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('defaults to a directory in the home folder', () => {
    expect(new Workspace().root).toBe(join(homedir(), '.es-mcp-agent'));
  });

  it('resolves relative roots against the working directory', () => {
    expect(new Workspace('./scratch').root).toBe(join(process.cwd(), 'scratch'));
  });

  describe('initialize', () => {
    it('creates the transcript and log directories', async () => {
      await workspace.initialize();

      await expect(access(workspace.transcriptsDir)).resolves.toBeUndefined();
      await expect(access(workspace.logsDir)).resolves.toBeUndefined();
    });

    it('creates the root owner-only', async () => {
      await workspace.initialize();

      const stats = await stat(workspace.root);
      expect(stats.mode & 0o777).toBe(0o700);
    });

    it('can run twice', async () => {
      await workspace.initialize();
      await workspace.initialize();
      expect(await workspace.exists()).toBe(true);
    });
  });

  it('reports whether the root exists', async () => {
    expect(await workspace.exists()).toBe(false);
    await workspace.initialize();
    expect(await workspace.exists()).toBe(true);
  });

  describe('paths', () => {
    it('places config.json at the root', () => {
      expect(workspace.configPath).toBe(join(testDir, 'config.json'));
    });

    it('places transcripts as JSONL files', () => {
      expect(workspace.transcriptPath('abc')).toBe(join(testDir, 'transcripts', 'abc.jsonl'));
    });

    it('places log files under logs/', () => {
      expect(workspace.logPath('agent.log')).toBe(join(testDir, 'logs', 'agent.log'));
    });

    it.each(['../escape', 'a/b', 'a\\b', ''])('rejects session ID %j', (id) => {
      expect(() => workspace.transcriptPath(id)).toThrow(/Invalid session ID/);
    });

    it('rejects log names that leave the logs directory', () => {
      expect(() => workspace.logPath('../config.json')).toThrow('Invalid log filename: ../config.json');
    });
  });
});
