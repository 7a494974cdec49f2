import { mkdir, access, constants } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve, isAbsolute } from 'node:path';

const DEFAULT_WORKSPACE_ROOT = '.es-mcp-agent';

const WORKSPACE_DIRS = ['transcripts', 'logs'] as const;

function assertPlainName(kind: string, name: string): void {
  if (name.length === 0 || name.includes('/') || name.includes('\\') || name.includes('..')) {
    throw new Error(`Invalid ${kind}: ${name}`);
  }
}

/**
 * Workspace - the ~/.es-mcp-agent/ directory holding config, transcripts and logs
 */
export class Workspace {
  private readonly rootPath: string;

  /**
   * @param rootPath - Custom root (defaults to ~/.es-mcp-agent/)
   */
  constructor(rootPath?: string) {
    if (rootPath) {
      this.rootPath = isAbsolute(rootPath) ? rootPath : resolve(rootPath);
    } else {
      this.rootPath = join(homedir(), DEFAULT_WORKSPACE_ROOT);
    }
  }

  get root(): string {
    return this.rootPath;
  }

  /**
   * Creates the root and its subdirectories, owner-only (700)
   */
  async initialize(): Promise<void> {
    await mkdir(this.rootPath, { recursive: true, mode: 0o700 });
    for (const dir of WORKSPACE_DIRS) {
      await mkdir(join(this.rootPath, dir), { recursive: true, mode: 0o700 });
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.rootPath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  get configPath(): string {
    return join(this.rootPath, 'config.json');
  }

  get transcriptsDir(): string {
    return join(this.rootPath, 'transcripts');
  }

  get logsDir(): string {
    return join(this.rootPath, 'logs');
  }

  /**
   * Path of a session's transcript file
   */
  transcriptPath(sessionId: string): string {
    assertPlainName('session ID', sessionId);
    return join(this.transcriptsDir, `${sessionId}.jsonl`);
  }

  logPath(filename: string): string {
    assertPlainName('log filename', filename);
    return join(this.logsDir, filename);
  }
}
