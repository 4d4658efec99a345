/**
 * GitClient — thin wrapper around the git CLI.
 *
 * All git operations use child_process.execFile('git', ...) with an argument
 * vector; no native git bindings.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface GitExecOptions {
  timeoutMs?: number;
}

export class GitClient {
  constructor(
    private repoPath: string,
    private gitBinary: string = 'git'
  ) {}

  /**
   * Clone `url` into this client's directory, which must exist and be empty.
   */
  async clone(url: string, options: GitExecOptions = {}): Promise<void> {
    await this.exec(['clone', url, this.repoPath], options);
  }

  async getCommitHash(ref?: string): Promise<string> {
    const output = await this.exec(['rev-parse', ref || 'HEAD']);
    return output.trim();
  }

  private async exec(args: string[], options: GitExecOptions = {}): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.gitBinary, args, {
        cwd: this.repoPath,
        timeout: options.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
        encoding: 'utf8',
      });
      return stdout;
    } catch (err: unknown) {
      let message = err instanceof Error ? err.message : 'Unknown git error';
      if (typeof err === 'object' && err !== null) {
        if ('killed' in err && err.killed === true && options.timeoutMs !== undefined) {
          message = `timed out after ${options.timeoutMs}ms`;
        } else if ('stderr' in err && typeof err.stderr === 'string' && err.stderr.trim()) {
          message = err.stderr.trim();
        }
      }
      throw new Error(`git ${args[0] ?? ''}: ${message}`, { cause: err });
    }
  }
}
