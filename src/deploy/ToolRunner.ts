/**
 * ToolRunner — runs external binaries (coffee, uglifyjs, sudo, tar, unzip).
 *
 * Commands are always an executable plus an argument vector passed to
 * child_process.execFile; nothing goes through a shell.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { ToolInvocationError } from './errors.js';

const execFileAsync = promisify(execFile);

export interface ToolResult {
  stdout: string;
  stderr: string;
}

export interface ToolRunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface ToolRunner {
  run(command: string, args: readonly string[], options?: ToolRunOptions): Promise<ToolResult>;
}

interface ExecFailure {
  code?: number | string;
  signal?: string;
  stderr?: string;
}

function describeFailure(err: unknown): ExecFailure {
  if (typeof err !== 'object' || err === null) return {};
  const failure: ExecFailure = {};
  if ('code' in err && (typeof err.code === 'number' || typeof err.code === 'string')) {
    failure.code = err.code;
  }
  if ('signal' in err && typeof err.signal === 'string') {
    failure.signal = err.signal;
  }
  if ('stderr' in err && typeof err.stderr === 'string') {
    failure.stderr = err.stderr;
  }
  return failure;
}

export class ProcessToolRunner implements ToolRunner {
  async run(command: string, args: readonly string[], options: ToolRunOptions = {}): Promise<ToolResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, [...args], {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: 64 * 1024 * 1024,
        encoding: 'utf8',
      });
      return { stdout, stderr };
    } catch (err: unknown) {
      const failure = describeFailure(err);
      // execFile reports spawn failures (ENOENT) as a string code, exits as a number
      const exitCode = typeof failure.code === 'number' ? failure.code : null;
      let stderr = failure.stderr ?? '';
      if (!stderr.trim() && failure.signal) stderr = `killed by ${failure.signal}`;
      if (!stderr.trim() && typeof failure.code === 'string') stderr = failure.code;
      throw new ToolInvocationError(command, args, exitCode, stderr, { cause: err });
    }
  }
}
