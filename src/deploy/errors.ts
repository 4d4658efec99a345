/**
 * Error taxonomy for a deploy attempt. Every one of these aborts the current
 * unit; the batch runner records the unit as failed and moves on.
 */

export class DeployError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeployError';
  }
}

export class InvalidConfigError extends DeployError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidConfigError';
  }
}

export class InvalidActionError extends DeployError {
  constructor(
    message: string,
    public readonly position: number,
    public readonly total: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InvalidActionError';
  }
}

export class PathEscapeError extends DeployError {
  constructor(
    public readonly path: string,
    public readonly root: string
  ) {
    super(`file [${path}] is not inside [${root}]`);
    this.name = 'PathEscapeError';
  }
}

export class ToolInvocationError extends DeployError {
  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
    options?: { cause?: unknown }
  ) {
    const detail = stderr.trim() || (exitCode === null ? 'could not be run' : `exited with code ${exitCode}`);
    super(`${command} ${args.join(' ')}: ${detail}`, options);
    this.name = 'ToolInvocationError';
  }
}

export class DestinationConflictError extends DeployError {
  constructor(public readonly path: string) {
    super(`object with destination name already exists: ${path}`);
    this.name = 'DestinationConflictError';
  }
}

export class FetchError extends DeployError {
  constructor(
    public readonly identity: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`failed to fetch ${identity}: ${message}`, options);
    this.name = 'FetchError';
  }
}

export class CleanupError extends DeployError {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`failed to remove workspace ${path}`, options);
    this.name = 'CleanupError';
  }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Thrown values are not always Errors; the logger wants one.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
