/**
 * Error types raised by the render cycle
 *
 * Filesystem errors are not wrapped: they reach the caller exactly as
 * fs/promises raised them.
 */

/**
 * Why a render cycle was rejected before any process was launched
 */
export type PreconditionFailure =
  | 'no-source-path'
  | 'unsupported-format'
  | 'renderer-not-found'
  | 'converter-not-found'
  | 'output-dir-not-directory';

export class RenderConfigurationError extends Error {
  readonly reason: PreconditionFailure;

  constructor(reason: PreconditionFailure, message: string) {
    super(message);
    this.name = 'RenderConfigurationError';
    this.reason = reason;
  }
}

/**
 * The executable could not be started (missing, not executable, ...)
 */
export class ProcessLaunchError extends Error {
  readonly executable: string;

  constructor(executable: string, cause: Error) {
    super(`Failed to launch "${executable}": ${cause.message}`, { cause });
    this.name = 'ProcessLaunchError';
    this.executable = executable;
  }
}

export class ProcessTimeoutError extends Error {
  readonly executable: string;
  readonly timeoutMs: number;

  constructor(executable: string, timeoutMs: number) {
    super(`"${executable}" did not finish within ${timeoutMs}ms and was killed`);
    this.name = 'ProcessTimeoutError';
    this.executable = executable;
    this.timeoutMs = timeoutMs;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
