/**
 * Error types for task groups.
 */

/**
 * Base error class for task group failures.
 */
export class TaskGroupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskGroupError';
  }
}

/**
 * Control-flow sentinel produced by a resolved shutdown signal.
 *
 * Not a fault: a worker that sees it should abandon its remaining work
 * and let it bubble up the error chain.
 */
export class Stopped extends TaskGroupError {
  constructor() {
    super('The task was stopped');
    this.name = 'Stopped';
  }
}

/**
 * Error a join handle rejects with after `abort()`.
 */
export class TaskCancelledError extends TaskGroupError {
  readonly taskId: number;
  readonly reason: unknown;

  constructor(taskId: number, reason?: unknown) {
    super(`Task ${taskId} was cancelled`);
    this.name = 'TaskCancelledError';
    this.taskId = taskId;
    this.reason = reason;
  }
}

/**
 * Check whether an error is the stop sentinel.
 *
 * @example
 * try {
 *   await signal.race(appendEntries());
 * } catch (error) {
 *   if (!isStopped(error)) throw error;
 * }
 */
export function isStopped(error: unknown): error is Stopped {
  return error instanceof Stopped;
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
