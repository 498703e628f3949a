/**
 * Handle on one spawned task's own result.
 */

import type { TaskOutcome } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { TaskCancelledError, toError } from './errors.js';

const log = createLogger({ component: 'join-handle' });

/**
 * How a task settled.
 */
export type TaskResult<T> =
  | { status: 'completed'; value: T }
  | { status: 'failed'; error: unknown }
  | { status: 'cancelled'; error: TaskCancelledError };

/**
 * Awaitable result of a spawned task, independent of group accounting.
 *
 * Resolves with the work's value, rejects with the work's own error, or
 * rejects with {@link TaskCancelledError} after {@link JoinHandle.abort}.
 * A failure nobody awaits is logged instead of surfacing as an unhandled
 * rejection.
 */
export class JoinHandle<T> implements PromiseLike<T> {
  readonly taskId: number;

  private readonly controller: AbortController;
  private readonly onAbort: (handle: JoinHandle<T>, reason: unknown) => void;
  private readonly promise: Promise<T>;
  private resolver: ((value: T) => void) | null = null;
  private rejecter: ((reason: unknown) => void) | null = null;
  private _outcome: TaskOutcome | null = null;

  /**
   * @param onAbort - Called by `abort()` before the handle settles; the
   *   spawning group uses it to release the task's slot.
   */
  constructor(
    taskId: number,
    controller: AbortController,
    onAbort: (handle: JoinHandle<T>, reason: unknown) => void
  ) {
    this.taskId = taskId;
    this.controller = controller;
    this.onAbort = onAbort;
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolver = resolve;
      this.rejecter = reject;
    });
    this.promise.catch((error: unknown) => {
      log.debug('Task settled with an error', {
        task_id: taskId,
        error_message: toError(error).message,
      });
    });
  }

  /**
   * `true` once the task completed, failed or was cancelled.
   */
  get isFinished(): boolean {
    return this._outcome !== null;
  }

  get outcome(): TaskOutcome | null {
    return this._outcome;
  }

  /**
   * Signal handed to the work; aborted by {@link JoinHandle.abort}.
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  /**
   * Cancel the task.
   *
   * The task counts as finished immediately: its slot is released and the
   * handle rejects with {@link TaskCancelledError}. The work's signal is
   * aborted and whatever it produces later is discarded. Returns false if
   * the task had already finished.
   */
  abort(reason?: unknown): boolean {
    if (this._outcome !== null) {
      return false;
    }
    this.controller.abort(reason);
    this.onAbort(this, reason);
    return true;
  }

  /**
   * Settle the handle. Only the first call has an effect.
   *
   * @internal
   */
  settle(result: TaskResult<T>): boolean {
    if (this._outcome !== null) {
      return false;
    }
    this._outcome = result.status;
    if (result.status === 'completed') {
      this.resolver?.(result.value);
    } else {
      this.rejecter?.(result.error);
    }
    this.resolver = null;
    this.rejecter = null;
    return true;
  }
}
