/**
 * TaskGroup - shutdown broadcast and drain barrier for spawned work.
 *
 * Every long-lived worker of a node (tick drivers, append pipelines,
 * transport listeners, apply loops) is spawned through a group. Workers
 * race their work against a shutdown signal; the shutdown path calls
 * `stop()` and then awaits a drain barrier before finalizing state.
 *
 * @example
 * ```typescript
 * const group = new TaskGroup({ name: 'replica-7' });
 *
 * const signal = group.shutdownSignal();
 * group.spawn(async () => {
 *   await signal;
 * });
 *
 * group.stop();
 * await group.drainBarrier();
 * ```
 */

import type { TaskGroupEventEmitter, TaskOutcome } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { DrainBarrier } from './drain-barrier.js';
import { TaskCancelledError, toError } from './errors.js';
import { JoinHandle, type TaskResult } from './join-handle.js';
import { TaskSharedState } from './shared-state.js';
import { ShutdownSignal } from './shutdown-signal.js';
import { StopGuard } from './stop-guard.js';

const log = createLogger({ component: 'task-group' });

let groupCounter = 0;

/**
 * Task group configuration.
 */
export interface TaskGroupOptions {
  /** Name used in logs and events (default: task-group-{n}) */
  name?: string;
}

/**
 * Context handed to spawned work.
 */
export interface TaskContext {
  /** Id of the task within its group, starting at 1 */
  taskId: number;

  /** Handle on the group the task runs under */
  group: TaskGroup;

  /** Aborted when the task's join handle is aborted */
  signal: AbortSignal;
}

/**
 * Unit of work accepted by `spawn()`.
 */
export type TaskWork<T> = (context: TaskContext) => T | PromiseLike<T>;

/**
 * Point-in-time view of a group.
 */
export interface TaskGroupStats {
  groupId: string;
  name: string;
  liveCount: number;
  spawnedCount: number;
  drained: boolean;
  shutdownSubscribers: number;
  drainWaiterRegistered: boolean;
}

/**
 * Cheap, shareable handle over one group's shared state.
 *
 * Handles returned by {@link TaskGroup.clone} observe the same state and
 * may call `stop()` concurrently.
 */
export class TaskGroup {
  private readonly shared: TaskSharedState;

  /**
   * @param shared - Existing state to attach to; used by `clone()`
   */
  constructor(options: TaskGroupOptions = {}, shared?: TaskSharedState) {
    if (shared) {
      this.shared = shared;
    } else {
      groupCounter += 1;
      this.shared = new TaskSharedState(options.name ?? `task-group-${groupCounter}`);
    }
  }

  get name(): string {
    return this.shared.name;
  }

  get groupId(): string {
    return this.shared.groupId;
  }

  /**
   * Number of spawned tasks that have not released their slot.
   */
  get liveCount(): number {
    return this.shared.liveCount;
  }

  /**
   * `true` once the last outstanding task has finished. Never reverts.
   */
  get isDrained(): boolean {
    return this.shared.drained;
  }

  /**
   * Lifecycle events shared by every handle on this group.
   */
  get events(): TaskGroupEventEmitter {
    return this.shared.events;
  }

  /**
   * Another handle on the same group.
   */
  clone(): TaskGroup {
    return new TaskGroup({}, this.shared);
  }

  /**
   * Whether two handles refer to the same group.
   */
  sameGroup(other: TaskGroup): boolean {
    return this.shared === other.shared;
  }

  /**
   * Wake every shutdown signal subscribed so far.
   *
   * No-op on a drained group. Does not latch: signals created afterwards
   * are not woken by this call.
   */
  stop(): void {
    this.shared.stop();
  }

  shutdownSignal(): ShutdownSignal {
    return new ShutdownSignal(this.shared);
  }

  drainBarrier(): DrainBarrier {
    return new DrainBarrier(this.shared);
  }

  /**
   * Run `work` under this group.
   *
   * The task is counted before `spawn()` returns and starts on a later
   * microtask. Its slot is released exactly once, whether the work
   * returns, throws, rejects or is aborted through the returned handle.
   */
  spawn<T>(work: TaskWork<T>): JoinHandle<T> {
    const taskId = this.shared.increment();
    const guard = new StopGuard(this.shared, taskId);
    const controller = new AbortController();
    const handle = new JoinHandle<T>(taskId, controller, (abortedHandle, reason) => {
      this.finishTask(guard, abortedHandle, {
        status: 'cancelled',
        error: new TaskCancelledError(taskId, reason),
      });
    });

    const context: TaskContext = { taskId, group: this, signal: controller.signal };
    this.shared.notify(() =>
      this.shared.events.emitTaskSpawned(this.shared.groupId, taskId, this.shared.liveCount)
    );

    this.runTask(work, context, guard, handle).catch((error: unknown) => {
      log.error('Task bookkeeping failed', {
        group_id: this.shared.groupId,
        task_id: taskId,
        error_message: toError(error).message,
      });
    });

    return handle;
  }

  stats(): TaskGroupStats {
    return {
      groupId: this.shared.groupId,
      name: this.shared.name,
      liveCount: this.shared.liveCount,
      spawnedCount: this.shared.spawnedCount,
      drained: this.shared.drained,
      shutdownSubscribers: this.shared.subscriberCount,
      drainWaiterRegistered: this.shared.hasWaker,
    };
  }

  private async runTask<T>(
    work: TaskWork<T>,
    context: TaskContext,
    guard: StopGuard,
    handle: JoinHandle<T>
  ): Promise<void> {
    try {
      await Promise.resolve();
      if (context.signal.aborted) {
        return;
      }
      const value = await work(context);
      this.finishTask(guard, handle, { status: 'completed', value });
    } catch (error) {
      this.finishTask(guard, handle, { status: 'failed', error });
    } finally {
      guard.release();
    }
  }

  /**
   * Release the slot, then settle the handle. The first finisher wins;
   * a late result from aborted work is dropped.
   */
  private finishTask<T>(guard: StopGuard, handle: JoinHandle<T>, result: TaskResult<T>): void {
    if (!guard.release()) {
      log.debug('Discarding result of an already finished task', {
        group_id: this.shared.groupId,
        task_id: guard.taskId,
        status: result.status,
      });
      return;
    }

    handle.settle(result);

    const outcome: TaskOutcome = result.status;
    const error = result.status === 'completed' ? undefined : toError(result.error);
    if (result.status === 'failed') {
      log.warn('Task failed', {
        group_id: this.shared.groupId,
        task_id: guard.taskId,
        error_message: error?.message,
      });
    }
    this.shared.notify(() =>
      this.shared.events.emitTaskFinished(
        this.shared.groupId,
        guard.taskId,
        outcome,
        this.shared.liveCount,
        error
      )
    );
  }
}
