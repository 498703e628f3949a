/**
 * Awaitable that resolves once its group has no live tasks left.
 */

import { createLogger } from '../logging/index.js';
import type { TaskSharedState } from './shared-state.js';

const log = createLogger({ component: 'task-group' });

/**
 * Resolves exactly once, when the group's drained latch is set.
 *
 * While pending it parks its waker in the group's single waker slot and
 * re-checks the latch each time a task releases. At most one barrier per
 * group may be awaited at a time: a second one replaces the first's
 * waker, and the first is not woken again.
 *
 * If the waker slot is unusable the barrier resolves at once rather than
 * risk waiting forever.
 */
export class DrainBarrier implements PromiseLike<void> {
  private readonly shared: TaskSharedState;
  private promise: Promise<void> | null = null;
  private ready = false;

  constructor(shared: TaskSharedState) {
    this.shared = shared;
  }

  /**
   * `true` once the barrier has resolved or the group has drained.
   */
  get isReady(): boolean {
    return this.ready || this.shared.drained;
  }

  then<TResult1 = void, TResult2 = never>(
    onfulfilled?: ((value: void) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.wait().then(onfulfilled, onrejected);
  }

  private wait(): Promise<void> {
    if (this.promise === null) {
      this.promise = new Promise<void>((resolve) => {
        const waker = (): void => {
          if (this.poll(waker)) {
            resolve();
          }
        };
        waker();
      });
    }
    return this.promise;
  }

  private poll(waker: () => void): boolean {
    if (this.ready) {
      return true;
    }
    if (this.shared.drained) {
      this.ready = true;
      return true;
    }
    if (!this.shared.setWaker(waker)) {
      log.warn('Could not register drain waker, releasing barrier', {
        group_id: this.shared.groupId,
        group: this.shared.name,
        live_count: this.shared.liveCount,
      });
      this.ready = true;
      return true;
    }
    return false;
  }
}
