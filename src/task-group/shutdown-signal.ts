/**
 * Per-task awaitable that resolves when a stop is broadcast.
 */

import { Stopped } from './errors.js';
import type { BroadcastSubscription, TaskSharedState } from './shared-state.js';

/**
 * Resolves with {@link Stopped} on the first stop broadcast after its
 * construction, or when the group drains.
 *
 * A signal created on a drained group is resolved from the start and
 * never subscribes. Once resolved it stays resolved.
 *
 * The broadcast has no memory: a signal created after `stop()` returned
 * waits for the next stop or for the group to drain.
 *
 * A subscribed signal stays registered with its group until it resolves.
 * Call {@link ShutdownSignal.dispose} on any signal that may be abandoned
 * unresolved, such as one held by a task that fails or returns early.
 *
 * @example
 * ```typescript
 * const signal = group.shutdownSignal();
 * group.spawn(async () => {
 *   while (!signal.isTerminated) {
 *     await signal.race(appendBatch());
 *   }
 * });
 * ```
 */
export class ShutdownSignal implements PromiseLike<Stopped> {
  private readonly shared: TaskSharedState;
  private readonly outcome = new Stopped();
  private readonly promise: Promise<Stopped>;
  private resolver: ((value: Stopped) => void) | null = null;
  private readonly racers = new Set<(reason: Stopped) => void>();
  private subscription: BroadcastSubscription | null = null;
  private terminated = false;

  constructor(shared: TaskSharedState) {
    this.shared = shared;
    this.promise = new Promise<Stopped>((resolve) => {
      this.resolver = resolve;
    });

    if (shared.drained) {
      this.terminate();
    } else {
      this.subscription = shared.subscribe(() => this.terminate());
    }
  }

  /**
   * `true` once the signal has resolved.
   */
  get isTerminated(): boolean {
    return this.terminated;
  }

  /**
   * `true` if the group has fully drained.
   */
  get stopped(): boolean {
    return this.shared.drained;
  }

  /**
   * Whether the signal still holds a broadcast subscription.
   */
  get isSubscribed(): boolean {
    return this.subscription?.isActive ?? false;
  }

  /**
   * Number of {@link ShutdownSignal.race} calls whose work is still pending.
   */
  get pendingRaces(): number {
    return this.racers.size;
  }

  then<TResult1 = Stopped, TResult2 = never>(
    onfulfilled?: ((value: Stopped) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  /**
   * Settle with the work's outcome, or reject with {@link Stopped} if the
   * signal resolves first.
   */
  race<T>(work: PromiseLike<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.terminated) {
        reject(this.outcome);
        return;
      }
      this.racers.add(reject);
      Promise.resolve(work).then(
        (value) => {
          this.racers.delete(reject);
          resolve(value);
        },
        (error: unknown) => {
          this.racers.delete(reject);
          reject(error);
        }
      );
    });
  }

  /**
   * Throw {@link Stopped} if the signal has resolved.
   */
  throwIfStopped(): void {
    if (this.terminated) {
      throw this.outcome;
    }
  }

  /**
   * Drop the subscription without resolving.
   *
   * For workers that finish on their own; a disposed signal that has not
   * resolved never will.
   */
  dispose(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  private terminate(): void {
    if (this.terminated) {
      return;
    }
    this.terminated = true;
    this.dispose();
    this.resolver?.(this.outcome);
    this.resolver = null;
    for (const reject of this.racers) {
      reject(this.outcome);
    }
    this.racers.clear();
  }
}
