/**
 * State shared by every handle, guard, signal and barrier of one task group.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import { TaskGroupEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { TaskGroupError, toError } from './errors.js';

const log = createLogger({ component: 'task-group' });

/**
 * Callback that re-polls a waiting drain barrier.
 */
export type Waker = () => void;

export interface BroadcastEvents {
  stop: () => void;
  drained: () => void;
}

/**
 * Listener registry behind the stop broadcast.
 */
export class BroadcastRegistry extends EventEmitter<BroadcastEvents> {}

/**
 * Opaque handle on one broadcast registration.
 */
export class BroadcastSubscription {
  private readonly registry: BroadcastRegistry;
  private readonly listener: () => void;
  private active = true;

  constructor(registry: BroadcastRegistry, onFire: () => void) {
    this.registry = registry;
    this.listener = () => {
      this.unsubscribe();
      onFire();
    };
    registry.on('stop', this.listener);
    registry.on('drained', this.listener);
  }

  get isActive(): boolean {
    return this.active;
  }

  unsubscribe(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    this.registry.off('stop', this.listener);
    this.registry.off('drained', this.listener);
  }
}

/**
 * Counters, the one-way drained latch, the single waker slot and the
 * stop broadcast for one group.
 *
 * Every callback runs to completion on the event loop, so each
 * read-modify-write below is indivisible and the value read before a
 * decrement is the sole signal for the drained flip.
 */
export class TaskSharedState {
  readonly groupId: string;
  readonly name: string;
  readonly events: TaskGroupEventEmitter;

  private readonly broadcast = new BroadcastRegistry();
  private count = 0;
  private spawned = 0;
  private drainedFlag = false;
  private waker: Waker | null = null;
  private poisoned = false;

  constructor(name: string) {
    this.groupId = randomUUID();
    this.name = name;
    this.events = new TaskGroupEventEmitter();
  }

  get liveCount(): number {
    return this.count;
  }

  get spawnedCount(): number {
    return this.spawned;
  }

  get drained(): boolean {
    return this.drainedFlag;
  }

  get hasWaker(): boolean {
    return this.waker !== null;
  }

  get isPoisoned(): boolean {
    return this.poisoned;
  }

  /**
   * Number of live broadcast subscriptions.
   */
  get subscriberCount(): number {
    return this.broadcast.listenerCount('stop');
  }

  /**
   * Count a newly spawned task. Returns the task's id.
   */
  increment(): number {
    this.count += 1;
    this.spawned += 1;
    if (this.drainedFlag) {
      log.debug('Task spawned on an already drained group', {
        group_id: this.groupId,
        group: this.name,
        live_count: this.count,
      });
    }
    return this.spawned;
  }

  /**
   * Release one task's slot.
   *
   * Returns true when this release observed the 1 -> 0 edge and flipped
   * the drained latch. The latch is set before the waker runs so a
   * re-polled barrier sees it.
   */
  release(): boolean {
    const previous = this.count;
    if (previous === 0) {
      throw new TaskGroupError(`Task group '${this.name}' released more tasks than it spawned`);
    }
    this.count = previous - 1;

    let flipped = false;
    if (previous === 1 && !this.drainedFlag) {
      this.drainedFlag = true;
      flipped = true;
    }

    this.wake();

    if (flipped) {
      log.debug('Task group drained', { group_id: this.groupId, group: this.name });
      this.broadcast.emit('drained');
      this.notify(() => this.events.emitDrained(this.groupId));
    }
    return flipped;
  }

  /**
   * Store the waker of the barrier being awaited, replacing any previous one.
   *
   * Returns false when the slot is poisoned; the caller must then treat
   * its wait as satisfied instead of parking.
   */
  setWaker(waker: Waker): boolean {
    if (this.poisoned) {
      return false;
    }
    if (this.waker !== null && this.waker !== waker) {
      log.debug('Drain waker replaced by another barrier', {
        group_id: this.groupId,
        group: this.name,
      });
    }
    this.waker = waker;
    return true;
  }

  /**
   * Take and invoke the registered waker, if any.
   */
  wake(): void {
    if (this.poisoned) {
      return;
    }
    const waker = this.waker;
    this.waker = null;
    if (waker === null) {
      return;
    }

    try {
      waker();
    } catch (error) {
      const err = toError(error);
      this.poisoned = true;
      log.warn('Drain waker threw, waker slot poisoned', {
        group_id: this.groupId,
        group: this.name,
        error_message: err.message,
      });
      this.notify(() => this.events.emitWakerPoisoned(this.groupId, err));
    }
  }

  /**
   * Wake every currently subscribed shutdown signal.
   *
   * Returns false when the group was already drained. Leaves no standing
   * state behind: later subscribers are not woken.
   */
  stop(): boolean {
    if (this.drainedFlag) {
      return false;
    }
    log.info('Stop broadcast', {
      group_id: this.groupId,
      group: this.name,
      live_count: this.count,
      subscribers: this.subscriberCount,
    });
    this.broadcast.emit('stop');
    this.notify(() => this.events.emitStopRequested(this.groupId, this.count));
    return true;
  }

  /**
   * Register a one-shot listener fired by whichever comes first of the
   * next stop broadcast and the drained flip.
   */
  subscribe(listener: () => void): BroadcastSubscription {
    return new BroadcastSubscription(this.broadcast, listener);
  }

  /**
   * Run a lifecycle event emission, logging listener failures.
   */
  notify(emission: () => void): void {
    try {
      emission();
    } catch (error) {
      log.error('Task group event listener threw', {
        group_id: this.groupId,
        error_message: toError(error).message,
      });
    }
  }
}
