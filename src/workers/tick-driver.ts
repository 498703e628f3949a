/**
 * Tick driver for replica groups.
 *
 * Runs a periodic callback (election and heartbeat ticks) as a task of a
 * task group, so a group-wide stop ends the loop and the group's drain
 * barrier waits for it.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger } from '../logging/index.js';
import { isStopped, toError } from '../task-group/errors.js';
import type { JoinHandle } from '../task-group/join-handle.js';
import type { ShutdownSignal } from '../task-group/shutdown-signal.js';
import type { TaskGroup } from '../task-group/task-group.js';

const log = createLogger({ component: 'tick-driver' });

/**
 * Configuration for the tick driver
 */
export interface TickDriverConfig {
  /** Name used in logs and events (default: tick-driver) */
  name?: string;

  /** Delay between ticks in milliseconds (default: 100) */
  intervalMs?: number;
}

/**
 * Callback run on every tick; receives the 1-based tick number
 */
export type TickCallback = (tickNumber: number) => void | Promise<void>;

/**
 * Callback for tick errors
 */
export type TickErrorCallback = (error: Error) => void;

/**
 * Driver state
 */
export type DriverState = 'stopped' | 'running' | 'stopping';

/**
 * Periodic tick loop spawned under a task group.
 *
 * The loop ends when the driver is stopped, or when the group broadcasts
 * stop. A tick that throws is counted and reported; the loop carries on.
 *
 * @example
 * ```typescript
 * const driver = new TickDriver(group, () => raftGroup.tick(), { intervalMs: 50 });
 * driver.start();
 *
 * group.stop();
 * await group.drainBarrier();
 * ```
 */
export class TickDriver {
  private readonly group: TaskGroup;
  private readonly tick: TickCallback;
  private readonly config: Required<TickDriverConfig>;

  private state: DriverState = 'stopped';
  private tickCount = 0;
  private errorCount = 0;
  private handle: JoinHandle<void> | null = null;
  private sleeper: AbortController | null = null;
  private errorCallback: TickErrorCallback | null = null;

  constructor(group: TaskGroup, tick: TickCallback, config: TickDriverConfig = {}) {
    this.group = group;
    this.tick = tick;
    this.config = {
      name: config.name ?? 'tick-driver',
      intervalMs: config.intervalMs ?? 100,
    };
  }

  getState(): DriverState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getTickCount(): number {
    return this.tickCount;
  }

  getErrorCount(): number {
    return this.errorCount;
  }

  /**
   * Register a callback for tick errors
   */
  onError(callback: TickErrorCallback): this {
    this.errorCallback = callback;
    return this;
  }

  /**
   * Spawn the tick loop. Returns the running loop's handle if already started.
   */
  start(): JoinHandle<void> {
    if (this.handle !== null && this.state !== 'stopped') {
      return this.handle;
    }

    this.state = 'running';
    this.tickCount = 0;
    this.errorCount = 0;

    // Subscribe now so a stop broadcast right after start() is observed.
    const signal = this.group.shutdownSignal();
    this.handle = this.group.spawn(() => this.run(signal));

    log.info('Tick driver started', {
      driver: this.config.name,
      group: this.group.name,
      interval_ms: this.config.intervalMs,
    });
    this.group.events.emitDriverStarted(this.group.groupId, this.config.name);
    return this.handle;
  }

  /**
   * End the loop and wait for its task to finish.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped' || this.handle === null) {
      return;
    }
    this.state = 'stopping';
    this.sleeper?.abort();
    await this.handle;
  }

  private async run(signal: ShutdownSignal): Promise<void> {
    try {
      while (this.state === 'running') {
        const sleeper = new AbortController();
        this.sleeper = sleeper;
        try {
          await signal.race(sleep(this.config.intervalMs, undefined, { signal: sleeper.signal }));
        } catch (error) {
          if (isStopped(error) || sleeper.signal.aborted) {
            break;
          }
          throw error;
        } finally {
          sleeper.abort();
          this.sleeper = null;
        }

        await this.runTick();
      }
    } finally {
      signal.dispose();
      this.state = 'stopped';
      log.info('Tick driver stopped', {
        driver: this.config.name,
        group: this.group.name,
        tick_count: this.tickCount,
        error_count: this.errorCount,
      });
      this.group.events.emitDriverStopped(this.group.groupId, this.config.name, this.tickCount);
    }
  }

  private async runTick(): Promise<void> {
    this.tickCount++;
    try {
      await this.tick(this.tickCount);
    } catch (error) {
      const err = toError(error);
      this.errorCount++;
      log.warn('Tick failed', {
        driver: this.config.name,
        tick: this.tickCount,
        error_message: err.message,
      });
      this.group.events.emitDriverTickError(this.group.groupId, this.config.name, err);
      this.errorCallback?.(err);
    }
  }
}
