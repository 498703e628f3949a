/**
 * Shutdown controller for the process-shutdown path.
 *
 * Broadcasts stop to a task group, waits for the group to drain, then runs
 * finalizers (flushing logs, closing storage) in registration order.
 */

import { createLogger } from '../logging/index.js';
import { toError } from '../task-group/errors.js';
import type { TaskGroup } from '../task-group/task-group.js';

const log = createLogger({ component: 'shutdown' });

/**
 * Finalizer run after the group has drained.
 */
export type ShutdownHandler = () => void | Promise<void>;

/**
 * Shutdown controller configuration.
 */
export interface ShutdownControllerConfig {
  /**
   * Give up waiting for the drain after this many milliseconds and run the
   * finalizers anyway (default: 0, wait indefinitely)
   */
  drainTimeoutMs?: number;
}

/**
 * Outcome of {@link ShutdownController.shutdown}.
 */
export interface ShutdownResult {
  /** Signal that triggered the shutdown */
  signal: string;

  /** Whether the group drained before finalizers ran */
  drained: boolean;

  /** Number of finalizers that threw */
  failedHandlers: number;

  durationMs: number;
}

/**
 * Process-level subset of `process` used for signal wiring.
 */
export interface SignalSource {
  on(event: 'SIGTERM' | 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGTERM' | 'SIGINT', listener: () => void): unknown;
}

/**
 * Coordinates graceful shutdown of one task group.
 *
 * @example
 * ```typescript
 * const shutdown = new ShutdownController(current(), { drainTimeoutMs: 10000 });
 * shutdown.onShutdown(() => storage.close());
 * shutdown.installSignalHandlers(process);
 *
 * await shutdown.promise;
 * const result = await shutdown.shutdown();
 * ```
 */
export class ShutdownController {
  private readonly group: TaskGroup;
  private readonly config: Required<ShutdownControllerConfig>;
  private readonly _handlers: ShutdownHandler[] = [];
  private _shutdownRequested = false;
  private _signal: string | null = null;
  private _resolver: (() => void) | null = null;
  private _result: Promise<ShutdownResult> | null = null;
  private _promise: Promise<void>;

  constructor(group: TaskGroup, config: ShutdownControllerConfig = {}) {
    this.group = group;
    this.config = {
      drainTimeoutMs: config.drainTimeoutMs ?? 0,
    };
    this._promise = this.createRequestPromise();
  }

  /**
   * Promise that resolves when shutdown is triggered.
   *
   * Replaced by {@link ShutdownController.reset}; read it again after a reset.
   */
  get promise(): Promise<void> {
    return this._promise;
  }

  get isRequested(): boolean {
    return this._shutdownRequested;
  }

  /**
   * Signal that triggered shutdown, if any.
   */
  get signal(): string | null {
    return this._signal;
  }

  /**
   * Register a finalizer. Finalizers run in registration order.
   */
  onShutdown(handler: ShutdownHandler): void {
    this._handlers.push(handler);
  }

  /**
   * Record a shutdown request. Only the first call has an effect.
   *
   * @returns false if shutdown was already requested
   */
  trigger(signal: string): boolean {
    if (this._shutdownRequested) {
      log.warn(`Shutdown already requested, ignoring ${signal}`, {
        operation: 'shutdown',
        signal,
        original_signal: this._signal ?? 'unknown',
      });
      return false;
    }

    log.info(`Received ${signal}, initiating shutdown`, {
      operation: 'shutdown',
      signal,
      group: this.group.name,
    });

    this._shutdownRequested = true;
    this._signal = signal;
    this._resolver?.();
    return true;
  }

  /**
   * Trigger (if needed), stop the group, wait for it to drain and run the
   * finalizers. Concurrent and repeated calls share one run.
   */
  shutdown(signal: string = 'shutdown'): Promise<ShutdownResult> {
    this.trigger(signal);
    if (this._result === null) {
      this._result = this.run();
    }
    return this._result;
  }

  /**
   * Route SIGTERM and SIGINT to {@link ShutdownController.shutdown}.
   *
   * @returns a function removing the listeners again
   */
  installSignalHandlers(source: SignalSource): () => void {
    const onTerm = (): void => this.handleSignal('SIGTERM');
    const onInt = (): void => this.handleSignal('SIGINT');
    source.on('SIGTERM', onTerm);
    source.on('SIGINT', onInt);
    return () => {
      source.off('SIGTERM', onTerm);
      source.off('SIGINT', onInt);
    };
  }

  /**
   * Execute all registered finalizers.
   *
   * Errors are logged but do not prevent later finalizers from running.
   *
   * @returns the number of finalizers that threw
   */
  async executeHandlers(): Promise<number> {
    let failed = 0;
    for (const handler of this._handlers) {
      try {
        await handler();
      } catch (error) {
        failed++;
        const message = toError(error).message;
        log.error(`Shutdown handler failed: ${message}`, {
          operation: 'shutdown',
          error_message: message,
        });
      }
    }
    return failed;
  }

  /**
   * Reset the controller for reuse (primarily for testing).
   *
   * The group is not reset; a drained group stays drained.
   */
  reset(): void {
    this._shutdownRequested = false;
    this._signal = null;
    this._result = null;
    this._handlers.length = 0;
    this._promise = this.createRequestPromise();
  }

  private createRequestPromise(): Promise<void> {
    return new Promise<void>((resolve) => {
      this._resolver = resolve;
    });
  }

  private handleSignal(signal: string): void {
    this.shutdown(signal).catch((error: unknown) => {
      log.error('Shutdown failed', {
        operation: 'shutdown',
        signal,
        error_message: toError(error).message,
      });
    });
  }

  private async run(): Promise<ShutdownResult> {
    const startTime = Date.now();
    const barrier = this.group.drainBarrier();
    this.group.stop();

    const drained = await this.awaitDrain(barrier);
    if (!drained) {
      log.warn('Timed out waiting for tasks to drain', {
        operation: 'shutdown',
        group: this.group.name,
        live_count: this.group.liveCount,
        timeout_ms: this.config.drainTimeoutMs,
      });
    }

    const failedHandlers = await this.executeHandlers();
    const result: ShutdownResult = {
      signal: this._signal ?? 'shutdown',
      drained,
      failedHandlers,
      durationMs: Date.now() - startTime,
    };

    log.info('Shutdown complete', {
      operation: 'shutdown',
      signal: result.signal,
      drained,
      failed_handlers: failedHandlers,
      duration_ms: result.durationMs,
    });
    return result;
  }

  private async awaitDrain(barrier: PromiseLike<void>): Promise<boolean> {
    // A group that never spawned anything has no drain edge to wait for.
    if (this.group.isDrained || this.group.liveCount === 0) {
      return true;
    }
    if (this.config.drainTimeoutMs <= 0) {
      await barrier;
      return true;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.config.drainTimeoutMs);
    });
    try {
      return await Promise.race([Promise.resolve(barrier).then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
