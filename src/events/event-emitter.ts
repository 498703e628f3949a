/**
 * Typed lifecycle event emitter for task groups.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import { DriverEventNames, GroupEventNames, TaskEventNames } from './event-names.js';

/**
 * How a spawned task left its group
 */
export type TaskOutcome = 'completed' | 'failed' | 'cancelled';

/**
 * Event payload types
 */
export interface TaskSpawnedPayload {
  groupId: string;
  taskId: number;
  liveCount: number;
  timestamp: Date;
}

export interface TaskFinishedPayload {
  groupId: string;
  taskId: number;
  outcome: TaskOutcome;
  liveCount: number;
  error?: Error;
  timestamp: Date;
}

export interface GroupEventPayload {
  groupId: string;
  liveCount: number;
  timestamp: Date;
}

export interface WakerPoisonedPayload {
  groupId: string;
  error: Error;
  timestamp: Date;
}

export interface DriverEventPayload {
  groupId: string;
  driver: string;
  tickCount: number;
  timestamp: Date;
}

export interface DriverErrorPayload {
  groupId: string;
  driver: string;
  error: Error;
  timestamp: Date;
}

/**
 * Event map for type-safe event handling
 */
export interface TaskGroupEventMap {
  'task.spawned': (payload: TaskSpawnedPayload) => void;
  'task.finished': (payload: TaskFinishedPayload) => void;

  'group.stop.requested': (payload: GroupEventPayload) => void;
  'group.drained': (payload: GroupEventPayload) => void;
  'waker.poisoned': (payload: WakerPoisonedPayload) => void;

  'driver.started': (payload: DriverEventPayload) => void;
  'driver.stopped': (payload: DriverEventPayload) => void;
  'driver.tick.error': (payload: DriverErrorPayload) => void;
}

/**
 * Type-safe event emitter for task group lifecycle events.
 *
 * One emitter is shared by every handle cloned from the same group.
 */
export class TaskGroupEventEmitter extends EventEmitter<TaskGroupEventMap> {
  private readonly instanceId: string;

  constructor() {
    super();
    this.instanceId = randomUUID();
  }

  /**
   * Get the unique instance ID for this emitter
   */
  getInstanceId(): string {
    return this.instanceId;
  }

  emitTaskSpawned(groupId: string, taskId: number, liveCount: number): void {
    this.emit(TaskEventNames.TASK_SPAWNED, {
      groupId,
      taskId,
      liveCount,
      timestamp: new Date(),
    });
  }

  emitTaskFinished(
    groupId: string,
    taskId: number,
    outcome: TaskOutcome,
    liveCount: number,
    error?: Error
  ): void {
    this.emit(TaskEventNames.TASK_FINISHED, {
      groupId,
      taskId,
      outcome,
      liveCount,
      error,
      timestamp: new Date(),
    });
  }

  emitStopRequested(groupId: string, liveCount: number): void {
    this.emit(GroupEventNames.GROUP_STOP_REQUESTED, {
      groupId,
      liveCount,
      timestamp: new Date(),
    });
  }

  emitDrained(groupId: string): void {
    this.emit(GroupEventNames.GROUP_DRAINED, {
      groupId,
      liveCount: 0,
      timestamp: new Date(),
    });
  }

  emitWakerPoisoned(groupId: string, error: Error): void {
    this.emit(GroupEventNames.WAKER_POISONED, {
      groupId,
      error,
      timestamp: new Date(),
    });
  }

  emitDriverStarted(groupId: string, driver: string): void {
    this.emit(DriverEventNames.DRIVER_STARTED, {
      groupId,
      driver,
      tickCount: 0,
      timestamp: new Date(),
    });
  }

  emitDriverStopped(groupId: string, driver: string, tickCount: number): void {
    this.emit(DriverEventNames.DRIVER_STOPPED, {
      groupId,
      driver,
      tickCount,
      timestamp: new Date(),
    });
  }

  emitDriverTickError(groupId: string, driver: string, error: Error): void {
    this.emit(DriverEventNames.DRIVER_TICK_ERROR, {
      groupId,
      driver,
      error,
      timestamp: new Date(),
    });
  }
}
