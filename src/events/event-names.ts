/**
 * Standard event names for task group lifecycle.
 */

/**
 * Event names for individual spawned tasks
 */
export const TaskEventNames = {
  /** Emitted after a task is counted against its group */
  TASK_SPAWNED: 'task.spawned',

  /** Emitted after a task's guard has been released */
  TASK_FINISHED: 'task.finished',
} as const;

/**
 * Event names for group-wide transitions
 */
export const GroupEventNames = {
  /** Emitted when stop() broadcasts to subscribed shutdown signals */
  GROUP_STOP_REQUESTED: 'group.stop.requested',

  /** Emitted once, when the last outstanding task releases its guard */
  GROUP_DRAINED: 'group.drained',

  /** Emitted when a drain waker throws and the waker slot is poisoned */
  WAKER_POISONED: 'waker.poisoned',
} as const;

/**
 * Event names for tick drivers
 */
export const DriverEventNames = {
  DRIVER_STARTED: 'driver.started',
  DRIVER_STOPPED: 'driver.stopped',
  DRIVER_TICK_ERROR: 'driver.tick.error',
} as const;

/**
 * All event names combined
 */
export const EventNames = {
  ...TaskEventNames,
  ...GroupEventNames,
  ...DriverEventNames,
} as const;

/**
 * Type representing all possible event names
 */
export type EventName = (typeof EventNames)[keyof typeof EventNames];

export type TaskEventName = (typeof TaskEventNames)[keyof typeof TaskEventNames];

export type GroupEventName = (typeof GroupEventNames)[keyof typeof GroupEventNames];

export type DriverEventName = (typeof DriverEventNames)[keyof typeof DriverEventNames];
