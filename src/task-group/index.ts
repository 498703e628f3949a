/**
 * Task group module.
 *
 * Shutdown broadcast, drain barrier and guarded spawning.
 */

export { current, resetDefaultGroup, spawn } from './default-group.js';
export { DrainBarrier } from './drain-barrier.js';
export { isStopped, Stopped, TaskCancelledError, TaskGroupError, toError } from './errors.js';
export { JoinHandle, type TaskResult } from './join-handle.js';
export { BroadcastSubscription, TaskSharedState, type Waker } from './shared-state.js';
export { ShutdownSignal } from './shutdown-signal.js';
export { StopGuard } from './stop-guard.js';
export {
  type TaskContext,
  TaskGroup,
  type TaskGroupOptions,
  type TaskGroupStats,
  type TaskWork,
} from './task-group.js';
