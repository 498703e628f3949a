/**
 * Process-scoped default task group.
 *
 * Created lazily on first use. Code that needs isolation (tests, several
 * nodes in one process) constructs its own {@link TaskGroup} instead.
 */

import type { JoinHandle } from './join-handle.js';
import { TaskGroup, type TaskWork } from './task-group.js';

let defaultGroup: TaskGroup | null = null;

function defaultInstance(): TaskGroup {
  if (defaultGroup === null) {
    defaultGroup = new TaskGroup({ name: 'default' });
  }
  return defaultGroup;
}

/**
 * Handle on the process-wide default group.
 */
export function current(): TaskGroup {
  return defaultInstance().clone();
}

/**
 * Spawn `work` under the default group.
 */
export function spawn<T>(work: TaskWork<T>): JoinHandle<T> {
  return defaultInstance().spawn(work);
}

/**
 * Forget the default group; the next `current()` or `spawn()` creates a
 * fresh one. Handles already obtained keep the old group.
 */
export function resetDefaultGroup(): void {
  defaultGroup = null;
}
