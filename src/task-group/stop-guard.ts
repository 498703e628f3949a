/**
 * One spawned task's claim on its group's live count.
 */

import type { TaskSharedState } from './shared-state.js';

/**
 * Releases exactly one unit of a group's live count.
 *
 * Created 1:1 with each spawned task. Only the first `release()` has an
 * effect, so every exit path of the task may call it.
 */
export class StopGuard {
  readonly taskId: number;
  private readonly shared: TaskSharedState;
  private _released = false;

  constructor(shared: TaskSharedState, taskId: number) {
    this.shared = shared;
    this.taskId = taskId;
  }

  get released(): boolean {
    return this._released;
  }

  /**
   * Give the slot back. Returns false if it was already released.
   */
  release(): boolean {
    if (this._released) {
      return false;
    }
    this._released = true;
    this.shared.release();
    return true;
  }
}
