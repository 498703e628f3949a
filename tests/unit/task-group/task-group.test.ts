/**
 * TaskGroup tests.
 *
 * Covers spawning, join handles, the drain guarantees under success,
 * failure and cancellation, and the shutdown scenarios a node runs into.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { TaskFinishedPayload, TaskSpawnedPayload } from '../../../src/events/event-emitter.js';
import { Stopped, TaskCancelledError } from '../../../src/task-group/errors.js';
import type { JoinHandle } from '../../../src/task-group/join-handle.js';
import { type TaskContext, TaskGroup } from '../../../src/task-group/task-group.js';
import { deferred, flush, isPending, within } from '../../support/async.js';

describe('TaskGroup', () => {
  let group: TaskGroup;

  beforeEach(() => {
    group = new TaskGroup({ name: 'replica-1' });
  });

  describe('construction', () => {
    it('starts empty and not drained', () => {
      expect(group.liveCount).toBe(0);
      expect(group.isDrained).toBe(false);
      expect(group.name).toBe('replica-1');
    });

    it('generates a name when none is given', () => {
      expect(new TaskGroup().name).toMatch(/^task-group-\d+$/);
    });

    it('gives each group its own id', () => {
      expect(new TaskGroup().groupId).not.toBe(new TaskGroup().groupId);
    });
  });

  describe('spawn', () => {
    it('counts the task before returning and resolves with its value', async () => {
      const handle = group.spawn(async () => 42);

      expect(group.liveCount).toBe(1);
      expect(handle.isFinished).toBe(false);

      expect(await handle).toBe(42);
      expect(group.liveCount).toBe(0);
      expect(group.isDrained).toBe(true);
      expect(handle.outcome).toBe('completed');
    });

    it('starts the work on a later microtask', async () => {
      let started = false;
      const handle = group.spawn(() => {
        started = true;
      });

      expect(started).toBe(false);
      await handle;
      expect(started).toBe(true);
    });

    it('hands the work its context', async () => {
      const contexts: TaskContext[] = [];
      await group.spawn((context) => {
        contexts.push(context);
      });
      await group.spawn((context) => {
        contexts.push(context);
      });

      expect(contexts.map((context) => context.taskId)).toEqual([1, 2]);
      expect(contexts[0]?.group.sameGroup(group)).toBe(true);
      expect(contexts[0]?.signal.aborted).toBe(false);
    });

    it('releases the slot when the work rejects', async () => {
      const handle = group.spawn(async () => {
        throw new Error('append failed');
      });

      await expect(handle).rejects.toThrow('append failed');
      expect(group.liveCount).toBe(0);
      expect(handle.outcome).toBe('failed');
    });

    it('releases the slot when the work throws synchronously', async () => {
      const handle = group.spawn(() => {
        throw new Error('sync failure');
      });

      await expect(handle).rejects.toThrow('sync failure');
      expect(group.isDrained).toBe(true);
    });

    it('does not leak an unhandled rejection for unobserved failures', async () => {
      const unhandled = vi.fn();
      process.on('unhandledRejection', unhandled);
      try {
        group.spawn(async () => {
          throw new Error('nobody listens');
        });
        await flush();
        await flush();
        expect(unhandled).not.toHaveBeenCalled();
        expect(group.isDrained).toBe(true);
      } finally {
        process.off('unhandledRejection', unhandled);
      }
    });
  });

  describe('abort', () => {
    it('releases the slot immediately and rejects the handle', async () => {
      const gate = deferred<number>();
      const handle = group.spawn(() => gate.promise);
      await flush();

      expect(handle.abort('shutting down')).toBe(true);

      expect(group.liveCount).toBe(0);
      expect(group.isDrained).toBe(true);
      expect(handle.signal.aborted).toBe(true);
      const error = await Promise.resolve(handle).catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(TaskCancelledError);
      expect(error).toMatchObject({ taskId: 1, reason: 'shutting down' });
      expect(handle.outcome).toBe('cancelled');
    });

    it('discards the result of aborted work', async () => {
      const gate = deferred<number>();
      const handle = group.spawn(() => gate.promise);
      await flush();
      handle.abort();

      gate.resolve(7);
      await flush();

      expect(group.liveCount).toBe(0);
      expect(handle.outcome).toBe('cancelled');
      expect(handle.abort()).toBe(false);
    });

    it('never starts work aborted before it ran', async () => {
      const work = vi.fn();
      const handle = group.spawn(work);
      handle.abort();

      await flush();

      expect(work).not.toHaveBeenCalled();
      expect(group.liveCount).toBe(0);
    });

    it('cannot abort a finished task', async () => {
      const handle = group.spawn(() => 'done');
      await handle;

      expect(handle.abort()).toBe(false);
      expect(handle.outcome).toBe('completed');
    });
  });

  describe('handles', () => {
    it('clones share state', () => {
      const clone = group.clone();
      clone.spawn(() => deferred().promise);

      expect(clone.sameGroup(group)).toBe(true);
      expect(group.liveCount).toBe(1);
      expect(clone.groupId).toBe(group.groupId);
    });

    it('lets every handle call stop() without double effects', () => {
      const stopRequested = vi.fn();
      group.events.on('group.stop.requested', stopRequested);
      const signal = group.shutdownSignal();
      const clone = group.clone();

      group.stop();
      clone.stop();

      expect(signal.isTerminated).toBe(true);
      expect(stopRequested).toHaveBeenCalledTimes(2);
    });

    it('reports stats', () => {
      group.spawn(() => deferred().promise);
      group.shutdownSignal();

      expect(group.stats()).toEqual({
        groupId: group.groupId,
        name: 'replica-1',
        liveCount: 1,
        spawnedCount: 1,
        drained: false,
        shutdownSubscribers: 1,
        drainWaiterRegistered: false,
      });
    });
  });

  describe('events', () => {
    it('emits task.spawned with the live count', () => {
      const spawned = vi.fn((_payload: TaskSpawnedPayload) => {});
      group.events.on('task.spawned', spawned);

      group.spawn(() => deferred().promise);

      expect(spawned).toHaveBeenCalledTimes(1);
      expect(spawned.mock.calls[0]?.[0]).toMatchObject({
        groupId: group.groupId,
        taskId: 1,
        liveCount: 1,
      });
    });

    it('emits task.finished with each outcome', async () => {
      const outcomes: string[] = [];
      group.events.on('task.finished', (payload: TaskFinishedPayload) => {
        outcomes.push(payload.outcome);
      });

      const ok = group.spawn(async () => 'ok');
      const failed = group.spawn(async () => {
        throw new Error('bad');
      });
      const cancelled = group.spawn(() => deferred().promise);
      cancelled.abort();

      await Promise.allSettled([ok, failed, cancelled]);

      expect([...outcomes].sort()).toEqual(['cancelled', 'completed', 'failed']);
    });

    it('emits group.drained once', async () => {
      const drained = vi.fn();
      group.events.on('group.drained', drained);

      await group.spawn(() => 1);
      await group.spawn(() => 2);

      expect(drained).toHaveBeenCalledTimes(1);
    });

    it('keeps spawning when a listener throws', async () => {
      group.events.on('task.spawned', () => {
        throw new Error('listener failed');
      });

      await expect(group.spawn(() => 'still runs')).resolves.toBe('still runs');
    });
  });

  describe('drain guarantees', () => {
    it('resolves a barrier only after every task finished, whatever the outcome', async () => {
      const barrier = group.drainBarrier();
      expect(await isPending(barrier)).toBe(true);

      const gates = Array.from({ length: 6 }, () => deferred<number>());
      const handles = gates.map((gate) => group.spawn(() => gate.promise));

      gates[0]?.resolve(1);
      gates[1]?.reject(new Error('failed'));
      handles[2]?.abort();
      gates[3]?.resolve(3);
      gates[4]?.reject(new Error('failed'));
      await flush();

      expect(group.liveCount).toBe(1);
      expect(await isPending(barrier)).toBe(true);

      gates[5]?.resolve(5);
      await within(barrier, 50);
      expect(group.liveCount).toBe(0);
      await Promise.allSettled(handles);
    });

    it('releases failing tasks so the barrier waits only on the rest', async () => {
      const gate = deferred();
      const handles: JoinHandle<void>[] = [];
      for (let i = 0; i < 10; i++) {
        handles.push(
          group.spawn(async () => {
            if (i % 2 === 0) {
              throw new Error(`task ${i} failed`);
            }
            await gate.promise;
          })
        );
      }
      await flush();

      expect(group.liveCount).toBe(5);
      const barrier = group.drainBarrier();
      expect(await isPending(barrier)).toBe(true);

      gate.resolve();
      await within(barrier, 50);

      const results = await Promise.allSettled(handles);
      expect(results.filter((result) => result.status === 'rejected')).toHaveLength(5);
    });

    it('does not touch counters on stop()', () => {
      for (let i = 0; i < 3; i++) {
        group.spawn(() => deferred().promise);
      }

      group.stop();
      group.stop();

      expect(group.liveCount).toBe(3);
      expect(group.isDrained).toBe(false);
    });

    it('treats stop() on a drained group as a no-op', async () => {
      await group.spawn(() => undefined);
      const stopRequested = vi.fn();
      group.events.on('group.stop.requested', stopRequested);

      expect(() => group.stop()).not.toThrow();
      expect(stopRequested).not.toHaveBeenCalled();
    });
  });

  describe('shutdown scenarios', () => {
    it('wakes a waiting signal promptly while a long task keeps the group open', async () => {
      const release = deferred();
      const longRunning = group.spawn(() => release.promise);
      const signal = group.shutdownSignal();

      let observed = false;
      const watcher = (async () => {
        await signal;
        observed = true;
      })();

      group.stop();
      await within(watcher, 50);
      expect(observed).toBe(true);

      const barrier = group.drainBarrier();
      expect(await isPending(barrier)).toBe(true);
      expect(longRunning.isFinished).toBe(false);

      release.resolve();
      await within(barrier, 100);
      expect(longRunning.outcome).toBe('completed');
    });

    it('stops 100 tasks waiting on their own signals', async () => {
      const handles: JoinHandle<Stopped>[] = [];
      for (let i = 0; i < 100; i++) {
        const signal = group.shutdownSignal();
        handles.push(group.spawn(async () => await signal));
      }

      setTimeout(() => group.stop(), 0);

      const results = await within(Promise.all(handles), 50);
      expect(results).toHaveLength(100);
      expect(results.every((result) => result instanceof Stopped)).toBe(true);
      expect(group.isDrained).toBe(true);
    });

    it('drains 100 tasks when half of them fail immediately', async () => {
      const handles: JoinHandle<Stopped>[] = [];
      for (let i = 0; i < 100; i++) {
        const signal = group.shutdownSignal();
        handles.push(
          group.spawn(async () => {
            if (i % 2 === 0) {
              throw new Error('oops');
            }
            return await signal;
          })
        );
      }

      group.stop();

      await within(group.drainBarrier(), 50);
      const results = await Promise.allSettled(handles);
      expect(results.filter((result) => result.status === 'rejected')).toHaveLength(50);
      expect(group.liveCount).toBe(0);
    });
  });
});
