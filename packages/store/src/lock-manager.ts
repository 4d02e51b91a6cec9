/**
 * @coffer/store — Row lock manager.
 *
 * Named exclusive locks with FIFO hand-off. A caller asks for every key
 * it needs up front; keys are de-duplicated and taken in sorted order,
 * so two callers can never wait on each other in a cycle.
 *
 * Acquisition is time-bounded: when the deadline passes, the waiter is
 * removed from its queue, every key already taken is released, and
 * LOCK_TIMEOUT is thrown.
 */

import { StoreError } from "./types.js";

interface Waiter {
  readonly grant: () => void;
}

/**
 * Releases every key of one acquisition. Safe to call more than once.
 */
export interface LockHandle {
  readonly keys: readonly string[];
  release(): void;
}

export class RowLockManager {
  /** key → queue; the head of each queue holds the lock */
  private readonly _queues = new Map<string, Waiter[]>();

  /**
   * Acquire all keys, waiting at most `timeoutMs` in total.
   *
   * @throws StoreError LOCK_TIMEOUT
   */
  async acquire(keys: readonly string[], timeoutMs: number): Promise<LockHandle> {
    const ordered = [...new Set(keys)].sort();
    const deadline = Date.now() + timeoutMs;
    const held: string[] = [];

    try {
      for (const key of ordered) {
        await this._acquireOne(key, deadline);
        held.push(key);
      }
    } catch (err) {
      for (const key of held.reverse()) {
        this._release(key);
      }
      throw err;
    }

    let released = false;
    return {
      keys: ordered,
      release: () => {
        if (released) return;
        released = true;
        for (const key of [...ordered].reverse()) {
          this._release(key);
        }
      },
    };
  }

  /** Whether any caller currently holds the key. */
  isLocked(key: string): boolean {
    return this._queues.has(key);
  }

  /** Number of callers waiting (not holding) for the key. */
  waiting(key: string): number {
    const queue = this._queues.get(key);
    return queue === undefined ? 0 : queue.length - 1;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _acquireOne(key: string, deadline: number): Promise<void> {
    const queue = this._queues.get(key);
    if (queue === undefined) {
      this._queues.set(key, [{ grant: () => undefined }]);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const waiter: Waiter = {
        grant: () => {
          clearTimeout(timer);
          resolve();
        },
      };

      timer = setTimeout(() => {
        const index = queue.indexOf(waiter);
        // index 0 means the lock was granted in the same tick
        if (index > 0) {
          queue.splice(index, 1);
          reject(
            new StoreError("LOCK_TIMEOUT", `Timed out waiting for lock '${key}'`, { key }),
          );
        }
      }, Math.max(0, deadline - Date.now()));

      queue.push(waiter);
    });
  }

  private _release(key: string): void {
    const queue = this._queues.get(key);
    if (queue === undefined) return;

    queue.shift();
    const next = queue[0];
    if (next === undefined) {
      this._queues.delete(key);
    } else {
      next.grant();
    }
  }
}
