/**
 * Unit tests for the async mutex.
 *
 * Tests cover:
 * - Lock and release bookkeeping
 * - FIFO hand-off between waiters
 * - The withLock pattern, including failures
 */

import { beforeEach, describe, expect, it } from "vitest";
import { Mutex } from "./concurrency.js";

// ============================================================================
// Test Utilities
// ============================================================================

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

// ============================================================================
// Mutex Tests
// ============================================================================

describe("Mutex", () => {
  let mutex: Mutex;

  beforeEach(() => {
    mutex = new Mutex();
  });

  describe("Basic Operations", () => {
    it("should acquire and release lock successfully", async () => {
      expect(mutex.isLocked()).toBe(false);

      await mutex.acquire();
      expect(mutex.isLocked()).toBe(true);

      mutex.release();
      expect(mutex.isLocked()).toBe(false);
    });

    it("should throw when releasing unlocked mutex", () => {
      expect(() => mutex.release()).toThrow("Cannot release unlocked mutex");
    });

    it("should serialize critical sections", async () => {
      let counter = 0;

      const task = async () => {
        await mutex.acquire();
        const temp = counter;
        await delay(5);
        counter = temp + 1;
        mutex.release();
      };

      await Promise.all([task(), task(), task(), task(), task()]);

      expect(counter).toBe(5);
    });

    it("should grant the lock in acquisition order", async () => {
      const order: number[] = [];
      await mutex.acquire();

      const tasks = [1, 2, 3].map(async (id) => {
        await mutex.acquire();
        order.push(id);
        mutex.release();
      });
      expect(mutex.waiting).toBe(3);

      mutex.release();
      await Promise.all(tasks);

      expect(order).toEqual([1, 2, 3]);
      expect(mutex.isLocked()).toBe(false);
    });

    it("should hand the lock to the next waiter without unlocking", async () => {
      await mutex.acquire();
      const next = mutex.acquire();

      mutex.release();

      expect(mutex.isLocked()).toBe(true);
      expect(mutex.waiting).toBe(0);
      await next;
      mutex.release();
      expect(mutex.isLocked()).toBe(false);
    });
  });

  describe("WithLock Pattern", () => {
    it("should execute function with lock", async () => {
      const result = await mutex.withLock(async () => {
        expect(mutex.isLocked()).toBe(true);
        return "reply";
      });

      expect(result).toBe("reply");
      expect(mutex.isLocked()).toBe(false);
    });

    it("should release lock even if function throws", async () => {
      const testError = new Error("Test error");

      await expect(
        mutex.withLock(async () => {
          throw testError;
        })
      ).rejects.toThrow(testError);

      expect(mutex.isLocked()).toBe(false);
    });

    it("should not interleave concurrent sections", async () => {
      const events: string[] = [];

      const section = (name: string, ms: number) =>
        mutex.withLock(async () => {
          events.push(`${name}:start`);
          await delay(ms);
          events.push(`${name}:end`);
        });

      await Promise.all([section("a", 10), section("b", 1)]);

      expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    });
  });
});
