/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { ScheduledTimeout, Scheduler } from "../../domain/ports/Scheduler.js";

/**
 * Deterministic in-memory scheduler used exclusively in tests.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records pending timeouts and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). This makes it possible
 * for tests to control timer progression without depending on real time or fake timers.
 */
interface PendingTimeout {
  readonly id: number;
  readonly fireAt: number;
  readonly fire: () => void;
}

export class InMemoryScheduler implements Scheduler {
  #now = 0;
  #nextId = 1;
  #queue: readonly PendingTimeout[] = [];

  get now(): number {
    return this.#now;
  }

  get pendingCount(): number {
    return this.#queue.length;
  }

  scheduleTimeout(delayMs: number): ScheduledTimeout {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const id = this.#nextId++;
    let fire: () => void = () => undefined;
    const elapsed = new Promise<void>((resolve) => {
      fire = resolve;
    });

    const pending: PendingTimeout = { id, fireAt: this.#now + delayMs, fire };
    const insertAt = this.#queue.findIndex((existing) => existing.fireAt > pending.fireAt);
    this.#queue =
      insertAt === -1
        ? [...this.#queue, pending]
        : [...this.#queue.slice(0, insertAt), pending, ...this.#queue.slice(insertAt)];

    return {
      elapsed,
      cancel: () => {
        this.#queue = this.#queue.filter((entry) => entry.id !== id);
      },
    };
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#now + milliseconds;

    while (this.#queue.length > 0) {
      const [next, ...remaining] = this.#queue;
      if (!next || next.fireAt > targetTime) {
        break;
      }

      this.#now = next.fireAt;
      this.#queue = remaining;
      next.fire();
      // let continuations of the fired timeout run before the clock moves on
      await Promise.resolve();
    }

    this.#now = targetTime;
  }
}
