/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Logger, ScheduledTimeout, Scheduler } from "../core.js";

interface RealSchedulerOptions {
  readonly logger?: Logger;
}

export class RealScheduler implements Scheduler {
  #timers: Set<ReturnType<typeof setTimeout>> = new Set();
  readonly #logger: Logger | undefined;

  constructor(options: RealSchedulerOptions = {}) {
    this.#logger = options.logger;
  }

  get pendingCount(): number {
    return this.#timers.size;
  }

  scheduleTimeout(delayMs: number): ScheduledTimeout {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    let resolveElapsed: () => void = () => undefined;
    const elapsed = new Promise<void>((resolve) => {
      resolveElapsed = resolve;
    });

    const timer = setTimeout(() => {
      this.#timers.delete(timer);
      resolveElapsed();
    }, delayMs);
    this.#timers.add(timer);
    this.#logger?.debug?.("Timeout scheduled", { delayMs });

    return {
      elapsed,
      cancel: () => {
        if (!this.#timers.has(timer)) {
          return;
        }
        clearTimeout(timer);
        this.#timers.delete(timer);
      },
    };
  }

  /** Clears every pending timer; their `elapsed` promises never settle */
  cancelAll(): void {
    for (const timer of this.#timers) {
      clearTimeout(timer);
    }
    if (this.#timers.size > 0) {
      this.#logger?.warn("Cancelled pending timeouts", { count: this.#timers.size });
    }
    this.#timers.clear();
  }
}
