/**
 * A pending timer created by a {@link Scheduler}.
 */
export interface ScheduledTimeout {
  /** Resolves once the delay has elapsed. Never settles if cancelled first. */
  readonly elapsed: Promise<void>;
  cancel(): void;
}

/**
 * Infrastructure abstraction responsible for delivering time to the domain.
 *
 * Implementations may rely on real timers or a virtual clock. A cancelled timeout must never fire.
 */
export interface Scheduler {
  scheduleTimeout(delayMs: number): ScheduledTimeout;
}
