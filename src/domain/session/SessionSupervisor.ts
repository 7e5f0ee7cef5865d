import type { Logger } from "../ports/Logger.js";
import type { SessionId } from "../typedefs.js";
import type { GameSession } from "./GameSession.js";

/**
 * Keeps track of in-flight session run loops so that their outcome, and in particular an abort,
 * is observed even though nobody awaits the session directly.
 */
export class SessionSupervisor {
  readonly #runs = new Map<SessionId, Promise<void>>();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  get activeCount(): number {
    return this.#runs.size;
  }

  launch(session: GameSession): Promise<void> {
    const run = session
      .run()
      .then(
        (outcome) => {
          this.#logger?.info("Session finished", {
            sessionId: outcome.sessionId,
            rounds: outcome.rounds,
            winner: outcome.winner?.label ?? null,
          });
        },
        (error: unknown) => {
          this.#logger?.error("Session failed", { sessionId: session.id, error });
        },
      )
      .finally(() => {
        this.#runs.delete(session.id);
      });

    this.#runs.set(session.id, run);
    return run;
  }

  /** Waits for every session currently running */
  async drain(): Promise<void> {
    while (this.#runs.size > 0) {
      await Promise.all([...this.#runs.values()]);
    }
  }
}
