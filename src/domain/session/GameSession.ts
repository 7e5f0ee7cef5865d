import type { GameContext } from "../GameContext.js";
import { SessionAbortedError } from "../errors/SessionAbortedError.js";
import { SessionStateError } from "../errors/SessionStateError.js";
import {
  MESSAGE_NETWORK_ERROR_OCCURRED,
  MESSAGE_YOU_ARE_THE_WINNER,
  sessionErrorMessage,
} from "../messages.js";
import type { PlayerConnection } from "../ports/PlayerConnection.js";
import { executeRound, type RoundResult } from "../round/executeRound.js";
import type { RoundNumber, SessionId, SessionStatus } from "../typedefs.js";

export interface SessionOutcome {
  readonly sessionId: SessionId;
  readonly rounds: RoundNumber;
  readonly winner: PlayerConnection | undefined;
}

export type RoundExecutor = typeof executeRound;

/**
 * Drives one game from quorum to completion.
 *
 * The session owns its player set. Every player that enters is completed exactly once: when
 * eliminated, when declared the winner, or when the session aborts.
 */
export class GameSession {
  readonly id: SessionId;
  readonly #ctx: GameContext;
  readonly #executeRound: RoundExecutor;
  #players: readonly PlayerConnection[];
  #roundNumber: RoundNumber = 0;
  #status: SessionStatus = "running";
  #started = false;

  constructor(
    id: SessionId,
    players: readonly PlayerConnection[],
    ctx: GameContext,
    roundExecutor: RoundExecutor = executeRound,
  ) {
    this.id = id;
    this.#players = [...players];
    this.#ctx = ctx;
    this.#executeRound = roundExecutor;
  }

  get players(): readonly PlayerConnection[] {
    return this.#players;
  }

  get roundNumber(): RoundNumber {
    return this.#roundNumber;
  }

  get status(): SessionStatus {
    return this.#status;
  }

  async run(): Promise<SessionOutcome> {
    if (this.#started) {
      throw new SessionStateError(this.id, this.#status);
    }
    this.#started = true;

    const { logger } = this.#ctx;
    logger?.info("Game session started", { sessionId: this.id, players: this.#players.length });

    for (;;) {
      this.#roundNumber += 1;

      let result: RoundResult;
      try {
        result = await this.#executeRound(this.#players, this.#roundNumber, this.#ctx);
      } catch (error) {
        await this.#abort(error);
        throw new SessionAbortedError(this.id, error);
      }

      for (const player of result.eliminated) {
        player.signalComplete();
      }
      this.#players = result.survivors;

      const [winner, ...others] = result.survivors;
      if (winner && others.length === 0) {
        await this.#announce(winner, MESSAGE_YOU_ARE_THE_WINNER);
        winner.signalComplete();
        this.#players = [];
        return this.#complete(winner);
      }

      if (!winner) {
        return this.#complete(undefined);
      }

      logger?.debug?.("Continuing to next round", {
        sessionId: this.id,
        roundNumber: this.#roundNumber,
        remaining: this.#players.length,
      });
    }
  }

  #complete(winner: PlayerConnection | undefined): SessionOutcome {
    this.#status = "complete";
    this.#ctx.logger?.info("Game session complete", {
      sessionId: this.id,
      rounds: this.#roundNumber,
      winner: winner?.label,
    });
    return { sessionId: this.id, rounds: this.#roundNumber, winner };
  }

  async #abort(error: unknown): Promise<void> {
    this.#status = "aborted";
    this.#ctx.logger?.error(sessionErrorMessage(this.id), { error });

    const remaining = this.#players;
    this.#players = [];

    await Promise.all(
      remaining.map((player) => this.#announce(player, MESSAGE_NETWORK_ERROR_OCCURRED)),
    );
    for (const player of remaining) {
      player.signalComplete();
    }
  }

  async #announce(player: PlayerConnection, message: string): Promise<void> {
    try {
      await player.sendAnnouncement(message);
    } catch (error) {
      this.#ctx.logger?.warn("Failed to deliver announcement", { player: player.label, error });
    }
  }
}
