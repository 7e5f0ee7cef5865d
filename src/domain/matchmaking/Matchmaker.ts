import type { GameContext } from "../GameContext.js";
import { waitingForPlayersMessage } from "../messages.js";
import type { PlayerConnection } from "../ports/PlayerConnection.js";
import { GameSession } from "../session/GameSession.js";
import type { SessionSupervisor } from "../session/SessionSupervisor.js";
import type { SessionId } from "../typedefs.js";

export interface MatchmakerOptions {
  readonly context: GameContext;
  readonly supervisor: SessionSupervisor;
  readonly createSession?: (
    id: SessionId,
    players: readonly PlayerConnection[],
    context: GameContext,
  ) => GameSession;
}

/**
 * Buffers connected players until a quorum is present, then hands exactly that many, oldest
 * first, to a new session.
 */
export class Matchmaker {
  readonly #waiting: PlayerConnection[] = [];
  #nextSessionId: SessionId = 1;
  readonly #context: GameContext;
  readonly #supervisor: SessionSupervisor;
  readonly #createSession: NonNullable<MatchmakerOptions["createSession"]>;

  constructor({ context, supervisor, createSession }: MatchmakerOptions) {
    if (!Number.isInteger(context.config.playersPerGame) || context.config.playersPerGame < 1) {
      throw new RangeError("playersPerGame must be a positive integer");
    }

    this.#context = context;
    this.#supervisor = supervisor;
    this.#createSession =
      createSession ?? ((id, players, ctx) => new GameSession(id, players, ctx));
  }

  get waitingCount(): number {
    return this.#waiting.length;
  }

  async offer(player: PlayerConnection): Promise<GameSession | undefined> {
    const batch = this.#enqueue(player);

    if (!batch) {
      const remaining = this.#context.config.playersPerGame - this.#waiting.length;
      this.#context.logger?.info("Player waiting for quorum", {
        player: player.label,
        waiting: this.#waiting.length,
      });
      // the player stays queued either way, so a failed notice must not fail the offer
      try {
        await player.sendAnnouncement(waitingForPlayersMessage(remaining));
      } catch (error) {
        this.#context.logger?.warn("Failed to deliver waiting notice", {
          player: player.label,
          error,
        });
      }
      return undefined;
    }

    const session = this.#createSession(batch.id, batch.players, this.#context);
    this.#context.logger?.info("Quorum reached; starting session", {
      sessionId: session.id,
      players: batch.players.map((p) => p.label),
    });
    void this.#supervisor.launch(session);
    return session;
  }

  // Runs without awaiting so that appending, checking and draining cannot interleave.
  #enqueue(
    player: PlayerConnection,
  ): { readonly id: SessionId; readonly players: PlayerConnection[] } | undefined {
    this.#waiting.push(player);

    const quorum = this.#context.config.playersPerGame;
    if (this.#waiting.length < quorum) {
      return undefined;
    }

    const players = this.#waiting.splice(0, quorum);
    const id = this.#nextSessionId;
    this.#nextSessionId += 1;
    return { id, players };
  }
}
