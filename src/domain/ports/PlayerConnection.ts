import type { Question } from "../entities/Question.js";
import type { RoundTally } from "../entities/RoundTally.js";

/**
 * Handle to a single remote player.
 *
 * Wraps the transport so that the game can talk to a player without caring about framing or
 * low-level failures: every send swallows and logs transport errors and settles once the message
 * is handed to the transport, never waiting on the peer. A closed transport makes
 * {@link receiveAnswer} resolve `undefined` instead of rejecting.
 *
 * A handle belongs to exactly one session at a time and is completed exactly once, whether the
 * player won, was eliminated, or the session aborted.
 */
export interface PlayerConnection {
  /** Human-readable label for logs */
  readonly label: string;

  /** Resolves once {@link signalComplete} has been called */
  readonly completed: Promise<void>;

  readonly isComplete: boolean;

  /** Sends the prompt and choices, never the correct choice */
  sendQuestion(question: Question): Promise<void>;

  sendAnnouncement(message: string): Promise<void>;

  /** Sends the full question, correct choice included, along with the round tally */
  sendResults(question: Question, tally: RoundTally): Promise<void>;

  /**
   * Waits for the player's next reply. Resolves `undefined` when the transport closes, the reply
   * is unusable, or `signal` aborts.
   */
  receiveAnswer(signal?: AbortSignal): Promise<string | undefined>;

  /** Releases whoever is waiting for this player's game to end. Callable once. */
  signalComplete(): void;

  /** Tears down the underlying transport */
  close(): void;
}
