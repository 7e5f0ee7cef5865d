/**
 * Core domain typedefs used throughout the game.
 */

/** Unique, strictly increasing identifier of a game session */
export type SessionId = number;

/** One-based index of a round inside a session; 0 before the first round starts */
export type RoundNumber = number;

/** What a player submitted for a round; `undefined` when nothing usable arrived in time */
export type Answer = string | undefined;

/** Lifecycle of a game session */
export type SessionStatus = "running" | "complete" | "aborted";
