import type { RoundNumber, SessionId } from "./typedefs.js";

export const MESSAGE_NETWORK_ERROR_OCCURRED =
  "Network error encountered. Please try again later.";
export const MESSAGE_CORRECT_MOVING_TO_NEXT_ROUND =
  "Correct! You are moving to the next round!";
export const MESSAGE_YOU_ARE_ELIMINATED =
  "Did not receive a correct response! You have been eliminated from the game!";
export const MESSAGE_YOU_ARE_THE_WINNER = "Congratulations, you are the winner!";

export function roundStartingMessage(roundNumber: RoundNumber): string {
  return `Round ${roundNumber} is starting!`;
}

export function waitingForPlayersMessage(remaining: number): string {
  return `Waiting for ${remaining} more player(s) to join...`;
}

export function sessionErrorMessage(sessionId: SessionId): string {
  return `Error encountered in game session ${sessionId}. Aborting game.`;
}
