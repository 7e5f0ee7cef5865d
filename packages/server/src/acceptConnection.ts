import type { Logger, Matchmaker, PlayerConnection } from "./core.js";

/**
 * Hands a freshly opened connection to the matchmaker, then holds it open until the player's
 * game is over. Failures are logged and never escape, so one bad connection cannot take the
 * server down.
 */
export async function acceptConnection(
  player: PlayerConnection,
  matchmaker: Pick<Matchmaker, "offer">,
  logger?: Logger,
): Promise<void> {
  try {
    logger?.info("Player connected", { player: player.label });
    await matchmaker.offer(player);
    await player.completed;
  } catch (error) {
    logger?.error("Failed to handle player connection", { player: player.label, error });
  } finally {
    player.close();
  }
}
