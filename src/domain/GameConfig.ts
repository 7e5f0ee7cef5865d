export interface GameConfig {
  /** Quorum: how many waiting players start a session */
  readonly playersPerGame: number;
  /** How long each player has to answer once the question is sent */
  readonly roundDurationMs: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    playersPerGame: overrides.playersPerGame ?? 2,
    roundDurationMs: overrides.roundDurationMs ?? 10_000,
  };
}
