import type { GameConfig } from "./GameConfig.js";
import type { Logger } from "./ports/Logger.js";
import type { QuestionProvider } from "./ports/QuestionProvider.js";
import type { Scheduler } from "./ports/Scheduler.js";

/** Collaborators shared by every session a matchmaker starts */
export interface GameContext {
  readonly questionProvider: QuestionProvider;
  readonly scheduler: Scheduler;
  readonly config: GameConfig;
  readonly logger?: Logger;
}
