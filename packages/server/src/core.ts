export type { GameContext } from "@elimination-trivia/core/domain/GameContext.js";
export type { GameConfig } from "@elimination-trivia/core/domain/GameConfig.js";
export { createGameConfig } from "@elimination-trivia/core/domain/GameConfig.js";
export { CompletionSignal } from "@elimination-trivia/core/domain/entities/CompletionSignal.js";
export type { Question } from "@elimination-trivia/core/domain/entities/Question.js";
export {
  insertCorrectChoice,
  toPublicQuestion,
} from "@elimination-trivia/core/domain/entities/Question.js";
export type { RoundTally } from "@elimination-trivia/core/domain/entities/RoundTally.js";
export { choiceCounts } from "@elimination-trivia/core/domain/entities/RoundTally.js";
export { Matchmaker } from "@elimination-trivia/core/domain/matchmaking/Matchmaker.js";
export type { Logger } from "@elimination-trivia/core/domain/ports/Logger.js";
export type { PlayerConnection } from "@elimination-trivia/core/domain/ports/PlayerConnection.js";
export type { QuestionProvider } from "@elimination-trivia/core/domain/ports/QuestionProvider.js";
export type {
  ScheduledTimeout,
  Scheduler,
} from "@elimination-trivia/core/domain/ports/Scheduler.js";
export { SessionSupervisor } from "@elimination-trivia/core/domain/session/SessionSupervisor.js";
