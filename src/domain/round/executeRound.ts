import type { GameContext } from "../GameContext.js";
import type { Question } from "../entities/Question.js";
import {
  EMPTY_TALLY,
  isCorrectAnswer,
  tallyAnswers,
  type RoundTally,
} from "../entities/RoundTally.js";
import {
  MESSAGE_CORRECT_MOVING_TO_NEXT_ROUND,
  MESSAGE_YOU_ARE_ELIMINATED,
  roundStartingMessage,
} from "../messages.js";
import type { PlayerConnection } from "../ports/PlayerConnection.js";
import type { ScheduledTimeout } from "../ports/Scheduler.js";
import type { Answer, RoundNumber } from "../typedefs.js";

export interface RoundResult {
  readonly roundNumber: RoundNumber;
  /** `undefined` only when the round had no players */
  readonly question: Question | undefined;
  readonly tally: RoundTally;
  readonly survivors: readonly PlayerConnection[];
  readonly eliminated: readonly PlayerConnection[];
}

/**
 * Plays one question against `players`: fetches the question, collects every player's answer
 * under its own deadline, tallies, broadcasts the results and partitions survivors from the
 * eliminated. Question provider failures propagate; per-player failures count as no answer.
 *
 * Session state and completion signals are left to the caller.
 */
export async function executeRound(
  players: readonly PlayerConnection[],
  roundNumber: RoundNumber,
  ctx: GameContext,
): Promise<RoundResult> {
  if (players.length === 0) {
    return { roundNumber, question: undefined, tally: EMPTY_TALLY, survivors: [], eliminated: [] };
  }

  const question = await ctx.questionProvider.fetchQuestion();
  ctx.logger?.debug?.("Round question fetched", { roundNumber, prompt: question.prompt });

  const answers = await Promise.all(
    players.map((player) => collectAnswer(player, question, roundNumber, ctx)),
  );

  const tally = tallyAnswers(question, answers);
  const survivors: PlayerConnection[] = [];
  const eliminated: PlayerConnection[] = [];
  players.forEach((player, index) => {
    if (isCorrectAnswer(question, answers[index])) {
      survivors.push(player);
    } else {
      eliminated.push(player);
    }
  });

  await Promise.all(
    players.map((player) =>
      deliver(player, ctx, "results", () => player.sendResults(question, tally)),
    ),
  );
  await Promise.all([
    ...survivors.map((player) =>
      deliver(player, ctx, "survival notice", () =>
        player.sendAnnouncement(MESSAGE_CORRECT_MOVING_TO_NEXT_ROUND),
      ),
    ),
    ...eliminated.map((player) =>
      deliver(player, ctx, "elimination notice", () =>
        player.sendAnnouncement(MESSAGE_YOU_ARE_ELIMINATED),
      ),
    ),
  ]);

  ctx.logger?.info("Round finished", {
    roundNumber,
    players: players.length,
    survivors: survivors.length,
    eliminated: eliminated.length,
  });

  return { roundNumber, question, tally, survivors, eliminated };
}

// The deadline starts before anything is sent, so a player whose transport stalls on the
// announcement or the question still runs out of time.
async function collectAnswer(
  player: PlayerConnection,
  question: Question,
  roundNumber: RoundNumber,
  ctx: GameContext,
): Promise<Answer> {
  const controller = new AbortController();
  let timeout: ScheduledTimeout | undefined;

  try {
    timeout = ctx.scheduler.scheduleTimeout(ctx.config.roundDurationMs);
    const timedOut = timeout.elapsed.then((): Answer => {
      ctx.logger?.info("Player did not answer in time", { player: player.label, roundNumber });
      return undefined;
    });

    return await Promise.race([
      askAndReceive(player, question, roundNumber, controller.signal),
      timedOut,
    ]);
  } catch (error) {
    ctx.logger?.warn("Failed to collect answer", { player: player.label, roundNumber, error });
    return undefined;
  } finally {
    controller.abort();
    timeout?.cancel();
  }
}

async function askAndReceive(
  player: PlayerConnection,
  question: Question,
  roundNumber: RoundNumber,
  signal: AbortSignal,
): Promise<Answer> {
  await player.sendAnnouncement(roundStartingMessage(roundNumber));
  await player.sendQuestion(question);
  if (signal.aborted) {
    return undefined;
  }
  return player.receiveAnswer(signal);
}

async function deliver(
  player: PlayerConnection,
  ctx: GameContext,
  what: string,
  send: () => Promise<void>,
): Promise<void> {
  try {
    await send();
  } catch (error) {
    ctx.logger?.warn(`Failed to deliver ${what}`, { player: player.label, error });
  }
}
