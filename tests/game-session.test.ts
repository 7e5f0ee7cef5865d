import { describe, expect, it, vi } from "vitest";

import {
  InMemoryPlayerConnection,
  SILENT,
} from "../src/adapters/in-memory/InMemoryPlayerConnection.js";
import { createGameConfig } from "../src/domain/GameConfig.js";
import { SessionAbortedError } from "../src/domain/errors/SessionAbortedError.js";
import { SessionStateError } from "../src/domain/errors/SessionStateError.js";
import {
  MESSAGE_CORRECT_MOVING_TO_NEXT_ROUND,
  MESSAGE_NETWORK_ERROR_OCCURRED,
  MESSAGE_YOU_ARE_ELIMINATED,
  MESSAGE_YOU_ARE_THE_WINNER,
} from "../src/domain/messages.js";
import { executeRound } from "../src/domain/round/executeRound.js";
import { GameSession, type RoundExecutor } from "../src/domain/session/GameSession.js";
import {
  StalledPlayer,
  createGameContext,
  expireAnswerDeadlines,
  sampleQuestion,
} from "./support/mocks.js";

/** Wraps the real round engine and records how many players entered each round */
function recordingExecutor(): { readonly execute: RoundExecutor; readonly sizes: number[] } {
  const sizes: number[] = [];
  return {
    sizes,
    execute: async (players, roundNumber, ctx) => {
      sizes.push(players.length);
      return executeRound(players, roundNumber, ctx);
    },
  };
}

describe("GameSession", () => {
  it("declares the winner after one round when the other player answers wrong", async () => {
    const context = createGameContext();
    context.questionProvider.fetchQuestion.mockResolvedValue(sampleQuestion());
    const alice = new InMemoryPlayerConnection("alice", ["C"]);
    const bob = new InMemoryPlayerConnection("bob", ["D"]);
    const session = new GameSession(7, [alice, bob], context);

    const outcome = await session.run();

    expect(outcome).toEqual({ sessionId: 7, rounds: 1, winner: alice });
    expect(session.status).toBe("complete");
    expect(session.roundNumber).toBe(1);
    expect(session.players).toEqual([]);
    expect(alice.completeCalls).toBe(1);
    expect(bob.completeCalls).toBe(1);
    expect(alice.announcements).toEqual([
      "Round 1 is starting!",
      MESSAGE_CORRECT_MOVING_TO_NEXT_ROUND,
      MESSAGE_YOU_ARE_THE_WINNER,
    ]);
    expect(bob.announcements).toEqual(["Round 1 is starting!", MESSAGE_YOU_ARE_ELIMINATED]);
  });

  it("keeps playing while everybody answers correctly", async () => {
    const context = createGameContext();
    context.questionProvider.fetchQuestion
      .mockResolvedValueOnce(sampleQuestion("Question 1", "C"))
      .mockResolvedValueOnce(sampleQuestion("Question 2", "A"))
      .mockResolvedValueOnce(sampleQuestion("Question 3", "B"));
    const alice = new InMemoryPlayerConnection("alice", ["C", "A", "B"]);
    const bob = new InMemoryPlayerConnection("bob", ["C", "A", "D"]);
    const recorder = recordingExecutor();
    const session = new GameSession(1, [alice, bob], context, recorder.execute);

    const outcome = await session.run();

    expect(outcome).toEqual({ sessionId: 1, rounds: 3, winner: alice });
    expect(recorder.sizes).toEqual([2, 2, 2]);
    expect(bob.completeCalls).toBe(1);
    expect(alice.completeCalls).toBe(1);
    expect(bob.announcements.at(-1)).toBe(MESSAGE_YOU_ARE_ELIMINATED);
  });

  it("eliminates a player who times out just like a wrong answer", async () => {
    const context = createGameContext();
    context.questionProvider.fetchQuestion.mockResolvedValue(sampleQuestion());
    const alice = new InMemoryPlayerConnection("alice", ["C"]);
    const bob = new InMemoryPlayerConnection("bob", [SILENT]);
    const session = new GameSession(1, [alice, bob], context);

    const run = session.run();
    await expireAnswerDeadlines(context, 1);
    const outcome = await run;

    expect(outcome.winner).toBe(alice);
    expect(bob.completeCalls).toBe(1);
    expect(bob.announcements).toEqual(["Round 1 is starting!", MESSAGE_YOU_ARE_ELIMINATED]);
  });

  it("completes every player when one player's transport stalls", async () => {
    const context = createGameContext();
    context.questionProvider.fetchQuestion.mockResolvedValue(sampleQuestion());
    const alice = new InMemoryPlayerConnection("alice", ["C"]);
    const bob = new StalledPlayer("bob", ["C"]);
    const session = new GameSession(1, [alice, bob], context);

    const run = session.run();
    await expireAnswerDeadlines(context, 1);
    const outcome = await run;

    expect(outcome).toEqual({ sessionId: 1, rounds: 1, winner: alice });
    expect(alice.isComplete).toBe(true);
    expect(bob.isComplete).toBe(true);
    expect([alice.completeCalls, bob.completeCalls]).toEqual([1, 1]);
  });

  it("aborts, notifies and releases every player when the question source fails", async () => {
    const context = createGameContext();
    const failure = new Error("Network Error!!!");
    context.questionProvider.fetchQuestion.mockRejectedValue(failure);
    const alice = new InMemoryPlayerConnection("alice", ["A"]);
    const bob = new InMemoryPlayerConnection("bob", ["B"]);
    const session = new GameSession(3, [alice, bob], context);

    const error = await session.run().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SessionAbortedError);
    expect((error as SessionAbortedError).sessionId).toBe(3);
    expect((error as SessionAbortedError).cause).toBe(failure);
    expect(session.status).toBe("aborted");
    expect(session.players).toEqual([]);
    expect(alice.announcements).toEqual([MESSAGE_NETWORK_ERROR_OCCURRED]);
    expect(bob.announcements).toEqual([MESSAGE_NETWORK_ERROR_OCCURRED]);
    expect(alice.completeCalls).toBe(1);
    expect(bob.completeCalls).toBe(1);
    expect(context.logger.error).toHaveBeenCalledWith(
      "Error encountered in game session 3. Aborting game.",
      { error: failure },
    );
  });

  it("aborts mid-game without completing anybody twice", async () => {
    const context = createGameContext({ config: createGameConfig({ playersPerGame: 3 }) });
    context.questionProvider.fetchQuestion
      .mockResolvedValueOnce(sampleQuestion())
      .mockRejectedValueOnce(new Error("upstream unavailable"));
    const alice = new InMemoryPlayerConnection("alice", ["C"]);
    const bob = new InMemoryPlayerConnection("bob", ["C"]);
    const carol = new InMemoryPlayerConnection("carol", ["A"]);
    const session = new GameSession(1, [alice, bob, carol], context);

    await expect(session.run()).rejects.toBeInstanceOf(SessionAbortedError);

    expect(session.roundNumber).toBe(2);
    expect(carol.announcements).toEqual(["Round 1 is starting!", MESSAGE_YOU_ARE_ELIMINATED]);
    expect(alice.announcements).toEqual([
      "Round 1 is starting!",
      MESSAGE_CORRECT_MOVING_TO_NEXT_ROUND,
      MESSAGE_NETWORK_ERROR_OCCURRED,
    ]);
    expect([alice, bob, carol].map((player) => player.completeCalls)).toEqual([1, 1, 1]);
  });

  it("continues with the two survivors of a three-player round", async () => {
    const context = createGameContext({ config: createGameConfig({ playersPerGame: 3 }) });
    context.questionProvider.fetchQuestion.mockResolvedValue(sampleQuestion());
    const alice = new InMemoryPlayerConnection("alice", ["C", "C"]);
    const bob = new InMemoryPlayerConnection("bob", ["C", "B"]);
    const carol = new InMemoryPlayerConnection("carol", ["A"]);
    const recorder = recordingExecutor();
    const session = new GameSession(1, [alice, bob, carol], context, recorder.execute);

    const outcome = await session.run();

    expect(recorder.sizes).toEqual([3, 2]);
    expect(outcome).toEqual({ sessionId: 1, rounds: 2, winner: alice });
    expect(carol.announcements).toEqual(["Round 1 is starting!", MESSAGE_YOU_ARE_ELIMINATED]);
    expect(bob.announcements).toEqual([
      "Round 1 is starting!",
      MESSAGE_CORRECT_MOVING_TO_NEXT_ROUND,
      "Round 2 is starting!",
      MESSAGE_YOU_ARE_ELIMINATED,
    ]);
    expect([alice, bob, carol].map((player) => player.completeCalls)).toEqual([1, 1, 1]);
  });

  it("completes without a winner when everybody is eliminated", async () => {
    const context = createGameContext();
    context.questionProvider.fetchQuestion.mockResolvedValue(sampleQuestion());
    const alice = new InMemoryPlayerConnection("alice", ["A"]);
    const bob = new InMemoryPlayerConnection("bob", ["B"]);
    const session = new GameSession(1, [alice, bob], context);

    const outcome = await session.run();

    expect(outcome).toEqual({ sessionId: 1, rounds: 1, winner: undefined });
    expect(session.status).toBe("complete");
    expect(alice.announcements).not.toContain(MESSAGE_YOU_ARE_THE_WINNER);
    expect(bob.announcements).not.toContain(MESSAGE_YOU_ARE_THE_WINNER);
    expect([alice, bob].map((player) => player.completeCalls)).toEqual([1, 1]);
  });

  it("refuses to run a second time", async () => {
    const context = createGameContext();
    const execute = vi.fn<RoundExecutor>().mockResolvedValue({
      roundNumber: 1,
      question: undefined,
      tally: { counts: new Map(), unanswered: 0 },
      survivors: [],
      eliminated: [],
    });
    const session = new GameSession(1, [], context, execute);

    await session.run();

    await expect(session.run()).rejects.toBeInstanceOf(SessionStateError);
    expect(execute).toHaveBeenCalledTimes(1);
  });
});
