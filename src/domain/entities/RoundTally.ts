import type { Question } from "./Question.js";
import type { Answer } from "../typedefs.js";

/**
 * How many players picked each choice in one round. Answers that are missing or match no choice
 * exactly are counted in {@link unanswered}, so the totals always add up to the number of players.
 */
export interface RoundTally {
  /** One entry per choice, in choice order */
  readonly counts: ReadonlyMap<string, number>;
  readonly unanswered: number;
}

export const EMPTY_TALLY: RoundTally = { counts: new Map(), unanswered: 0 };

export function tallyAnswers(question: Question, answers: readonly Answer[]): RoundTally {
  const counts = new Map<string, number>(question.choices.map((choice) => [choice, 0]));
  let unanswered = 0;

  for (const answer of answers) {
    const current = answer === undefined ? undefined : counts.get(answer);
    if (answer === undefined || current === undefined) {
      unanswered += 1;
      continue;
    }
    counts.set(answer, current + 1);
  }

  return { counts, unanswered };
}

/** Counts aligned with `question.choices`, the shape sent to clients */
export function choiceCounts(question: Question, tally: RoundTally): number[] {
  return question.choices.map((choice) => tally.counts.get(choice) ?? 0);
}

export function totalVotes(tally: RoundTally): number {
  let total = tally.unanswered;
  for (const count of tally.counts.values()) {
    total += count;
  }
  return total;
}

export function isCorrectAnswer(question: Question, answer: Answer): boolean {
  return answer !== undefined && answer === question.correctChoice;
}
