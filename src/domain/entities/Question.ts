import { InvalidQuestionError } from "../errors/InvalidQuestionError.js";

/** One multiple-choice question, used for a single round */
export interface Question {
  readonly prompt: string;
  readonly choices: readonly string[];
  /** Equals exactly one element of {@link choices} */
  readonly correctChoice: string;
}

/** What players see while the round is open */
export interface PublicQuestion {
  readonly prompt: string;
  readonly choices: readonly string[];
}

export function createQuestion(
  prompt: string,
  choices: readonly string[],
  correctChoice: string,
): Question {
  const issues = validateQuestion(prompt, choices, correctChoice);
  if (issues.length > 0) {
    throw InvalidQuestionError.because(issues);
  }

  return Object.freeze({
    prompt,
    choices: Object.freeze([...choices]),
    correctChoice,
  });
}

/**
 * Places the correct answer at `index` among the incorrect ones. `index` ranges over
 * `0..incorrectChoices.length` inclusive.
 */
export function insertCorrectChoice(
  prompt: string,
  incorrectChoices: readonly string[],
  correctChoice: string,
  index: number,
): Question {
  if (!Number.isInteger(index) || index < 0 || index > incorrectChoices.length) {
    throw new RangeError(`Insert position ${index} is out of range`);
  }

  const choices = [
    ...incorrectChoices.slice(0, index),
    correctChoice,
    ...incorrectChoices.slice(index),
  ];
  return createQuestion(prompt, choices, correctChoice);
}

export function toPublicQuestion(question: Question): PublicQuestion {
  return { prompt: question.prompt, choices: [...question.choices] };
}

function validateQuestion(
  prompt: string,
  choices: readonly string[],
  correctChoice: string,
): string[] {
  const issues: string[] = [];

  if (prompt.length === 0) {
    issues.push("Prompt must not be empty");
  }

  if (choices.length < 2) {
    issues.push("A question needs at least two choices");
  }

  if (new Set(choices).size !== choices.length) {
    issues.push("Choices must be unique");
  }

  if (!choices.includes(correctChoice)) {
    issues.push("Correct choice must be one of the choices");
  }

  return issues;
}
