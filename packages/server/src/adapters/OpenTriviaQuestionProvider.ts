import { z } from "zod";

import { insertCorrectChoice, type Logger, type Question, type QuestionProvider } from "../core.js";

export const DEFAULT_QUESTION_API_URL =
  "https://opentdb.com/api.php?amount=1&type=multiple&difficulty=easy&encode=url3986";

interface OpenTriviaQuestionProviderOptions {
  readonly apiUrl?: string;
  readonly timeoutMs?: number;
  /** Source of randomness in [0, 1) used to place the correct answer */
  readonly random?: () => number;
  readonly logger?: Logger;
}

const openTriviaResponseSchema = z.object({
  response_code: z.number(),
  results: z
    .array(
      z.object({
        question: z.string().min(1),
        correct_answer: z.string().min(1),
        incorrect_answers: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
});

/**
 * Fetches one multiple-choice question from the Open Trivia DB API. Strings are requested in
 * RFC 3986 encoding and decoded here.
 */
export class OpenTriviaQuestionProvider implements QuestionProvider {
  readonly #apiUrl: string;
  readonly #timeoutMs: number;
  readonly #random: () => number;
  readonly #logger: Logger | undefined;

  constructor({
    apiUrl = DEFAULT_QUESTION_API_URL,
    timeoutMs = 10_000,
    random = Math.random,
    logger,
  }: OpenTriviaQuestionProviderOptions = {}) {
    if (!apiUrl) {
      throw new Error("A question API URL is required");
    }

    this.#apiUrl = apiUrl;
    this.#timeoutMs = timeoutMs;
    this.#random = random;
    this.#logger = logger;
  }

  async fetchQuestion(): Promise<Question> {
    const response = await fetch(this.#apiUrl, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.#timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Question request failed: ${response.status} ${text}`);
    }

    const parsed = openTriviaResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(
        `Question response was malformed: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join("; ")}`,
      );
    }

    if (parsed.data.response_code !== 0) {
      throw new Error(`Question API returned response code ${parsed.data.response_code}`);
    }

    const [result] = parsed.data.results;
    if (!result) {
      throw new Error("Question API returned no results");
    }

    const incorrect = result.incorrect_answers.map(decode);
    const index = Math.floor(this.#random() * (incorrect.length + 1));
    const question = insertCorrectChoice(
      decode(result.question),
      incorrect,
      decode(result.correct_answer),
      Math.min(index, incorrect.length),
    );

    this.#logger?.debug?.("Question fetched", { prompt: question.prompt });
    return question;
  }
}

function decode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
