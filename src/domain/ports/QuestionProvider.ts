import type { Question } from "../entities/Question.js";

/**
 * Source of trivia questions. Implementations return a question whose correct
 * choice is already placed at a random position among the incorrect ones, and
 * reject when the upstream source fails. Retrying is their concern, not the
 * caller's.
 */
export interface QuestionProvider {
  fetchQuestion(): Promise<Question>;
}
