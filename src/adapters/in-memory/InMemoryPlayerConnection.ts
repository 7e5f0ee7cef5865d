/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { CompletionSignal } from "../../domain/entities/CompletionSignal.js";
import type { Question } from "../../domain/entities/Question.js";
import { choiceCounts, type RoundTally } from "../../domain/entities/RoundTally.js";
import type { PlayerConnection } from "../../domain/ports/PlayerConnection.js";

export type SentMessage =
  | { readonly method: "ask_question"; readonly prompt: string; readonly choices: readonly string[] }
  | {
      readonly method: "answers";
      readonly question: Question;
      readonly choiceCounts: readonly number[];
      readonly unanswered: number;
    }
  | { readonly method: "announcement"; readonly message: string };

/**
 * A scripted answer for one round. {@link SILENT} never replies, so only a timeout or an abort
 * ends the wait.
 */
export type ScriptedReply = string | typeof SILENT | { readonly fail: Error };

export const SILENT = Object.freeze({ silent: true as const });

/**
 * Player connection that lives entirely in memory. Replies are taken from a script, one per
 * question; once the script runs out the player stays silent.
 */
export class InMemoryPlayerConnection implements PlayerConnection {
  readonly label: string;
  readonly sent: SentMessage[] = [];
  #script: ScriptedReply[];
  #completeCalls = 0;
  #closed = false;
  readonly #completion: CompletionSignal;

  constructor(label: string, script: readonly ScriptedReply[] = []) {
    this.label = label;
    this.#script = [...script];
    this.#completion = new CompletionSignal(label);
  }

  get completed(): Promise<void> {
    return this.#completion.promise;
  }

  get isComplete(): boolean {
    return this.#completion.isComplete;
  }

  /** How many times {@link signalComplete} was called, failed calls included */
  get completeCalls(): number {
    return this.#completeCalls;
  }

  get isClosed(): boolean {
    return this.#closed;
  }

  get announcements(): string[] {
    return this.sent.flatMap((message) =>
      message.method === "announcement" ? [message.message] : [],
    );
  }

  async sendQuestion(question: Question): Promise<void> {
    this.sent.push({
      method: "ask_question",
      prompt: question.prompt,
      choices: [...question.choices],
    });
  }

  async sendAnnouncement(message: string): Promise<void> {
    this.sent.push({ method: "announcement", message });
  }

  async sendResults(question: Question, tally: RoundTally): Promise<void> {
    this.sent.push({
      method: "answers",
      question,
      choiceCounts: choiceCounts(question, tally),
      unanswered: tally.unanswered,
    });
  }

  receiveAnswer(signal?: AbortSignal): Promise<string | undefined> {
    const [reply, ...rest] = this.#script;
    this.#script = rest;

    if (reply === undefined || reply === SILENT) {
      return new Promise((resolve) => {
        if (signal?.aborted) {
          resolve(undefined);
          return;
        }
        signal?.addEventListener("abort", () => resolve(undefined), { once: true });
      });
    }

    if (typeof reply === "string") {
      return Promise.resolve(reply);
    }

    if ("fail" in reply) {
      return Promise.reject(reply.fail);
    }

    return Promise.resolve(undefined);
  }

  signalComplete(): void {
    this.#completeCalls += 1;
    this.#completion.complete();
  }

  close(): void {
    this.#closed = true;
  }
}
