/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { RawData, WebSocket } from "ws";
import { z } from "zod";

import {
  CompletionSignal,
  choiceCounts,
  toPublicQuestion,
  type Logger,
  type PlayerConnection,
  type Question,
  type RoundTally,
} from "../core.js";

export type RequestMethod = "ask_question" | "answers" | "announcement";

export interface OutboundRequest {
  readonly id: number;
  readonly method: RequestMethod;
  readonly params: object;
}

const replySchema = z.object({
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  error: z.string().nullable().optional(),
  result: z.string(),
});

type Waiter = (raw: string | undefined) => void;

const OPEN = 1;

/**
 * {@link PlayerConnection} over a `ws` socket. Requests follow a JSON-RPC-like envelope
 * `{id, method, params}` with ids starting at 1; replies are `{id, error, result}` and only
 * `result` is used.
 */
export class WebSocketPlayerConnection implements PlayerConnection {
  readonly label: string;
  readonly #socket: WebSocket;
  readonly #logger: Logger | undefined;
  readonly #completion: CompletionSignal;
  #nextRequestId = 1;
  #inbox: string[] = [];
  #waiter: Waiter | undefined;
  #closed = false;

  constructor(socket: WebSocket, label: string, logger?: Logger) {
    this.#socket = socket;
    this.label = label;
    this.#logger = logger;
    this.#completion = new CompletionSignal(label);

    socket.on("message", (data: RawData) => {
      this.#onMessage(rawToString(data));
    });

    socket.on("close", () => {
      this.#closed = true;
      this.#logger?.info("Player disconnected", { player: this.label });
      this.#settleWaiter(undefined);
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn("Player socket error", { player: this.label, error });
    });
  }

  get completed(): Promise<void> {
    return this.#completion.promise;
  }

  get isComplete(): boolean {
    return this.#completion.isComplete;
  }

  async sendQuestion(question: Question): Promise<void> {
    // anything received before the question went out belongs to an earlier round
    this.#inbox = [];
    this.#sendRequest("ask_question", toPublicQuestion(question));
  }

  async sendAnnouncement(message: string): Promise<void> {
    this.#sendRequest("announcement", { message });
  }

  async sendResults(question: Question, tally: RoundTally): Promise<void> {
    this.#sendRequest("answers", {
      question: {
        prompt: question.prompt,
        choices: [...question.choices],
        correctChoice: question.correctChoice,
      },
      choiceCounts: choiceCounts(question, tally),
      unanswered: tally.unanswered,
    });
  }

  async receiveAnswer(signal?: AbortSignal): Promise<string | undefined> {
    const raw = await this.#nextMessage(signal);
    return raw === undefined ? undefined : this.#parseReply(raw);
  }

  signalComplete(): void {
    this.#completion.complete();
  }

  close(): void {
    if (this.#closed) {
      return;
    }
    try {
      this.#socket.close();
    } catch (error) {
      this.#logger?.warn("Failed to close player socket", { player: this.label, error });
    }
  }

  // Hands the frame to `ws` without waiting for the flush callback, which never fires for a
  // client that stops reading.
  #sendRequest(method: RequestMethod, params: object): void {
    const request: OutboundRequest = { id: this.#nextRequestId, method, params };
    this.#nextRequestId += 1;

    if (this.#closed || this.#socket.readyState !== OPEN) {
      this.#logger?.warn("Dropping message for closed connection", {
        player: this.label,
        method,
      });
      return;
    }

    try {
      this.#socket.send(JSON.stringify(request), (error?: Error) => {
        if (error) {
          this.#logger?.warn("Failed to deliver message", {
            player: this.label,
            method,
            error,
          });
        }
      });
    } catch (error) {
      this.#logger?.warn("Failed to deliver message", { player: this.label, method, error });
    }
  }

  #nextMessage(signal?: AbortSignal): Promise<string | undefined> {
    const buffered = this.#inbox.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }

    if (this.#closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    if (this.#waiter) {
      throw new Error(`Concurrent receive on ${this.label}`);
    }

    return new Promise<string | undefined>((resolve) => {
      const onAbort = (): void => {
        if (this.#waiter === waiter) {
          this.#waiter = undefined;
        }
        resolve(undefined);
      };
      const waiter: Waiter = (raw) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(raw);
      };

      this.#waiter = waiter;
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  #onMessage(raw: string): void {
    if (this.#waiter) {
      this.#settleWaiter(raw);
      return;
    }
    this.#inbox.push(raw);
  }

  #settleWaiter(raw: string | undefined): void {
    const waiter = this.#waiter;
    this.#waiter = undefined;
    waiter?.(raw);
  }

  #parseReply(raw: string): string | undefined {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      this.#logger?.warn("Discarding malformed reply", { player: this.label, error });
      return undefined;
    }

    const parsed = replySchema.safeParse(payload);
    if (!parsed.success) {
      this.#logger?.warn("Discarding invalid reply", {
        player: this.label,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return undefined;
    }

    if (parsed.data.error !== undefined && parsed.data.error !== null) {
      this.#logger?.info("Player replied with an error", {
        player: this.label,
        error: parsed.data.error,
      });
      return undefined;
    }

    return parsed.data.result;
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}
