import { CompletionAlreadySignaledError } from "../errors/CompletionAlreadySignaledError.js";

/**
 * One-shot signal: a promise that is resolved exactly once. A second {@link complete} call is a
 * programming error and throws.
 */
export class CompletionSignal {
  readonly promise: Promise<void>;
  readonly #label: string;
  #resolve: () => void = () => undefined;
  #done = false;

  constructor(label: string) {
    this.#label = label;
    this.promise = new Promise<void>((resolve) => {
      this.#resolve = resolve;
    });
  }

  get isComplete(): boolean {
    return this.#done;
  }

  complete(): void {
    if (this.#done) {
      throw new CompletionAlreadySignaledError(this.#label);
    }
    this.#done = true;
    this.#resolve();
  }
}
