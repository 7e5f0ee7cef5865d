import { describe, expect, it } from "vitest";

import { CompletionSignal } from "../../src/domain/entities/CompletionSignal.js";
import { CompletionAlreadySignaledError } from "../../src/domain/errors/CompletionAlreadySignaledError.js";

describe("CompletionSignal", () => {
  it("resolves its promise when completed", async () => {
    const signal = new CompletionSignal("player-1");
    expect(signal.isComplete).toBe(false);

    signal.complete();

    await expect(signal.promise).resolves.toBeUndefined();
    expect(signal.isComplete).toBe(true);
  });

  it("refuses to complete twice", () => {
    const signal = new CompletionSignal("player-1");
    signal.complete();

    expect(() => signal.complete()).toThrowError(CompletionAlreadySignaledError);
    expect(() => signal.complete()).toThrowError("Completion already signaled for player-1");
  });
});
