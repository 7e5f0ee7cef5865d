import type { SessionId } from "../typedefs.js";

export class SessionAbortedError extends Error {
  constructor(
    public readonly sessionId: SessionId,
    cause: unknown,
  ) {
    super(`Game session ${sessionId} aborted: ${describeCause(cause)}`, { cause });
    this.name = "SessionAbortedError";
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
