import type { SessionId, SessionStatus } from "../typedefs.js";

export class SessionStateError extends Error {
  constructor(
    public readonly sessionId: SessionId,
    public readonly status: SessionStatus,
  ) {
    super(`Game session ${sessionId} cannot run again (status: ${status})`);
    this.name = "SessionStateError";
  }
}
