export class CompletionAlreadySignaledError extends Error {
  constructor(public readonly label: string) {
    super(`Completion already signaled for ${label}`);
    this.name = "CompletionAlreadySignaledError";
  }
}
