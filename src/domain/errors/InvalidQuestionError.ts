export class InvalidQuestionError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "InvalidQuestionError";
  }

  static because(issues: readonly string[]): InvalidQuestionError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid question"
        : issues.length === 1
          ? (firstIssue ?? "Invalid question")
          : `Invalid question: ${issues.join("; ")}`;
    return new InvalidQuestionError(message, issues);
  }
}
