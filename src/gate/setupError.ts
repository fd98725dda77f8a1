export type SetupErrorReason = "corpus_dir_missing" | "empty_corpus" | "parser_missing";

/**
 * A precondition failure that stops the run before any file is processed.
 * Reported with its own exit code, distinct from a failed gate.
 */
export class SetupError extends Error {
  readonly reason: SetupErrorReason;

  constructor(reason: SetupErrorReason, message: string) {
    super(message);
    this.name = "SetupError";
    this.reason = reason;
  }
}
