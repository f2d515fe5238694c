/**
 * Error taxonomy
 *
 *   RuleDataError - the rule dataset is missing or malformed. Fatal for the
 *                   whole scan: every report built on it would be unreliable.
 *   LogReadError  - one crash log could not be read. Counted as a failed log,
 *                   sibling logs keep going.
 */

export class RuleDataError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = "RuleDataError";
  }
}

export class LogReadError extends Error {
  constructor(readonly fileName: string, cause: unknown) {
    super(`Cannot read crash log ${fileName}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "LogReadError";
  }
}
