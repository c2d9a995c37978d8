/**
 * Base class for every error peglogic raises on purpose.
 *
 * Parse failure is not one of them: a failed match is an empty derivation
 * sequence. These errors mean a grammar or pattern was put together wrong.
 */
export class PeglogicError extends Error {
  /** Stable, machine-readable error kind */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "PeglogicError";
    this.code = code;
  }
}
