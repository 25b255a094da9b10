/**
 * Errors thrown at the driver boundary.
 *
 * Inside the engine a failure is a `Recognition` value; `parse` turns the final
 * failure of a run into one of these.
 */

import type { FailureKind } from "./types.js";

/** A recognition failure surfaced to the caller of `parse`. */
export abstract class ParseError extends Error {
  abstract readonly kind: FailureKind;
}

/** Input was available but did not satisfy the recognizer. */
export class NoMatch extends ParseError {
  readonly kind = "NoMatch";

  constructor(message = "Input did not match") {
    super(message);
    this.name = "NoMatch";
  }
}

/** The text source was exhausted at the attempted read. */
export class EndOfText extends ParseError {
  readonly kind = "EndOfText";

  constructor(message = "Unexpected end of text") {
    super(message);
    this.name = "EndOfText";
  }
}

/** Map a failure kind to the error `parse` throws for it. */
export function failureFor(kind: FailureKind): ParseError {
  return kind === "EndOfText" ? new EndOfText() : new NoMatch();
}

/**
 * A run read more elements than its budget allows.
 *
 * Thrown out of `BoundedText.read`; no combinator treats it as a failure kind,
 * so it always unwinds the whole parse.
 */
export class ReadLimitExceededError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Read limit of ${limit} exceeded`);
    this.name = "ReadLimitExceededError";
    this.limit = limit;
  }
}
