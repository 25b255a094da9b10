/**
 * Core types for @backtrack/parser
 *
 * Defines the text source contract, the recognition result, and the recognizer
 * interface every primitive and combinator implements.
 */

/** The two ways a recognizer can fail. */
export type FailureKind = "EndOfText" | "NoMatch";

export type Failure = { ok: false; kind: FailureKind };

/** Result of reading one element: the element and the cursor after it, or exhaustion. */
export type ReadResult<E, C> =
  | { ok: true; element: E; cursor: C }
  | { ok: false; kind: "EndOfText" };

/**
 * A fully addressable input of elements `E`, positioned by opaque cursors `C`.
 *
 * Reads are referentially transparent: reading at the same cursor always yields
 * the same element and the same successor cursor.
 */
export interface Text<E, C> {
  /** The cursor of the first element. */
  startCursor(): C;
  read(cursor: C): ReadResult<E, C>;
}

/** Result of a recognition attempt — success with a value and the advanced cursor, or a failure kind. */
export type Recognition<T, C> = { ok: true; value: T; cursor: C } | Failure;

/**
 * A recognizer attempts to match input of elements `E` at a cursor.
 *
 * `recognize` is generic in the cursor type, so one recognizer graph runs over
 * any text source with the right element type without seeing its cursors.
 */
export interface Recognizer<T, E = string> {
  recognize<C>(text: Text<E, C>, cursor: C): Recognition<T, C>;
}
