/**
 * Fundamental recognizers.
 *
 * Each element-reading primitive fails with `EndOfText` when the source is
 * exhausted and `NoMatch` when the element is present but rejected.
 */

import type { Failure, Recognition, Recognizer, Text } from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a Recognizer from a raw recognize function. */
export function recognizer<T, E = string>(
  recognizeFn: <C>(text: Text<E, C>, cursor: C) => Recognition<T, C>
): Recognizer<T, E> {
  return { recognize: recognizeFn };
}

export function ok<T, C>(value: T, cursor: C): Recognition<T, C> {
  return { ok: true, value, cursor };
}

export const NO_MATCH: Failure = { ok: false, kind: "NoMatch" };

/** Read one element and keep it only if `accept` holds. */
function satisfying<E>(accept: (element: E) => boolean): Recognizer<E, E> {
  return recognizer<E, E>((text, cursor) => {
    const r = text.read(cursor);
    if (!r.ok) return r;
    if (!accept(r.element)) return NO_MATCH;
    return ok(r.element, r.cursor);
  });
}

// ---------------------------------------------------------------------------
// Element recognizers
// ---------------------------------------------------------------------------

/** Match one element equal to `target` (by `Object.is` unless `equals` is given). */
export function element<E>(
  target: E,
  equals: (a: E, b: E) => boolean = Object.is
): Recognizer<E, E> {
  return satisfying((e) => equals(e, target));
}

/** Match a single specific character. */
export function char(c: string): Recognizer<string, string> {
  if (c.length !== 1) {
    throw new RangeError(`char() expects exactly one character, got ${JSON.stringify(c)}`);
  }
  return element(c);
}

/** Match one element accepted by `test`. */
export function predicate<E>(test: (element: E) => boolean): Recognizer<E, E> {
  return satisfying(test);
}

/** Ordering used by `range`: negative, zero or positive like `Array.prototype.sort`. */
export type Compare<E> = (a: E, b: E) => number;

function naturalOrder<V extends string | number | bigint>(a: V, b: V): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Match one element in the inclusive range [min, max].
 *
 * @throws RangeError when `min` orders after `max`
 */
export function range<E extends string | number | bigint>(min: E, max: E): Recognizer<E, E>;
export function range<E>(min: E, max: E, compare: Compare<E>): Recognizer<E, E>;
export function range<E>(min: E, max: E, compare?: Compare<E>): Recognizer<E, E> {
  const order = compare ?? defaultCompare;
  if (order(min, max) > 0) {
    throw new RangeError(`range() requires min <= max, got ${String(min)} > ${String(max)}`);
  }
  return satisfying((e) => order(min, e) <= 0 && order(e, max) <= 0);
}

function defaultCompare(a: unknown, b: unknown): number {
  if (typeof a === "string" && typeof b === "string") return naturalOrder(a, b);
  if (typeof a === "number" && typeof b === "number") return naturalOrder(a, b);
  if (typeof a === "bigint" && typeof b === "bigint") return naturalOrder(a, b);
  throw new TypeError("range() needs a compare function for non-primitive elements");
}

/** Match a single character in the inclusive range [from, to]. */
export function charRange(from: string, to: string): Recognizer<string, string> {
  if (from.length !== 1 || to.length !== 1) {
    throw new RangeError(`charRange() expects single characters, got ${JSON.stringify(from)}..${JSON.stringify(to)}`);
  }
  return range(from, to);
}

/** Match any single element. */
export function anyElement<E = string>(): Recognizer<E, E> {
  return satisfying<E>(() => true);
}

// ---------------------------------------------------------------------------
// Zero-width recognizers
// ---------------------------------------------------------------------------

/**
 * Match end of input. The only recognizer that succeeds on `EndOfText`;
 * it fails with `NoMatch` while an element is still available.
 */
export function end<E = string>(): Recognizer<null, E> {
  return recognizer<null, E>((text, cursor) => {
    const r = text.read(cursor);
    if (r.ok) return NO_MATCH;
    return ok(null, cursor);
  });
}

/** Always succeed with `null`, consuming nothing. */
export function epsilon<E = string>(): Recognizer<null, E> {
  return recognizer<null, E>((_text, cursor) => ok(null, cursor));
}
