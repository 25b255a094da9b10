/**
 * Derived combinators.
 *
 * Everything here is composed from the primitives and structural combinators;
 * nothing reads the text directly.
 */

import { alternative, alternativeOf, apply, many, sequence, sequenceOf } from "./combinators.js";
import { char, charRange, element, epsilon, predicate } from "./primitives.js";
import type { Recognizer } from "./types.js";

// ---------------------------------------------------------------------------
// Sequences of elements
// ---------------------------------------------------------------------------

/** Concatenate a list of string results into one string. */
export function join<E = string>(p: Recognizer<readonly string[], E>): Recognizer<string, E> {
  return apply(p, (parts) => parts.join(""));
}

/** Match an exact string, one UTF-16 code unit at a time. */
export function literal(s: string): Recognizer<string, string> {
  return join(sequenceOf(s.split("").map((c) => char(c))));
}

/** Match any one of the given elements, tried in order. */
export function oneOf<E>(elements: Iterable<E>): Recognizer<E, E> {
  return alternativeOf(Array.from(elements, (e) => element(e)));
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or one: `p`'s value, or `null` when `p` fails. */
export function optional<T, E = string>(p: Recognizer<T, E>): Recognizer<T | null, E> {
  return alternative(p, epsilon<E>());
}

/**
 * One or more repetitions. Fails with `NoMatch` exactly when `p` fails on the
 * first attempt; the one-branch alternative folds `EndOfText` into `NoMatch`.
 */
export function many1<T, E = string>(p: Recognizer<T, E>): Recognizer<T[], E> {
  return apply(sequence(alternative(p), many(p)), ([first, rest]) => [first, ...rest]);
}

/** One or more `p`, separated by `sep`; separator values are dropped. */
export function sepBy1<T, S, E = string>(p: Recognizer<T, E>, sep: Recognizer<S, E>): Recognizer<T[], E> {
  const next = apply(sequence(sep, p), ([, item]) => item);
  return apply(sequence(p, many(next)), ([first, rest]) => [first, ...rest]);
}

/** Zero or more `p`, separated by `sep`. */
export function sepBy<T, S, E = string>(p: Recognizer<T, E>, sep: Recognizer<S, E>): Recognizer<T[], E> {
  return apply(optional(sepBy1(p, sep)), (items) => items ?? []);
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C, E = string>(
  open: Recognizer<O, E>,
  p: Recognizer<T, E>,
  close: Recognizer<C, E>
): Recognizer<T, E> {
  return apply(sequence(open, p, close), ([, inner]) => inner);
}

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

const WHITESPACE = new Set([" ", "\t", "\r", "\n", "\f", "\v"]);

/** Match a single ASCII digit [0-9]. */
export function digit(): Recognizer<string, string> {
  return charRange("0", "9");
}

/** Match a single ASCII letter [a-zA-Z]. */
export function letter(): Recognizer<string, string> {
  return alternative(charRange("a", "z"), charRange("A", "Z"));
}

/** Match a single ASCII whitespace character. */
export function whitespace(): Recognizer<string, string> {
  return predicate((c: string) => WHITESPACE.has(c));
}

/** One or more digits, joined. */
export function digits(): Recognizer<string, string> {
  return join(many1(digit()));
}

/** One or more letters, joined. */
export function letters(): Recognizer<string, string> {
  return join(many1(letter()));
}

/** One or more whitespace characters, joined. */
export function spaces(): Recognizer<string, string> {
  return join(many1(whitespace()));
}

/** Parse `p` surrounded by optional whitespace. */
export function token<T>(p: Recognizer<T, string>): Recognizer<T, string> {
  const ws = many(whitespace());
  return between(ws, p, ws);
}

/**
 * Parse an integer (with optional leading minus).
 *
 * The value is a JS number: digit runs beyond `Number.MAX_SAFE_INTEGER` are
 * rounded to the nearest representable double, not rejected.
 */
export function integer(): Recognizer<number, string> {
  return apply(sequence(optional(char("-")), digits()), ([sign, ds]) => {
    const n = parseInt(ds, 10);
    return sign ? -n : n;
  });
}
