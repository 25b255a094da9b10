/**
 * Structural combinators: sequencing, ordered alternation, repetition and
 * result transformation.
 *
 * Cursors are values, so backtracking needs no save/restore: a failed attempt
 * simply never hands its cursor back, and every alternative branch is started
 * from the cursor the alternative itself received.
 */

import { NO_MATCH, ok, recognizer } from "./primitives.js";
import type { Recognizer } from "./types.js";

// ---------------------------------------------------------------------------
// Sequence
// ---------------------------------------------------------------------------

/**
 * Run each recognizer in order, threading the cursor forward.
 * Fails with the first child failure, whatever its kind.
 */
export function sequenceOf<T, E = string>(parsers: readonly Recognizer<T, E>[]): Recognizer<T[], E> {
  return recognizer<T[], E>((text, cursor) => {
    const results: T[] = [];
    let cur = cursor;
    for (const p of parsers) {
      const r = p.recognize(text, cur);
      if (!r.ok) return r;
      results.push(r.value);
      cur = r.cursor;
    }
    return ok(results, cur);
  });
}

/** Sequence recognizers, producing a tuple of their results. */
export function sequence<E = string>(): Recognizer<[], E>;
export function sequence<A, E = string>(a: Recognizer<A, E>): Recognizer<[A], E>;
export function sequence<A, B, E = string>(a: Recognizer<A, E>, b: Recognizer<B, E>): Recognizer<[A, B], E>;
export function sequence<A, B, C, E = string>(
  a: Recognizer<A, E>,
  b: Recognizer<B, E>,
  c: Recognizer<C, E>
): Recognizer<[A, B, C], E>;
export function sequence<A, B, C, D, E = string>(
  a: Recognizer<A, E>,
  b: Recognizer<B, E>,
  c: Recognizer<C, E>,
  d: Recognizer<D, E>
): Recognizer<[A, B, C, D], E>;
export function sequence<A, B, C, D, F, E = string>(
  a: Recognizer<A, E>,
  b: Recognizer<B, E>,
  c: Recognizer<C, E>,
  d: Recognizer<D, E>,
  f: Recognizer<F, E>
): Recognizer<[A, B, C, D, F], E>;
export function sequence<T, E = string>(...parsers: Recognizer<T, E>[]): Recognizer<T[], E>;
export function sequence<E>(...parsers: Recognizer<unknown, E>[]): Recognizer<unknown[], E> {
  return sequenceOf(parsers);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Ordered alternation: try each recognizer against the original cursor and
 * return the first success. Both failure kinds move on to the next branch;
 * when every branch fails the result is `NoMatch`.
 */
export function alternativeOf<T, E = string>(parsers: readonly Recognizer<T, E>[]): Recognizer<T, E> {
  return recognizer<T, E>((text, cursor) => {
    for (const p of parsers) {
      const r = p.recognize(text, cursor);
      if (r.ok) return r;
    }
    return NO_MATCH;
  });
}

/** Ordered alternation over recognizers of (possibly) different result types. */
export function alternative<A, E = string>(a: Recognizer<A, E>): Recognizer<A, E>;
export function alternative<A, B, E = string>(a: Recognizer<A, E>, b: Recognizer<B, E>): Recognizer<A | B, E>;
export function alternative<A, B, C, E = string>(
  a: Recognizer<A, E>,
  b: Recognizer<B, E>,
  c: Recognizer<C, E>
): Recognizer<A | B | C, E>;
export function alternative<A, B, C, D, E = string>(
  a: Recognizer<A, E>,
  b: Recognizer<B, E>,
  c: Recognizer<C, E>,
  d: Recognizer<D, E>
): Recognizer<A | B | C | D, E>;
export function alternative<T, E = string>(...parsers: Recognizer<T, E>[]): Recognizer<T, E>;
export function alternative<E>(...parsers: Recognizer<unknown, E>[]): Recognizer<unknown, E> {
  return alternativeOf(parsers);
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/**
 * Zero or more repetitions. Never fails: the first failure of `p`, of either
 * kind, ends the run at the cursor of the last success.
 *
 * `p` must consume input whenever it succeeds; a recognizer that can match
 * the empty input loops forever here.
 */
export function many<T, E = string>(p: Recognizer<T, E>): Recognizer<T[], E> {
  return recognizer<T[], E>((text, cursor) => {
    const results: T[] = [];
    let cur = cursor;
    for (;;) {
      const r = p.recognize(text, cur);
      if (!r.ok) break;
      results.push(r.value);
      cur = r.cursor;
    }
    return ok(results, cur);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a recognizer's result with a function; the cursor is untouched. */
export function apply<A, B, E = string>(p: Recognizer<A, E>, f: (a: A) => B): Recognizer<B, E> {
  return recognizer<B, E>((text, cursor) => {
    const r = p.recognize(text, cursor);
    if (!r.ok) return r;
    return ok(f(r.value), r.cursor);
  });
}

/** Lazy recognizer for recursive grammars. `f` is called on first use. */
export function lazy<T, E = string>(f: () => Recognizer<T, E>): Recognizer<T, E> {
  let cached: Recognizer<T, E> | null = null;
  return recognizer<T, E>((text, cursor) => {
    if (!cached) cached = f();
    return cached.recognize(text, cursor);
  });
}
