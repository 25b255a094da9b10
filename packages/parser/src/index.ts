/**
 * @backtrack/parser
 *
 * A backtracking recursive-descent parser-combinator engine.
 *
 * Provides:
 * - Text sources addressed by immutable cursors
 * - The recognizer contract and fundamental recognizers
 * - Sequencing, ordered alternation, repetition and transformation
 * - Derived conveniences composed from those
 *
 * @module
 */

// Core types
export type { FailureKind, Failure, ReadResult, Text, Recognition, Recognizer } from "./types.js";

// Text sources
export { IndexCursor, StringText, ArrayText, FileText, BoundedText } from "./text.js";

// Errors
export { ParseError, NoMatch, EndOfText, ReadLimitExceededError, failureFor } from "./errors.js";

// Fundamental recognizers
export {
  recognizer,
  element,
  char,
  predicate,
  range,
  charRange,
  anyElement,
  end,
  epsilon,
  type Compare,
} from "./primitives.js";

// Structural combinators
export { sequence, sequenceOf, alternative, alternativeOf, many, apply, lazy } from "./combinators.js";

// Derived combinators
export {
  join,
  literal,
  oneOf,
  optional,
  many1,
  sepBy1,
  sepBy,
  between,
  digit,
  letter,
  whitespace,
  digits,
  letters,
  spaces,
  token,
  integer,
} from "./library.js";

// Driver
export { parse, parseString, type ParseOptions } from "./parse.js";

// Tracing
export {
  RecognitionTracer,
  traced,
  formatTrace,
  type TraceOutcome,
  type TraceRecord,
} from "./trace.js";
