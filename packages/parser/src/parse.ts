/**
 * Top-level driver: run a recognizer from the start of a text and return its
 * value, throwing the typed failure otherwise.
 */

import { config, createLogger } from "@backtrack/core";
import { failureFor, ReadLimitExceededError } from "./errors.js";
import { BoundedText, StringText } from "./text.js";
import type { Recognizer, Text } from "./types.js";

export interface ParseOptions {
  /**
   * Abort with `ReadLimitExceededError` after this many reads.
   * Defaults to `limits.maxReads` from the configuration; unbounded when unset.
   */
  maxReads?: number;
}

const log = createLogger("parse");

/**
 * Parse `text` with `parser` from its start cursor. The final cursor is
 * discarded; trailing input is not an error unless the grammar ends in `end()`.
 *
 * @throws NoMatch | EndOfText when the recognizer fails
 * @throws ReadLimitExceededError when the read budget runs out
 */
export function parse<T, E, C>(text: Text<E, C>, parser: Recognizer<T, E>, options: ParseOptions = {}): T {
  const maxReads = options.maxReads ?? config.maxReads();
  const source: Text<E, C> = maxReads === undefined ? text : new BoundedText(text, maxReads);

  log.debug(maxReads === undefined ? "parse started" : `parse started (maxReads ${maxReads})`);
  try {
    const r = parser.recognize(source, source.startCursor());
    if (!r.ok) {
      log.debug(`parse failed: ${r.kind}`);
      throw failureFor(r.kind);
    }
    log.debug("parse succeeded");
    return r.value;
  } catch (error) {
    if (error instanceof ReadLimitExceededError) {
      log.warn(error.message);
    }
    throw error;
  }
}

/** Parse an in-memory string. */
export function parseString<T>(input: string, parser: Recognizer<T, string>, options: ParseOptions = {}): T {
  return parse(new StringText(input), parser, options);
}
