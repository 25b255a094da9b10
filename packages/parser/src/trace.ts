/**
 * Recognition Tracing
 *
 * Records which named recognizers ran, how deeply they were nested, and how
 * each attempt ended. Useful when a grammar backtracks somewhere unexpected.
 */

import { config, createLogger } from "@backtrack/core";
import { recognizer } from "./primitives.js";
import type { FailureKind, Recognition, Recognizer } from "./types.js";

/** How a traced attempt ended; "aborted" if it unwound with an exception. */
export type TraceOutcome = "match" | FailureKind | "aborted";

export interface TraceRecord {
  name: string;
  /** Nesting depth among traced recognizers, 0 for the outermost */
  depth: number;
  outcome: TraceOutcome;
}

const log = createLogger("trace");

/**
 * Collects trace records for recognizers wrapped with `traced`.
 *
 * Records are kept in the order attempts started, so a parent precedes the
 * attempts it made.
 */
export class RecognitionTracer {
  private records: TraceRecord[] = [];
  private depth = 0;
  private enabled: boolean;

  constructor(enabled: boolean = config.tracingEnabled()) {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  /**
   * Run `attempt` as the traced step `name`. When disabled this is just
   * `attempt()`.
   */
  run<T, C>(name: string, attempt: () => Recognition<T, C>): Recognition<T, C> {
    if (!this.enabled) return attempt();

    const index = this.records.length;
    const depth = this.depth;
    this.records.push({ name, depth, outcome: "aborted" });
    this.depth++;
    try {
      const result = attempt();
      const outcome: TraceOutcome = result.ok ? "match" : result.kind;
      this.records[index] = { name, depth, outcome };
      log.debug(`${"  ".repeat(depth)}${name}: ${outcome}`);
      return result;
    } finally {
      this.depth = depth;
    }
  }

  getAllRecords(): TraceRecord[] {
    return [...this.records];
  }

  clear(): void {
    this.records = [];
    this.depth = 0;
  }
}

/** Wrap `p` so every invocation is recorded in `tracer` under `name`. */
export function traced<T, E = string>(
  name: string,
  p: Recognizer<T, E>,
  tracer: RecognitionTracer
): Recognizer<T, E> {
  return recognizer<T, E>((text, cursor) => tracer.run(name, () => p.recognize(text, cursor)));
}

/** Render trace records as indented `name: outcome` lines. */
export function formatTrace(records: readonly TraceRecord[]): string[] {
  return records.map((r) => `${"  ".repeat(r.depth)}${r.name}: ${r.outcome}`);
}
