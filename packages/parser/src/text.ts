/**
 * Text sources.
 *
 * A `Text` only hands out cursors and reads at them. Cursors are immutable
 * values, so any earlier cursor stays valid after a later attempt fails.
 */

import * as fs from "fs";
import { ReadLimitExceededError } from "./errors.js";
import type { ReadResult, Text } from "./types.js";

/** A position in an indexed text: the offset of the next element. */
export class IndexCursor {
  readonly index: number;

  constructor(index: number) {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Cursor index must be a non-negative integer, got ${index}`);
    }
    this.index = index;
  }

  next(): IndexCursor {
    return new IndexCursor(this.index + 1);
  }
}

const END_OF_TEXT = { ok: false, kind: "EndOfText" } as const;

/** Any readonly array of elements, e.g. the output of a lexer. */
export class ArrayText<E> implements Text<E, IndexCursor> {
  constructor(private readonly elements: readonly E[]) {}

  get length(): number {
    return this.elements.length;
  }

  startCursor(): IndexCursor {
    return new IndexCursor(0);
  }

  read(cursor: IndexCursor): ReadResult<E, IndexCursor> {
    if (cursor.index >= this.elements.length) {
      return END_OF_TEXT;
    }
    return { ok: true, element: this.elements[cursor.index], cursor: cursor.next() };
  }
}

/** An in-memory string, read one UTF-16 code unit at a time. */
export class StringText implements Text<string, IndexCursor> {
  constructor(private readonly source: string) {}

  get length(): number {
    return this.source.length;
  }

  startCursor(): IndexCursor {
    return new IndexCursor(0);
  }

  read(cursor: IndexCursor): ReadResult<string, IndexCursor> {
    if (cursor.index >= this.source.length) {
      return END_OF_TEXT;
    }
    return { ok: true, element: this.source[cursor.index], cursor: cursor.next() };
  }

  /** The text between two cursors, e.g. the span a recognizer consumed. */
  slice(from: IndexCursor, to: IndexCursor): string {
    return this.source.slice(from.index, to.index);
  }
}

/**
 * A file read on first use rather than at construction.
 *
 * Once loaded the contents are fixed for the lifetime of the instance, so reads
 * stay referentially transparent even if the file changes on disk.
 */
export class FileText implements Text<string, IndexCursor> {
  private loaded: StringText | undefined;

  constructor(
    readonly path: string,
    private readonly encoding: BufferEncoding = "utf8"
  ) {}

  get isLoaded(): boolean {
    return this.loaded !== undefined;
  }

  startCursor(): IndexCursor {
    return this.contents().startCursor();
  }

  read(cursor: IndexCursor): ReadResult<string, IndexCursor> {
    return this.contents().read(cursor);
  }

  private contents(): StringText {
    if (!this.loaded) {
      this.loaded = new StringText(fs.readFileSync(this.path, this.encoding));
    }
    return this.loaded;
  }
}

/**
 * Counts reads against another text and throws `ReadLimitExceededError` once
 * more than `limit` reads have been made. One instance per parse run.
 */
export class BoundedText<E, C> implements Text<E, C> {
  private reads = 0;

  constructor(
    private readonly inner: Text<E, C>,
    readonly limit: number
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Read limit must be a positive integer, got ${limit}`);
    }
  }

  get readCount(): number {
    return this.reads;
  }

  startCursor(): C {
    return this.inner.startCursor();
  }

  read(cursor: C): ReadResult<E, C> {
    this.reads++;
    if (this.reads > this.limit) {
      throw new ReadLimitExceededError(this.limit);
    }
    return this.inner.read(cursor);
  }
}
