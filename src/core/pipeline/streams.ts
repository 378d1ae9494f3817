/**
 * Streaming I/O between stages.
 *
 * A stage never knows where its items come from or go to: it reads an
 * {@link InputStream} and writes an {@link OutputStream}. Streams are finite,
 * forward-only and single-writer/single-reader. Writes become visible to the
 * reader only after `flush()`, in the order they were written.
 */

export interface InputStream<T> extends Iterable<T> {
  /** Number of items that can be read right now; 0 once the stream is exhausted */
  available(): number;
  /** Next item, or `undefined` at end of stream */
  read(): T | undefined;
  /**
   * Read up to `length` items into `buffer` starting at `offset`.
   * Returns the number of items read, 0 at end of stream.
   */
  readInto(buffer: T[], offset?: number, length?: number): number;
  /** Skip forward; returns how many items were actually skipped */
  skip(count: number): number;
  /** Rewind to the first item */
  reset(): void;
}

export interface OutputStream<T> {
  write(item: T): void;
  /** Write `items[offset .. offset + length)` */
  writeAll(items: readonly T[], offset?: number, length?: number): void;
  /** Make every buffered write visible to the reader */
  flush(): void;
}

function checkWindow(size: number, offset: number, length: number): void {
  if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0 || offset + length > size) {
    throw new RangeError(`Window [offset=${offset}, length=${length}] is outside a buffer of size ${size}`);
  }
}

/**
 * In-memory stream used to link two stages: one writes it, the next reads it.
 *
 * @example
 * ```typescript
 * const stream = new BufferedStream<string>();
 * stream.writeAll(["wa", "wow"]);
 * stream.available(); // 0, nothing flushed yet
 * stream.flush();
 * stream.read(); // "wa"
 * ```
 */
export class BufferedStream<T> implements InputStream<T>, OutputStream<T> {
  private committed: T[] = [];
  private pending: T[] = [];
  private position = 0;

  constructor(initial: Iterable<T> = []) {
    this.committed = Array.from(initial);
  }

  available(): number {
    return this.committed.length - this.position;
  }

  read(): T | undefined {
    if (this.position >= this.committed.length) {
      return undefined;
    }
    const item = this.committed[this.position];
    this.position++;
    return item;
  }

  readInto(buffer: T[], offset = 0, length = buffer.length - offset): number {
    checkWindow(buffer.length, offset, length);

    const count = Math.min(length, this.available());
    for (let i = 0; i < count; i++) {
      buffer[offset + i] = this.committed[this.position + i];
    }
    this.position += count;
    return count;
  }

  skip(count: number): number {
    if (count <= 0) return 0;
    const skipped = Math.min(count, this.available());
    this.position += skipped;
    return skipped;
  }

  reset(): void {
    this.position = 0;
  }

  write(item: T): void {
    this.pending.push(item);
  }

  writeAll(items: readonly T[], offset = 0, length = items.length - offset): void {
    checkWindow(items.length, offset, length);
    for (let i = offset; i < offset + length; i++) {
      this.pending.push(items[i]);
    }
  }

  flush(): void {
    if (this.pending.length === 0) return;
    this.committed.push(...this.pending);
    this.pending = [];
  }

  /** Items written but not yet flushed */
  get buffered(): number {
    return this.pending.length;
  }

  /** Everything visible to the reader, regardless of read position */
  toArray(): T[] {
    return [...this.committed];
  }

  *[Symbol.iterator](): Iterator<T> {
    while (this.position < this.committed.length) {
      const item = this.committed[this.position];
      this.position++;
      yield item;
    }
  }
}
