/** Longest line kept in the carry-over buffer before it is dropped. */
export const DEFAULT_MAX_LINE_LENGTH = 1024 * 1024;

/**
 * Incremental UTF-8 line splitter.
 *
 * Holds at most one incomplete line between chunks, so memory stays
 * bounded by chunk size plus `maxLineLength` no matter how large the
 * stream is. Multi-byte characters split across chunks are reassembled
 * by the streaming decoder.
 *
 * A line that grows past `maxLineLength` without a terminator is dropped
 * up to its next `\n` and counted in `droppedLines`.
 */
export class LineSplitter {
  private readonly decoder = new TextDecoder('utf-8');
  private carry = '';
  private discarding = false;
  private dropped = 0;

  constructor(private readonly maxLineLength: number = DEFAULT_MAX_LINE_LENGTH) {}

  /** Feeds one chunk and returns the lines it completed. */
  push(chunk: Uint8Array): string[] {
    const text = this.carry + this.decoder.decode(chunk, { stream: true });
    const lines: string[] = [];

    let start = 0;
    let nl = text.indexOf('\n', start);
    while (nl !== -1) {
      if (this.discarding) {
        // tail of an oversized line
        this.discarding = false;
      } else {
        lines.push(text.slice(start, nl));
      }
      start = nl + 1;
      nl = text.indexOf('\n', start);
    }

    const rest = text.slice(start);
    if (this.discarding) {
      this.carry = '';
    } else if (rest.length > this.maxLineLength) {
      this.carry = '';
      this.discarding = true;
      this.dropped++;
    } else {
      this.carry = rest;
    }

    return lines;
  }

  /** Flushes the decoder and returns the final unterminated line, if any. */
  end(): string[] {
    const tail = this.carry + this.decoder.decode();
    this.carry = '';
    if (this.discarding) {
      this.discarding = false;
      return [];
    }
    return tail === '' ? [] : [tail];
  }

  get droppedLines(): number {
    return this.dropped;
  }
}
