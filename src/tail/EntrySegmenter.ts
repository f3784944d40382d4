/**
 * Entry Segmenter
 *
 * Groups physical lines into logical entries. A line that starts with a
 * bracketed date/time opens a new entry; every following line up to the
 * next such header belongs to it. An entry is only known to be complete
 * once the next header arrives, so the trailing entry is carried over
 * between feeds until then, or until a forced flush on stop, on idle or
 * on rotation.
 *
 * Lines are classified only once their newline has been read, which makes
 * the output independent of how the input was chunked.
 *
 * Known limitation: a continuation line that happens to start with a
 * timestamp in brackets is taken as a header and splits the entry.
 */

import { StringDecoder } from 'string_decoder';

/** `[2024-01-01 10:00:00]`, `[2024-01-01T10:00:00.123456+00:00]`, ... */
export const DEFAULT_HEADER_PATTERN = /^\[\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}[^\]\n]*\]/;

type PendingState =
  | { kind: 'empty' }
  | {
      kind: 'pending';
      /** Entry text so far, possibly ending in an unterminated line */
      text: string;
      /** Offset just past the last newline already classified */
      scanned: number;
    };

export interface EntrySegmenterOptions {
  headerPattern?: RegExp;
}

export class EntrySegmenter {
  private state: PendingState = { kind: 'empty' };
  private decoder = new StringDecoder('utf8');
  private readonly headerPattern: RegExp;

  constructor(options: EntrySegmenterOptions = {}) {
    this.headerPattern = options.headerPattern ?? DEFAULT_HEADER_PATTERN;
  }

  /**
   * Consume newly read bytes and return the entries they completed,
   * in file order. Invalid UTF-8 becomes U+FFFD; a character split
   * across two feeds is decoded once both halves have arrived.
   */
  feed(chunk: Buffer | string): string[] {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    if (text.length === 0) {
      return [];
    }

    let buffer = this.state.kind === 'pending' ? this.state.text + text : text;
    let scanned = this.state.kind === 'pending' ? this.state.scanned : 0;
    const completed: string[] = [];

    for (;;) {
      const newline = buffer.indexOf('\n', scanned);
      if (newline === -1) break;

      if (scanned > 0 && this.isHeaderLine(buffer.slice(scanned, newline))) {
        completed.push(buffer.slice(0, scanned));
        buffer = buffer.slice(scanned);
        scanned = 0;
        continue;
      }

      scanned = newline + 1;
    }

    this.state = { kind: 'pending', text: buffer, scanned };
    return completed;
  }

  /**
   * Emit whatever is pending, complete or not. Used when the watch stops
   * and when the file has gone quiet.
   */
  flush(): string[] {
    const tail = this.decoder.end();
    if (tail.length > 0) {
      this.state =
        this.state.kind === 'pending'
          ? { ...this.state, text: this.state.text + tail }
          : { kind: 'pending', text: tail, scanned: 0 };
    }

    if (this.state.kind === 'empty') {
      return [];
    }

    const { text, scanned } = this.state;
    this.state = { kind: 'empty' };

    if (text.length === 0) {
      return [];
    }

    // The unterminated last line is classified here for the first time.
    if (scanned > 0 && scanned < text.length && this.isHeaderLine(text.slice(scanned))) {
      return [text.slice(0, scanned), text.slice(scanned)];
    }
    return [text];
  }

  /**
   * Emit the newline-terminated part of the pending entry and drop the
   * rest, then start over. Used when the file is rotated: the old file's
   * last entry is final, but an unterminated line of it can never be
   * completed.
   */
  flushTerminated(): string[] {
    const terminated = this.state.kind === 'pending' ? this.state.text.slice(0, this.state.scanned) : '';
    this.reset();
    return terminated.length > 0 ? [terminated] : [];
  }

  /**
   * Drop the pending entry and any half-decoded character. A partial entry
   * from before a truncation can never be completed.
   */
  reset(): void {
    this.state = { kind: 'empty' };
    this.decoder = new StringDecoder('utf8');
  }

  hasPending(): boolean {
    return this.state.kind === 'pending' && this.state.text.length > 0;
  }

  /**
   * True when an entry is pending and its last line is newline-terminated.
   */
  isPendingLineComplete(): boolean {
    return this.state.kind === 'pending' && this.state.text.endsWith('\n');
  }

  isHeaderLine(line: string): boolean {
    return this.headerPattern.test(line);
  }
}
