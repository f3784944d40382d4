/**
 * Record Buffer
 *
 * Keeps the most recent delivered records for display, oldest first.
 * Clearing the buffer is a display action only; it never touches the
 * watch cursor.
 */

import type { LogRecord } from './LogRecord.js';
import { accept, FilterState } from './SeverityFilter.js';

export const DEFAULT_BUFFER_SIZE = 5000;

export class RecordBuffer {
  private records: LogRecord[] = [];
  private maxSize: number;
  private dropped = 0;

  constructor(maxSize: number = DEFAULT_BUFFER_SIZE) {
    this.maxSize = Math.max(1, maxSize);
  }

  /**
   * Append a record, evicting the oldest when full
   */
  add(record: LogRecord): void {
    this.records.push(record);
    this.trim();
  }

  addAll(records: readonly LogRecord[]): void {
    for (const record of records) {
      this.add(record);
    }
  }

  /**
   * All buffered records in file order
   */
  getAll(): readonly LogRecord[] {
    return this.records;
  }

  /**
   * Buffered records re-judged against a filter snapshot. Used to hide rows
   * of a severity the user has just switched off.
   */
  getVisible(filter: FilterState): LogRecord[] {
    return this.records.filter((record) => accept(record, filter));
  }

  get(index: number): LogRecord | undefined {
    return this.records[index];
  }

  size(): number {
    return this.records.length;
  }

  getMaxSize(): number {
    return this.maxSize;
  }

  setMaxSize(size: number): void {
    this.maxSize = Math.max(1, size);
    this.trim();
  }

  /**
   * Records evicted since the last clear
   */
  getDroppedCount(): number {
    return this.dropped;
  }

  clear(): void {
    this.records = [];
    this.dropped = 0;
  }

  private trim(): void {
    const excess = this.records.length - this.maxSize;
    if (excess > 0) {
      this.records.splice(0, excess);
      this.dropped += excess;
    }
  }
}
