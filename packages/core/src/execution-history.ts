import { DEFAULT_HISTORY_LIMIT } from '@crewline/shared';

/**
 * Bounded ring buffer of execution results. Once full, each push evicts
 * the oldest entry; `totalRecorded` keeps counting.
 */
export class ExecutionHistory<T> {
  private buffer: T[] = [];
  private head = 0;
  private recorded = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_LIMIT) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(entry: T): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(entry);
    } else {
      this.buffer[this.head] = entry;
      this.head = (this.head + 1) % this.capacity;
    }
    this.recorded++;
  }

  /** Retained entries, oldest first. */
  entries(): T[] {
    return [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
  }

  latest(): T | undefined {
    if (this.buffer.length === 0) return undefined;
    const idx = (this.head + this.buffer.length - 1) % this.buffer.length;
    return this.buffer[idx];
  }

  get size(): number {
    return this.buffer.length;
  }

  get totalRecorded(): number {
    return this.recorded;
  }

  clear(): void {
    this.buffer = [];
    this.head = 0;
    this.recorded = 0;
  }
}
