// ---------------------------------------------------------------------------
// Bounded step history
// ---------------------------------------------------------------------------
// Fixed-capacity ring buffer keeping the most recent N records of a stream.
// Oldest entries are overwritten once full, so memory stays O(capacity)
// however long the series grows.

import { InvalidConfigurationError } from '../errors.js';

export class DriftHistory<T> {
  private readonly capacity: number;
  private readonly slots: Array<T | undefined>;
  private writePtr: number;
  private count: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidConfigurationError('historySize', `must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
    this.writePtr = 0;
    this.count = 0;
  }

  /** Append a record, evicting the oldest when full. */
  push(record: T): void {
    this.slots[this.writePtr] = record;
    this.writePtr = (this.writePtr + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /** Records oldest → newest. */
  toArray(): T[] {
    const out: T[] = [];
    const start = (this.writePtr - this.count + this.capacity) % this.capacity;
    for (let i = 0; i < this.count; i++) {
      const record = this.slots[(start + i) % this.capacity];
      if (record !== undefined) out.push(record);
    }
    return out;
  }

  /** Most recent record, if any. */
  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.writePtr - 1 + this.capacity) % this.capacity];
  }

  get size(): number {
    return this.count;
  }

  getCapacity(): number {
    return this.capacity;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.writePtr = 0;
    this.count = 0;
  }
}
