export function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`history capacity must be a positive integer, got ${capacity}`);
  }
}

/** Fixed-capacity FIFO; pushing at capacity evicts the oldest entry. */
export class RollingHistory<T> {
  private readonly slots: (T | undefined)[];
  private start = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    assertCapacity(capacity);
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  push(item: T): void {
    if (this.length < this.capacity) {
      this.slots[(this.start + this.length) % this.capacity] = item;
      this.length++;
      return;
    }
    this.slots[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
  }

  /** Oldest first */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.length; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}
