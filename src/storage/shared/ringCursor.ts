export type RingCursorSnapshot = {
  head: number;
  tail: number;
  capacity: number;
  utilization: number;
  available: number;
};

/**
 * Head/tail offsets over a fixed-length region addressed circularly.
 *
 * `head === tail` means empty. One slot is always kept free so that a full
 * ring never looks empty: the usable size is `capacity - 1`.
 *
 * Advancing never checks bounds. Callers make sure `delta <= available`
 * before moving the head and `delta <= utilization` before moving the tail.
 */
export class RingCursor {
  readonly capacity: number;
  private headValue = 0;
  private tailValue = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 2) {
      throw new Error(`RingCursor capacity must be an integer >= 2 (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  get head(): number {
    return this.headValue;
  }

  get tail(): number {
    return this.tailValue;
  }

  get utilization(): number {
    if (this.headValue >= this.tailValue) return this.headValue - this.tailValue;
    // head has wrapped
    return this.capacity + this.headValue - this.tailValue;
  }

  get available(): number {
    return this.capacity - this.utilization - 1;
  }

  get isEmpty(): boolean {
    return this.headValue === this.tailValue;
  }

  get isFull(): boolean {
    return this.available === 0;
  }

  /** Offset reached by moving `delta` units forward from `offset`. */
  offsetAfter(offset: number, delta: number): number {
    const next = offset + delta;
    return next >= this.capacity ? next - this.capacity : next;
  }

  advanceHead(delta: number): void {
    this.headValue = this.offsetAfter(this.headValue, delta);
  }

  advanceTail(delta: number): void {
    this.tailValue = this.offsetAfter(this.tailValue, delta);
  }

  reset(): void {
    this.headValue = 0;
    this.tailValue = 0;
  }

  snapshot(): RingCursorSnapshot {
    return {
      head: this.headValue,
      tail: this.tailValue,
      capacity: this.capacity,
      utilization: this.utilization,
      available: this.available,
    };
  }
}
