import { AllocatorError, type FifoAllocator } from "../../storage/fifo";

/**
 * Queue of variable-length byte frames stored in a `FifoAllocator`.
 *
 * Frames are copied in on `push` and copied out on `shift`, so callers never
 * hold views into the allocator's storage past the call (except via `peek`).
 */
export class FrameQueue {
  readonly #allocator: FifoAllocator;

  constructor(allocator: FifoAllocator) {
    this.#allocator = allocator;
  }

  get size(): number {
    return this.#allocator.outstandingBlocks;
  }

  get isEmpty(): boolean {
    return this.#allocator.isEmpty;
  }

  /** Returns false when there is not enough room right now. */
  push(payload: Uint8Array): boolean {
    const res = this.#allocator.alloc(payload.length);
    if (!res.ok) {
      if (res.error === AllocatorError.OUT_OF_MEMORY) return false;
      throw new RangeError(
        `frame length ${payload.length} is outside [${this.#allocator.minBlockSize}, ${this.#allocator.maxBlockSize}]`
      );
    }
    res.value.bytes.set(payload);
    return true;
  }

  /** View of the oldest frame; valid until the next `shift`/`clear`. */
  peek(): Uint8Array | undefined {
    const res = this.#allocator.peek();
    return res.ok ? res.value.bytes : undefined;
  }

  shift(): Uint8Array | undefined {
    const res = this.#allocator.peek();
    if (!res.ok) return undefined;

    const frame = res.value.bytes.slice();
    this.#allocator.free();
    return frame;
  }

  drain(): Uint8Array[] {
    const out: Uint8Array[] = [];
    for (let frame = this.shift(); frame !== undefined; frame = this.shift()) {
      out.push(frame);
    }
    return out;
  }

  clear(): void {
    while (this.#allocator.free().ok) {
      // keep freeing until NOT_FOUND
    }
  }
}
