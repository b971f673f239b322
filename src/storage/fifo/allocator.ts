import type { Logger } from "pino";
import { allocatorLogger } from "../../utils/logger";
import { RingCursor } from "../shared/ringCursor";
import { computeLayout, parseOptions, type FifoLayout } from "./layout";
import {
  AllocatorError,
  AllocatorReleasedError,
  type AllocError,
  type AllocatorResult,
  type FifoAllocatorStats,
  type FifoAllocatorOptions,
  type FifoBlock,
} from "./protocol";

type LedgerView = Uint8Array | Uint16Array | Uint32Array;

type FifoStorage = {
  buffer: ArrayBuffer;
  data: Uint8Array;
  ledger: LedgerView;
};

function createLedgerView(buffer: ArrayBuffer, layout: FifoLayout): LedgerView {
  switch (layout.ledgerSlotType) {
    case "u8":
      return new Uint8Array(buffer, layout.ledgerOffset, layout.ledgerCapacity);
    case "u16":
      return new Uint16Array(buffer, layout.ledgerOffset, layout.ledgerCapacity);
    case "u32":
      return new Uint32Array(buffer, layout.ledgerOffset, layout.ledgerCapacity);
  }
}

function createStorage(layout: FifoLayout): FifoStorage {
  const buffer = new ArrayBuffer(layout.totalBytes);
  return {
    buffer,
    data: new Uint8Array(buffer, 0, layout.dataBytes),
    ledger: createLedgerView(buffer, layout),
  };
}

/**
 * Fixed-capacity allocator that hands out variable-size byte blocks in FIFO
 * order and takes them back oldest-first.
 *
 * Two rings move in lock-step: the data ring holds the block bytes and the
 * size ledger remembers how long each outstanding block is. Every
 * outstanding block has exactly one ledger record at the same queue position.
 *
 * Not safe for interleaved use by several callers: alloc and free each update
 * both rings in two separate steps.
 */
export class FifoAllocator {
  static init(
    options: FifoAllocatorOptions
  ): AllocatorResult<FifoAllocator, AllocatorError.ALLOCATION_FAILURE> {
    const config = parseOptions(options);
    const layout = computeLayout(config);
    const logger = options.logger ?? allocatorLogger;

    if (config.memoryLimitBytes !== undefined && layout.totalBytes > config.memoryLimitBytes) {
      logger.warn(
        { totalBytes: layout.totalBytes, memoryLimitBytes: config.memoryLimitBytes },
        "allocator layout exceeds memory limit"
      );
      return { ok: false, error: AllocatorError.ALLOCATION_FAILURE };
    }

    let storage: FifoStorage;
    try {
      storage = createStorage(layout);
    } catch (err) {
      // Compared by name: the RangeError may come from another realm.
      if (!(err instanceof Error) || err.name !== "RangeError") throw err;
      logger.error({ err, totalBytes: layout.totalBytes }, "failed to obtain allocator storage");
      return { ok: false, error: AllocatorError.ALLOCATION_FAILURE };
    }

    const allocator = new FifoAllocator(
      config.bufferSize,
      config.minBlockSize,
      config.maxBlockSize,
      layout,
      storage,
      logger
    );
    allocator.#logState("init", { totalBytes: layout.totalBytes, ledgerSlotType: layout.ledgerSlotType });
    return { ok: true, value: allocator };
  }

  readonly bufferSize: number;
  readonly minBlockSize: number;
  readonly maxBlockSize: number;

  readonly #data: RingCursor;
  readonly #ledger: RingCursor;
  readonly #logger: Logger;
  #storage: FifoStorage | null;

  private constructor(
    bufferSize: number,
    minBlockSize: number,
    maxBlockSize: number,
    layout: FifoLayout,
    storage: FifoStorage,
    logger: Logger
  ) {
    this.bufferSize = bufferSize;
    this.minBlockSize = minBlockSize;
    this.maxBlockSize = maxBlockSize;
    this.#data = new RingCursor(layout.dataCapacity);
    this.#ledger = new RingCursor(layout.ledgerCapacity);
    this.#storage = storage;
    this.#logger = logger;
  }

  get released(): boolean {
    return this.#storage === null;
  }

  get outstandingBlocks(): number {
    this.#storageFor("outstandingBlocks");
    return this.#ledger.utilization;
  }

  get bytesInUse(): number {
    this.#storageFor("bytesInUse");
    return this.#data.utilization;
  }

  get bytesAvailable(): number {
    this.#storageFor("bytesAvailable");
    return this.#data.available;
  }

  get isEmpty(): boolean {
    this.#storageFor("isEmpty");
    return this.#data.isEmpty;
  }

  /**
   * Reserves `blockSize` bytes at the data ring head.
   *
   * Size is checked before space, so an out-of-range size is reported as
   * `UNSUPPORTED_SIZE` even when the ring is full. Nothing changes on failure.
   */
  alloc(blockSize: number): AllocatorResult<FifoBlock, AllocError> {
    const storage = this.#storageFor("alloc");

    if (
      !Number.isInteger(blockSize) ||
      blockSize < this.minBlockSize ||
      blockSize > this.maxBlockSize
    ) {
      return { ok: false, error: AllocatorError.UNSUPPORTED_SIZE };
    }
    if (blockSize > this.#data.available) {
      return { ok: false, error: AllocatorError.OUT_OF_MEMORY };
    }

    const offset = this.#data.head;
    const block: FifoBlock = {
      offset,
      size: blockSize,
      bytes: storage.data.subarray(offset, offset + blockSize),
    };

    this.#data.advanceHead(blockSize);
    storage.ledger[this.#ledger.head] = blockSize;
    this.#ledger.advanceHead(1);

    this.#logState("alloc", { blockSize });
    return { ok: true, value: block };
  }

  /** The oldest outstanding block, left in place. */
  peek(): AllocatorResult<FifoBlock, AllocatorError.NOT_FOUND> {
    const storage = this.#storageFor("peek");
    if (this.#data.isEmpty) {
      return { ok: false, error: AllocatorError.NOT_FOUND };
    }

    const offset = this.#data.tail;
    const size = storage.ledger[this.#ledger.tail] ?? 0;
    return {
      ok: true,
      value: { offset, size, bytes: storage.data.subarray(offset, offset + size) },
    };
  }

  /**
   * Releases the oldest outstanding block and returns its size.
   */
  free(): AllocatorResult<number, AllocatorError.NOT_FOUND> {
    const storage = this.#storageFor("free");
    if (this.#data.isEmpty) {
      return { ok: false, error: AllocatorError.NOT_FOUND };
    }

    const freedSize = storage.ledger[this.#ledger.tail] ?? 0;
    this.#ledger.advanceTail(1);
    this.#data.advanceTail(freedSize);

    this.#logState("free", { blockSize: freedSize });
    return { ok: true, value: freedSize };
  }

  /**
   * Gives the backing storage back. Views returned earlier by `alloc` and
   * `peek` become empty, and every later call except `uninit` throws.
   */
  uninit(): void {
    const storage = this.#storage;
    if (storage === null) return;

    this.#storage = null;
    this.#data.reset();
    this.#ledger.reset();
    // Detach the buffer so outstanding views cannot reach freed memory.
    structuredClone(storage.buffer, { transfer: [storage.buffer] });

    this.#logger.debug({ event: "uninit" }, "allocator released");
  }

  stats(): FifoAllocatorStats {
    this.#storageFor("stats");
    return {
      bufferSize: this.bufferSize,
      minBlockSize: this.minBlockSize,
      maxBlockSize: this.maxBlockSize,
      outstandingBlocks: this.#ledger.utilization,
      data: this.#data.snapshot(),
      ledger: this.#ledger.snapshot(),
    };
  }

  #storageFor(operation: string): FifoStorage {
    if (this.#storage === null) throw new AllocatorReleasedError(operation);
    return this.#storage;
  }

  #logState(event: string, context: Record<string, unknown>): void {
    if (!this.#logger.isLevelEnabled("debug")) return;
    this.#logger.debug(
      { event, ...context, data: this.#data.snapshot(), ledger: this.#ledger.snapshot() },
      `${event} ok`
    );
  }
}
