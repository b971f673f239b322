import { z } from "zod";
import type { Logger } from "pino";
import type { RingCursorSnapshot } from "../shared/ringCursor";

export const MAX_LEDGER_VALUE = 0xffff_ffff;

export type LedgerSlotType = "u8" | "u16" | "u32";

export const FifoAllocatorOptionsSchema = z
  .object({
    bufferSize: z.number().int().positive(),
    minBlockSize: z.number().int().min(1),
    maxBlockSize: z.number().int().min(1).max(MAX_LEDGER_VALUE),
    /** Upper bound on the backing store in bytes; larger layouts fail with `ALLOCATION_FAILURE`. */
    memoryLimitBytes: z.number().int().positive().optional(),
  })
  .superRefine((o, ctx) => {
    if (o.minBlockSize > o.maxBlockSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minBlockSize"],
        message: `minBlockSize (${o.minBlockSize}) must not exceed maxBlockSize (${o.maxBlockSize})`,
      });
    }
    if (o.maxBlockSize > o.bufferSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["maxBlockSize"],
        message: `maxBlockSize (${o.maxBlockSize}) must not exceed bufferSize (${o.bufferSize})`,
      });
    }
  });

export type FifoAllocatorConfig = z.infer<typeof FifoAllocatorOptionsSchema>;

export type FifoAllocatorOptions = FifoAllocatorConfig & {
  /** Receives debug diagnostics for every state change. */
  logger?: Logger;
};

export enum AllocatorError {
  ALLOCATION_FAILURE = "ALLOCATION_FAILURE",
  UNSUPPORTED_SIZE = "UNSUPPORTED_SIZE",
  OUT_OF_MEMORY = "OUT_OF_MEMORY",
  NOT_FOUND = "NOT_FOUND",
}

export type AllocatorResult<T, E extends AllocatorError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type AllocError = AllocatorError.UNSUPPORTED_SIZE | AllocatorError.OUT_OF_MEMORY;

/**
 * A contiguous block handed out by the allocator.
 *
 * `bytes` is a live view into the allocator's storage and stays valid until
 * the block is freed. It may extend past the ring end when the block wraps.
 */
export type FifoBlock = {
  /** Start offset in the data ring. */
  offset: number;
  size: number;
  bytes: Uint8Array;
};

export type FifoAllocatorStats = {
  bufferSize: number;
  minBlockSize: number;
  maxBlockSize: number;
  outstandingBlocks: number;
  data: RingCursorSnapshot;
  ledger: RingCursorSnapshot;
};

export class InvalidAllocatorOptionsError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid FIFO allocator options: ${issues.join("; ")}`);
    this.name = "InvalidAllocatorOptionsError";
    this.issues = issues;
  }
}

export class AllocatorReleasedError extends Error {
  constructor(operation: string) {
    super(`Cannot '${operation}': allocator has been released`);
    this.name = "AllocatorReleasedError";
  }
}
