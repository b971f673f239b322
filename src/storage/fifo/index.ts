export { FifoAllocator } from "./allocator";
export { computeLayout, ledgerSlotTypeFor, parseOptions, type FifoLayout } from "./layout";
export {
  AllocatorError,
  AllocatorReleasedError,
  FifoAllocatorOptionsSchema,
  InvalidAllocatorOptionsError,
  type AllocError,
  type AllocatorResult,
  type FifoAllocatorConfig,
  type FifoAllocatorOptions,
  type FifoAllocatorStats,
  type FifoBlock,
  type LedgerSlotType,
} from "./protocol";
