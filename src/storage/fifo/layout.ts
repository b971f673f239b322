import {
  FifoAllocatorOptionsSchema,
  InvalidAllocatorOptionsError,
  type FifoAllocatorConfig,
  type LedgerSlotType,
} from "./protocol";

export type FifoLayout = {
  /** Data ring length, one more than the usable byte count. */
  dataCapacity: number;
  /** Data ring plus the overhang that keeps wrapping blocks contiguous. */
  dataBytes: number;
  /** Ledger ring length in slots, one more than the maximum outstanding block count. */
  ledgerCapacity: number;
  ledgerSlotType: LedgerSlotType;
  ledgerOffset: number;
  totalBytes: number;
};

export function parseOptions(options: FifoAllocatorConfig): FifoAllocatorConfig {
  const parsed = FifoAllocatorOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidAllocatorOptionsError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}

export function alignTo(value: number, alignment: number): number {
  const rem = value % alignment;
  return rem === 0 ? value : value + (alignment - rem);
}

export function ledgerSlotTypeFor(maxBlockSize: number): LedgerSlotType {
  if (maxBlockSize <= 0xff) return "u8";
  if (maxBlockSize <= 0xffff) return "u16";
  return "u32";
}

export function bytesPerSlot(type: LedgerSlotType): number {
  switch (type) {
    case "u8":
      return Uint8Array.BYTES_PER_ELEMENT;
    case "u16":
      return Uint16Array.BYTES_PER_ELEMENT;
    case "u32":
      return Uint32Array.BYTES_PER_ELEMENT;
  }
}

/**
 * Both rings share one `ArrayBuffer`:
 *
 * [0, dataBytes)                data ring (dataCapacity) + overhang (maxBlockSize - 1)
 * [ledgerOffset, totalBytes)    ledger slots, aligned to the slot width
 *
 * A block starts at most at `dataCapacity - 1` and spans at most `maxBlockSize`
 * bytes, so the overhang covers every wrapping block.
 *
 * Expects options already checked by `parseOptions`.
 */
export function computeLayout(config: FifoAllocatorConfig): FifoLayout {
  const { bufferSize, minBlockSize, maxBlockSize } = config;

  const dataCapacity = bufferSize + 1;
  const dataBytes = dataCapacity + maxBlockSize - 1;

  const ledgerCapacity = Math.floor(bufferSize / minBlockSize) + 1;
  const ledgerSlotType = ledgerSlotTypeFor(maxBlockSize);
  const slotBytes = bytesPerSlot(ledgerSlotType);
  const ledgerOffset = alignTo(dataBytes, slotBytes);

  return {
    dataCapacity,
    dataBytes,
    ledgerCapacity,
    ledgerSlotType,
    ledgerOffset,
    totalBytes: ledgerOffset + ledgerCapacity * slotBytes,
  };
}
