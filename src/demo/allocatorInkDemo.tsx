import React, { useEffect, useMemo, useState } from "react";
import { render, Box, Text, useApp, useInput, useStdout } from "ink";

import { demoEnv as env } from "./env";
import { AllocatorError, FifoAllocator, type FifoAllocatorStats } from "../storage/fifo";

const init = FifoAllocator.init({
  bufferSize: env.FIFO_DEMO_BUFFER_SIZE,
  minBlockSize: env.FIFO_DEMO_MIN_BLOCK_SIZE,
  maxBlockSize: env.FIFO_DEMO_MAX_BLOCK_SIZE,
});
if (!init.ok) {
  console.error(`could not create allocator: ${init.error}`);
  process.exit(1);
}
const allocator = init.value;

function randomBlockSize(): number {
  const span = allocator.maxBlockSize - allocator.minBlockSize + 1;
  return allocator.minBlockSize + Math.floor(Math.random() * span);
}

/** One character per data ring slot: '#' in use, '.' free. */
function ringCells(stats: FifoAllocatorStats): string {
  const { head, tail, capacity } = stats.data;
  let out = "";
  for (let i = 0; i < capacity; i++) {
    const used = head >= tail ? i >= tail && i < head : i >= tail || i < head;
    out += used ? "#" : ".";
  }
  return out;
}

function markerRow(stats: FifoAllocatorStats): string {
  const { head, tail, capacity } = stats.data;
  const row = new Array<string>(capacity).fill(" ");
  row[tail] = "T";
  row[head] = head === tail ? "*" : "H";
  return row.join("");
}

function chunk(s: string, width: number): string[] {
  const w = Math.max(8, width);
  const out: string[] = [];
  for (let i = 0; i < s.length; i += w) out.push(s.slice(i, i + w));
  return out;
}

function App() {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const columns = stdout?.columns ?? 80;

  const [stats, setStats] = useState<FifoAllocatorStats>(() => allocator.stats());
  const [auto, setAuto] = useState(false);
  const [last, setLast] = useState("ready");

  const step = (action: "alloc" | "free") => {
    if (action === "alloc") {
      const size = randomBlockSize();
      const res = allocator.alloc(size);
      setLast(res.ok ? `alloc(${size}) @ ${res.value.offset}` : `alloc(${size}) -> ${res.error}`);
    } else {
      const res = allocator.free();
      setLast(res.ok ? `free() -> ${res.value} bytes` : `free() -> ${AllocatorError.NOT_FOUND}`);
    }
    setStats(allocator.stats());
  };

  useEffect(() => {
    if (!auto) return;
    const timer = setInterval(() => {
      // Bias towards allocating so the ring fills up and wraps.
      step(Math.random() < 0.6 ? "alloc" : "free");
    }, env.FIFO_DEMO_TICK_MS);
    return () => clearInterval(timer);
  }, [auto]);

  useInput((input, key) => {
    if (input === "q" || key.escape || (key.ctrl && input === "c")) {
      allocator.uninit();
      exit();
      return;
    }
    if (input === "a") step("alloc");
    if (input === "f") step("free");
    if (input === " ") setAuto((v) => !v);
  });

  const width = Math.max(8, columns - 2);
  const cellRows = useMemo(() => chunk(ringCells(stats), width), [stats, width]);
  const markerRows = useMemo(() => chunk(markerRow(stats), width), [stats, width]);

  return (
    <Box flexDirection="column">
      <Box justifyContent="space-between">
        <Text>
          buffer {stats.bufferSize} | blocks [{stats.minBlockSize}, {stats.maxBlockSize}] | {auto ? "auto" : "manual"}
        </Text>
        <Text>outstanding {stats.outstandingBlocks}</Text>
      </Box>

      <Text>
        data head {stats.data.head} tail {stats.data.tail} used {stats.data.utilization} free {stats.data.available}
      </Text>
      <Text>
        ledger head {stats.ledger.head} tail {stats.ledger.tail} used {stats.ledger.utilization} free {stats.ledger.available}
      </Text>

      <Box flexDirection="column" marginTop={1}>
        {cellRows.map((row, i) => (
          <Box key={`row-${i}`} flexDirection="column">
            <Text>{row}</Text>
            <Text color="yellow">{markerRows[i] ?? ""}</Text>
          </Box>
        ))}
      </Box>

      <Text>last: {last}</Text>

      <Box marginTop={1}>
        <Text dimColor>Controls: a alloc, f free, space toggle auto, q to quit.</Text>
      </Box>
    </Box>
  );
}

render(<App />);
