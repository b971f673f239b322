import { format } from "date-fns";
import { demoEnv as env } from "./env";
import { FrameQueue } from "../domain/frames/frameQueue";
import { FifoAllocator } from "../storage/fifo";
import { demoLogger } from "../utils/logger";

const TICKS = 40;
// Producer pushes up to this many frames per tick; the consumer drains up to CONSUME_PER_TICK.
const PRODUCE_PER_TICK = 3;
const CONSUME_PER_TICK = 2;

function randomInt(lo: number, hi: number): number {
  return lo + Math.floor(Math.random() * (hi - lo + 1));
}

function makeFrame(seq: number, length: number): Uint8Array {
  const frame = new Uint8Array(length);
  for (let i = 0; i < length; i++) frame[i] = (seq + i) & 0xff;
  return frame;
}

function hex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

const init = FifoAllocator.init({
  bufferSize: env.FIFO_DEMO_BUFFER_SIZE,
  minBlockSize: env.FIFO_DEMO_MIN_BLOCK_SIZE,
  maxBlockSize: env.FIFO_DEMO_MAX_BLOCK_SIZE,
});
if (!init.ok) {
  demoLogger.fatal({ error: init.error }, "could not create allocator");
  process.exit(1);
}

const allocator = init.value;
const queue = new FrameQueue(allocator);

let tick = 0;
let seq = 0;
let produced = 0;
let rejected = 0;
let consumed = 0;
let lastFrame = "-";

function render(): void {
  const stats = allocator.stats();

  console.clear();
  console.log(
    `tick ${tick}/${TICKS} @ ${format(new Date(), "HH:mm:ss.SSS")}`,
    `| buffer ${stats.bufferSize} | blocks [${stats.minBlockSize}, ${stats.maxBlockSize}]`
  );
  console.table([
    { ring: "data", ...stats.data },
    { ring: "ledger", ...stats.ledger },
  ]);
  console.log(
    "outstanding:", stats.outstandingBlocks,
    "produced:", produced,
    "rejected (full):", rejected,
    "consumed:", consumed
  );
  console.log("last consumed frame:", lastFrame);
}

const timer = setInterval(() => {
  tick++;

  const burst = randomInt(0, PRODUCE_PER_TICK);
  for (let i = 0; i < burst; i++) {
    const length = randomInt(allocator.minBlockSize, allocator.maxBlockSize);
    if (queue.push(makeFrame(seq++, length))) produced++;
    else rejected++;
  }

  for (let i = 0; i < CONSUME_PER_TICK; i++) {
    const frame = queue.shift();
    if (frame === undefined) break;
    consumed++;
    lastFrame = hex(frame);
  }

  render();

  if (tick >= TICKS) {
    clearInterval(timer);
    const leftover = queue.drain().length;
    allocator.uninit();
    console.log(`done: drained ${leftover} leftover frame(s)`);
  }
}, env.FIFO_DEMO_TICK_MS);
