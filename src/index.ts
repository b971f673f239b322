export * from "./storage/fifo";
export { RingCursor, type RingCursorSnapshot } from "./storage/shared/ringCursor";
export { FrameQueue } from "./domain/frames/frameQueue";
