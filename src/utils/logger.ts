import pino from "pino";
import type { Logger } from "pino";
import { env } from "../env";

export const logger = pino({
  level: env.FIFO_LOG_LEVEL,
  base: {
    pid: process.pid,
    service: "fifo-ring-allocator",
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export const createLogger = (component: string): Logger => {
  return logger.child({ component });
};

export const allocatorLogger = createLogger("fifo-allocator");
export const demoLogger = createLogger("demo");
