import { z } from "zod";
import { parseWith } from "../env";

export const demoEnvSchema = z.object({
  FIFO_DEMO_BUFFER_SIZE: z.coerce.number().int().positive().default(64),
  FIFO_DEMO_MIN_BLOCK_SIZE: z.coerce.number().int().positive().default(2),
  FIFO_DEMO_MAX_BLOCK_SIZE: z.coerce.number().int().positive().default(12),
  FIFO_DEMO_TICK_MS: z.coerce.number().int().positive().default(250),
});

export type DemoEnv = z.infer<typeof demoEnvSchema>;

export function parseDemoEnv(runtimeEnv: Record<string, string | undefined>): DemoEnv {
  return parseWith(demoEnvSchema, runtimeEnv);
}

export const demoEnv = parseDemoEnv(process.env);
