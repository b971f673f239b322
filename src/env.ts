import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const envSchema = z.object({
  FIFO_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type Env = z.infer<typeof envSchema>;

/** Drops empty strings so they count as unset. */
export function presentValues(runtimeEnv: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(runtimeEnv)) {
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  runtimeEnv: Record<string, string | undefined>
): z.infer<S> {
  const parsed = schema.safeParse(presentValues(runtimeEnv));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment variables: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function parseEnv(runtimeEnv: Record<string, string | undefined>): Env {
  return parseWith(envSchema, runtimeEnv);
}

export const env = parseEnv(process.env);
