/**
 * Server configuration from environment variables.
 *
 *   MIKRO_TRACE       0|1|true|false   per-bit decoder trace on stderr
 *   MIKRO_OSC_HOST    host             default OSC forward target
 *   MIKRO_OSC_PORT    1..65535         default OSC forward port
 *   MIKRO_OSC_PREFIX  /path            OSC address prefix for events
 */

import { z } from "zod";

import { DEFAULT_OSC_PREFIX } from "./bridge/osc-events.js";

export const DEFAULT_OSC_HOST = "127.0.0.1";
export const DEFAULT_OSC_PORT = 9000;

const envBool = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ["", "0", "1", "true", "false"].includes(v), {
    message: "expected 0/1/true/false",
  })
  .transform((v) => v === "1" || v === "true");

const envSchema = z.object({
  MIKRO_TRACE: envBool.default("false"),
  MIKRO_OSC_HOST: z.string().trim().min(1).default(DEFAULT_OSC_HOST),
  MIKRO_OSC_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_OSC_PORT),
  MIKRO_OSC_PREFIX: z
    .string()
    .trim()
    .startsWith("/", { message: 'must start with "/"' })
    .default(DEFAULT_OSC_PREFIX),
});

export interface ServerConfig {
  trace: boolean;
  oscHost: string;
  oscPort: number;
  oscPrefix: string;
}

/**
 * Read configuration from an environment map.
 * Throws listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    trace: e.MIKRO_TRACE,
    oscHost: e.MIKRO_OSC_HOST,
    oscPort: e.MIKRO_OSC_PORT,
    oscPrefix: e.MIKRO_OSC_PREFIX,
  };
}
