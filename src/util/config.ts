import { z } from "zod";
import type { LevelWithSilent } from "pino";
import type { BridgeConfig } from "./types.js";

export type AppConfig = BridgeConfig & {
  readonly logLevel: LevelWithSilent;
  readonly serverName: string;
};

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const LOG_LEVEL_ALIASES: Record<string, string> = { warning: "warn", critical: "fatal" };

// Unset and "" are the same thing for env input.
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

export function normalizeHost(raw: string): string {
  return raw.trim().replace(/^https?:\/\//i, "").replace(/\/+$/, "");
}

const EnvSchema = z.object({
  BOND_HOST: z.preprocess(
    blankToUndefined,
    z.string({ required_error: "is required" }).transform(normalizeHost).pipe(z.string().min(1, "is empty")),
  ),
  BOND_TOKEN: z.preprocess(
    blankToUndefined,
    z.string({ required_error: "is required" }).trim().min(10, "appears to be too short"),
  ),
  BOND_TIMEOUT: z.preprocess(blankToUndefined, z.coerce.number().positive("must be positive").default(10)),
  BOND_MAX_RETRIES: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0, "cannot be negative").default(3),
  ),
  BOND_RETRY_DELAY: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0, "cannot be negative").default(1),
  ),
  BOND_MAX_CONCURRENCY: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(16).default(4)),
  LOG_LEVEL: z.preprocess(
    (v) => {
      const s = blankToUndefined(v);
      if (typeof s !== "string") return s;
      const lower = s.trim().toLowerCase();
      return LOG_LEVEL_ALIASES[lower] ?? lower;
    },
    z.enum(LOG_LEVELS).default("info"),
  ),
  MCP_SERVER_NAME: z.preprocess(blankToUndefined, z.string().default("bond-mcp-server")),
});

/** Reads the bridge settings from an environment map; throws listing every invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  const e = parsed.data;
  return Object.freeze({
    host: e.BOND_HOST,
    token: e.BOND_TOKEN,
    timeoutMs: Math.round(e.BOND_TIMEOUT * 1000),
    maxRetries: e.BOND_MAX_RETRIES,
    retryDelayMs: Math.round(e.BOND_RETRY_DELAY * 1000),
    maxConcurrency: e.BOND_MAX_CONCURRENCY,
    logLevel: e.LOG_LEVEL,
    serverName: e.MCP_SERVER_NAME,
  });
}
