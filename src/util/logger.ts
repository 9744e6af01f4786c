import { pino, destination, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

// stdout carries the MCP stdio transport, so logs go to stderr.
export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({ name: "bond-mcp", level }, destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
