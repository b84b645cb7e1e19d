import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  // stdout carries the MCP transport; logs go to stderr.
  return pino({ name: "cluster-submit", level }, pino.destination({ dest: 2, sync: true }));
}

export const silentLogger: Logger = pino({ enabled: false });
