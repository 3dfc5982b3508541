import { pino, type Logger } from "pino";

/**
 * Package logger. Silent unless `TROUPE_LOG_LEVEL` names a pino level.
 */
export const logger: Logger = pino({
  name: "troupe",
  level: process.env["TROUPE_LOG_LEVEL"] ?? "silent",
});

export type { Logger };
