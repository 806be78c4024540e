import pino from "pino";

/**
 * Package-wide logger. Writes JSON lines to stderr so that a host owning
 * stdout (a CLI, a stdio server) is left alone.
 */
export const logger = pino(
  {
    name: "youtube-params",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
