import pino from "pino";

// stdout carries the MCP stream, so every log line goes to stderr.
export const logger = pino(
  {
    name: "phalcon-dev",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination({ dest: 2, sync: true }),
);
