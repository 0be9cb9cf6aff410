import pino from "pino";

// Raised or lowered at startup from LOG_LEVEL once the configuration is loaded
export const logger = pino({
  name: "asset-exchange",
  level: process.env.NODE_ENV === "test" ? "silent" : "info",
  base: { service: "asset-exchange" },
});

export type Logger = typeof logger;
