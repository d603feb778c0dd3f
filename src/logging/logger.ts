import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const REDACT_PATHS = ["apiKey", "*.apiKey", "config.model.apiKey", "headers.authorization"];

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const base: pino.LoggerOptions = {
    level,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  };

  if (config?.file) {
    return pino(base, pino.destination(config.file));
  }

  if (isJson) {
    return pino(base, pino.destination(2));
  }

  return pino({
    ...base,
    transport: {
      target: "pino-pretty",
      // stderr keeps stdout free for command output
      options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
    },
  });
}

/** Child logger tagged with the subsystem that emits it. */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
