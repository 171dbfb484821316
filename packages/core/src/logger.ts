import pino from "pino";
import { z } from "zod";

export type Logger = pino.Logger;

const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).catch("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).catch("development")
});

const loggerCache = new Map<string, Logger>();
let rootLogger: Logger | undefined;

function createRootLogger(): Logger {
  const env = loggerEnvSchema.parse(process.env);
  return pino({
    level: env.NODE_ENV === "test" && !process.env.LOG_LEVEL ? "silent" : env.LOG_LEVEL,
    base: { service: "tillchain", environment: env.NODE_ENV }
  });
}

/**
 * Returns a child logger tagged with `category`, created once per category.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  const logger = rootLogger.child({ category });
  loggerCache.set(category, logger);
  return logger;
}

/** Replaces the root logger; existing category loggers are discarded. */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
  loggerCache.clear();
}
