import { pino, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function loggerOptions(level: string): LoggerOptions {
  const env = process.env.NODE_ENV;
  return {
    level,
    transport: env === "production" || env === "test" ? undefined : { target: "pino-pretty" },
  };
}

export function createLogger(level: string): Logger {
  return pino(loggerOptions(level));
}
