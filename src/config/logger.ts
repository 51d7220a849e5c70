import pino from "pino";
import { z } from "zod";

export const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export type LogContext = Record<string, unknown>;

export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(value?.toLowerCase());
  return parsed.success ? parsed.data : "info";
}

// stdout belongs to command output, so logs go to stderr
export const logger = pino(
  {
    level: resolveLogLevel(process.env.LOG_LEVEL),
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true }),
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function debug(message: string, context: LogContext = {}): void {
  logger.debug(context, message);
}

export function info(message: string, context: LogContext = {}): void {
  logger.info(context, message);
}

export function warn(message: string, context: LogContext = {}): void {
  logger.warn(context, message);
}

export function error(message: string, context: LogContext = {}): void {
  logger.error(context, message);
}
