import pino, { type DestinationStream, type Logger } from "pino";

export const LOGGER_NAME = "toolcall-smoke";

export function isLogLevel(value: string): boolean {
  return value === "silent" || Object.prototype.hasOwnProperty.call(pino.levels.values, value);
}

// stdout carries the report, so logs default to stderr
export function createLogger(level = "info", destination?: DestinationStream): Logger {
  return pino({ name: LOGGER_NAME, level }, destination ?? pino.destination(2));
}

