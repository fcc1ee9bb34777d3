import fs from "node:fs";
import process from "node:process";
import { ENABLE_COLOR, LOG_COLORS, type LogColor } from "../config/constants.js";

const logFile = process.env["LOG_FILE"];
const logStream = logFile ? fs.createWriteStream(logFile, { flags: "a" }) : undefined;

function appendToLogFile(message: string): void {
  logStream?.write(`[${new Date().toISOString()}] ${message}\n`);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function colorize(message: string, color: LogColor | undefined): string {
  return ENABLE_COLOR && color ? `${color}${message}${LOG_COLORS.reset}` : message;
}

export type Logger = (message: string) => void;

export interface LoggerSpec {
  stream: "log" | "warn" | "error";
  color?: LogColor;
  /** Shown on the console only with --debug; the log file always gets it */
  debugOnly?: boolean;
}

export function makeLogger(spec: LoggerSpec, debugMode: boolean): Logger {
  const visible = !spec.debugOnly || debugMode;
  return (message) => {
    appendToLogFile(message);
    if (visible) {
      console[spec.stream](colorize(message, spec.color));
    }
  };
}

export interface Loggers {
  /** Internal progress, shown with --debug only */
  appLog: Logger;
  appWarn: Logger;
  appError: Logger;
  /** What the reviewer reads during an interactive session */
  reviewLog: Logger;
}

export function createLoggers(debugMode: boolean): Loggers {
  return {
    appLog: makeLogger({ stream: "log", color: LOG_COLORS.debug, debugOnly: true }, debugMode),
    appWarn: makeLogger({ stream: "warn", color: LOG_COLORS.warn }, debugMode),
    appError: makeLogger({ stream: "error", color: LOG_COLORS.error }, debugMode),
    reviewLog: makeLogger({ stream: "log" }, debugMode),
  };
}
