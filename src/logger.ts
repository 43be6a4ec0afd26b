import log from "electron-log/node";
import type { LogLevel } from "./config";

log.transports.file.level = false;
log.transports.console.level = "warn";

export interface LoggingOptions {
  level: LogLevel;
  /** Also append to this file. */
  file?: string;
}

export function configureLogging(options: LoggingOptions): void {
  log.transports.console.level = options.level;
  const file = options.file;
  if (file) {
    log.transports.file.resolvePathFn = () => file;
    log.transports.file.level = options.level;
  } else {
    log.transports.file.level = false;
  }
}

export type Logger = ReturnType<typeof log.scope>;

export function createLogger(scope: string): Logger {
  return log.scope(scope);
}
