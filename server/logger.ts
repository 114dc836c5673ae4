import { config, type LogLevel } from "./config";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function formatTime(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

function write(level: LogLevel, message: string, source: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.logLevel]) return;

  const line = `${formatTime()} [${source}] ${message}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function log(message: string, source = "express") {
  write("info", message, source);
}

log.debug = (message: string, source = "express") => write("debug", message, source);
log.warn = (message: string, source = "express") => write("warn", message, source);
log.error = (message: string, source = "express") => write("error", message, source);

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
