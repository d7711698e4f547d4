/**
 * Step-tagged logging. Lines look like `  [1.4s] [MAPPING] 12 placeholders mapped`.
 */

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(step: string, message: string): void;
  warn(step: string, message: string): void;
  error(step: string, message: string): void;
}

export function createConsoleLogger(startTime = Date.now()): Logger {
  const line = (step: string, message: string) => {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    return `  [${elapsed}s] [${step}] ${message}`;
  };
  return {
    info: (step, message) => console.log(line(step, message)),
    warn: (step, message) => console.warn(line(step, message)),
    error: (step, message) => console.error(line(step, message)),
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};

export interface LogEntry {
  level: LogLevel;
  step: string;
  message: string;
}

/** Logger that keeps every entry in memory. */
export function createMemoryLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (step, message) => entries.push({ level: "info", step, message }),
    warn: (step, message) => entries.push({ level: "warn", step, message }),
    error: (step, message) => entries.push({ level: "error", step, message }),
  };
}
