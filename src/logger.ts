import { appendFileSync, writeFileSync } from "node:fs";

export interface RunLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RunLoggerOptions {
  /** Also print each line to the console. Defaults to true. */
  readonly echo?: boolean;
}

type Level = "INFO" | "WARN" | "ERROR";

const CONSOLE_PREFIX = "[pipeline]";

export function createRunLogger(
  logPath: string,
  options: RunLoggerOptions = {},
): RunLogger {
  const echo = options.echo ?? true;

  // Initialize the log file (truncate if exists)
  writeFileSync(logPath, "");

  const write = (level: Level, message: string): void => {
    const timestamp = new Date().toISOString();
    appendFileSync(logPath, `[${timestamp}] ${level} ${message}\n`);
  };

  return {
    log(message: string): void {
      write("INFO", message);
      if (echo) console.log(`${CONSOLE_PREFIX} ${message}`);
    },
    warn(message: string): void {
      write("WARN", message);
      if (echo) console.error(`${CONSOLE_PREFIX}[WARNING] ${message}`);
    },
    error(message: string): void {
      write("ERROR", message);
      if (echo) console.error(`${CONSOLE_PREFIX}[ERROR] ${message}`);
    },
  };
}
