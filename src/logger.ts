// pattern: Imperative Shell

/**
 * Scoped console logger.
 * Lines go to stderr so they never interleave with the assistant's replies on stdout.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  child(scope: string): Logger;
};

export type LoggerOptions = {
  debug?: boolean;
  now?: () => Date;
  write?: (line: string) => void;
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const write = options.write ?? ((line: string) => console.error(line));
  const debugEnabled = options.debug ?? false;

  function log(level: LogLevel, message: string): void {
    write(`${formatTimestamp(now())} - ${level.toUpperCase()} - ${scope} - ${message}`);
  }

  return {
    debug(message: string): void {
      if (debugEnabled) log("debug", message);
    },
    info(message: string): void {
      log("info", message);
    },
    warn(message: string): void {
      log("warn", message);
    },
    error(message: string, error?: unknown): void {
      log("error", error === undefined ? message : `${message}: ${describeError(error)}`);
    },
    child(childScope: string): Logger {
      return createLogger(`${scope}.${childScope}`, options);
    },
  };
}

export function createSilentLogger(): Logger {
  return createLogger("silent", { write: () => {} });
}
