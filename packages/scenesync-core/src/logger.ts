export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string, err?: unknown): void;
};

export type LoggerOptions = {
  debug?: boolean;
  log?: (line: string, level: LogLevel) => void;
};

function consoleLog(line: string, level: LogLevel): void {
  switch (level) {
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.info(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
    default: {
      const _exhaustive: never = level;
      return _exhaustive;
    }
  }
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.stack ?? `${err.name}: ${err.message}`;
  return String(err);
}

export function createLogger(opts: LoggerOptions = {}, scope?: string): Logger {
  const debug = Boolean(opts.debug);
  const log = opts.log ?? consoleLog;
  const prefix = scope ? `[${scope}] ` : "";
  return {
    debug(line) {
      if (debug) log(`${prefix}${line}`, "debug");
    },
    info(line) {
      log(`${prefix}${line}`, "info");
    },
    warn(line) {
      log(`${prefix}${line}`, "warn");
    },
    error(line, err) {
      log(err === undefined ? `${prefix}${line}` : `${prefix}${line}: ${describeError(err)}`, "error");
    },
  };
}

/** Derives a logger for a sub-component, keeping the parent's sink. */
export function scopedLogger(parent: Logger, scope: string): Logger {
  return {
    debug: (line) => parent.debug(`[${scope}] ${line}`),
    info: (line) => parent.info(`[${scope}] ${line}`),
    warn: (line) => parent.warn(`[${scope}] ${line}`),
    error: (line, err) => parent.error(`[${scope}] ${line}`, err),
  };
}
