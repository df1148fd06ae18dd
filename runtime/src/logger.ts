import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, "silent">, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.cyan("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR"),
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console logger. Everything goes to stderr so stdout stays clean for
 * JSON output from the CLI.
 */
export function createConsoleLogger(
  level: LogLevel = "info",
  write: (line: string) => void = (line) => process.stderr.write(line + "\n"),
): Logger {
  const threshold = LEVEL_ORDER[level];

  const log = (lvl: Exclude<LogLevel, "silent">, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    const timestamp = chalk.dim(new Date().toISOString());
    const suffix =
      fields && Object.keys(fields).length > 0 ? ` ${chalk.dim(safeStringify(fields))}` : "";
    write(`${timestamp} ${LEVEL_TAGS[lvl]} ${message}${suffix}`);
  };

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}
