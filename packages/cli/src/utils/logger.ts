/**
 * Logger for CLI output
 *
 * Respects --verbose, --quiet, --no-color and --json. Errors and warnings go
 * to stderr, everything else to stdout.
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
  /** Only show errors */
  quiet?: boolean;
  noColor?: boolean;
  /** One JSON object per log line */
  json?: boolean;
}

export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  /** Only in verbose mode */
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Info message with a green checkmark */
  success(message: string, data?: Record<string, unknown>): void;
  /** Write data as JSON regardless of quiet mode */
  json(data: unknown): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  verbose: false,
  quiet: false,
  noColor: false,
  json: false,
};

let globalOptions: LoggerOptions = { ...DEFAULT_OPTIONS };

const plainChalk = new Chalk({ level: 0 });

/**
 * Chalk instance honouring --no-color
 */
export function getChalk(): ChalkInstance {
  return globalOptions.noColor === true ? plainChalk : chalk;
}

function shouldOutput(level: LogLevel): boolean {
  if (globalOptions.quiet) {
    return level === "error";
  }

  if (!globalOptions.verbose && level === "debug") {
    return false;
  }

  return true;
}

function writeStdout(message: string): void {
  process.stdout.write(message + "\n");
}

function writeStderr(message: string): void {
  process.stderr.write(message + "\n");
}

function formatTextMessage(level: LogLevel, message: string, prefix?: string): string {
  const c = getChalk();

  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      return prefix ? `${prefix} ${message}` : message;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

function outputLog(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  prefix?: string
): void {
  if (!shouldOutput(level)) {
    return;
  }

  if (globalOptions.json) {
    const entry: JsonLogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };
    if (data) {
      entry.data = data;
    }
    writeStdout(JSON.stringify(entry));
    return;
  }

  const formatted = formatTextMessage(level, message, prefix);

  if (level === "error" || level === "warn") {
    writeStderr(formatted);
  } else {
    writeStdout(formatted);
  }

  if (data && globalOptions.verbose) {
    writeStdout(getChalk().gray(JSON.stringify(data, null, 2)));
  }
}

function createLoggerInstance(): Logger {
  return {
    debug(message: string, data?: Record<string, unknown>): void {
      outputLog("debug", message, data);
    },

    info(message: string, data?: Record<string, unknown>): void {
      outputLog("info", message, data);
    },

    warn(message: string, data?: Record<string, unknown>): void {
      outputLog("warn", message, data);
    },

    error(message: string, data?: Record<string, unknown>): void {
      outputLog("error", message, data);
    },

    success(message: string, data?: Record<string, unknown>): void {
      outputLog("info", message, data, getChalk().green("✓"));
    },

    json(data: unknown): void {
      writeStdout(JSON.stringify(data, null, globalOptions.json ? 0 : 2));
    },

    configure(options: LoggerOptions): void {
      globalOptions = { ...globalOptions, ...options };
    },

    getOptions(): Readonly<LoggerOptions> {
      return { ...globalOptions };
    },
  };
}

export const logger = createLoggerInstance();

export const debug = logger.debug.bind(logger);
export const info = logger.info.bind(logger);
export const warn = logger.warn.bind(logger);
export const error = logger.error.bind(logger);
export const success = logger.success.bind(logger);
export const json = logger.json.bind(logger);

export function configureLogger(options: LoggerOptions): void {
  logger.configure(options);
}

export function getLoggerOptions(): Readonly<LoggerOptions> {
  return logger.getOptions();
}

/**
 * Restore the default options
 */
export function resetLogger(): void {
  globalOptions = { ...DEFAULT_OPTIONS };
}
