/**
 * Error types raised while scanning charts
 *
 * The chart processor turns every one of these into a diagnostic line on the
 * chart's result; none of them escape `scanChart`.
 */

export type ChartCheckErrorCode =
  | 'CONFIG_ERROR'
  | 'LOAD_ERROR'
  | 'PARSE_ERROR'
  | 'EXTERNAL_TOOL_ERROR'
  | 'WALK_ERROR';

/**
 * Base class of all chartcheck errors
 */
export class ChartCheckError extends Error {
  readonly code: ChartCheckErrorCode;
  readonly errorCause?: unknown;
  /** What the user can do about it */
  readonly suggestion?: string;

  constructor(
    code: ChartCheckErrorCode,
    message: string,
    options?: { cause?: unknown; suggestion?: string }
  ) {
    super(message);
    this.name = 'ChartCheckError';
    this.code = code;
    if (options?.cause !== undefined) {
      this.errorCause = options.cause;
    }
    this.suggestion = options?.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed chart path or a missing operator-supplied values file
 */
export class ConfigError extends ChartCheckError {
  constructor(message: string, options?: { cause?: unknown; suggestion?: string }) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A file could not be read
 */
export class LoadError extends ChartCheckError {
  readonly source: string;

  constructor(message: string, options: { source: string; cause?: unknown }) {
    super('LOAD_ERROR', message, { cause: options.cause });
    this.name = 'LoadError';
    this.source = options.source;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ParseErrorOptions {
  cause?: unknown;
  /** Source file path */
  source?: string;
  line?: number;
  column?: number;
}

/**
 * Malformed manifest, values file or placeholder
 */
export class ParseError extends ChartCheckError {
  readonly source?: string;
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, options: ParseErrorOptions = {}) {
    super('PARSE_ERROR', message, { cause: options.cause });
    this.name = 'ParseError';
    this.source = options.source;
    this.line = options.line;
    this.column = options.column;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ExternalToolErrorOptions {
  cause?: unknown;
  /** Executable that was run */
  tool: string;
  /** Exit code, absent when the process could not be started */
  exitCode?: number;
  /** Combined stdout and stderr */
  output?: string;
}

/**
 * The helm subprocess failed or could not be started
 */
export class ExternalToolError extends ChartCheckError {
  readonly tool: string;
  readonly exitCode?: number;
  readonly output: string;

  constructor(message: string, options: ExternalToolErrorOptions) {
    super('EXTERNAL_TOOL_ERROR', message, { cause: options.cause });
    this.name = 'ExternalToolError';
    this.tool = options.tool;
    this.exitCode = options.exitCode;
    this.output = options.output ?? '';

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A path inside a chart or search root could not be accessed
 */
export class WalkError extends ChartCheckError {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: unknown }) {
    super('WALK_ERROR', message, { cause: options.cause });
    this.name = 'WalkError';
    this.path = options.path;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isChartCheckError(value: unknown): value is ChartCheckError {
  return value instanceof ChartCheckError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  return String(error);
}

/**
 * Node system error code (ENOENT, EACCES, ...), if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
