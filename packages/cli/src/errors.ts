import { isChartCheckError } from "@chartcheck/core";
import type { ExitCode } from "./types.js";

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError) {
    super(error.message);
    this.name = "CliError";
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isCliError(value: unknown): value is CliError {
  if (!isObjectRecord(value)) {
    return false;
  }

  const code = value["code"];
  const exitCode = value["exitCode"];
  const name = value["name"];

  return typeof code === "string" && typeof exitCode === "number" && name === "CliError";
}

export function toCliError(error: unknown): CliError {
  if (isCliError(error)) {
    return error;
  }

  if (isChartCheckError(error)) {
    return new CliError({
      code: error.code,
      message: error.message,
      exitCode: error.code === "CONFIG_ERROR" ? 3 : 1,
      suggestion: error.suggestion,
    });
  }

  if (error instanceof Error) {
    return new CliError({
      code: "INTERNAL_ERROR",
      message: error.message,
      exitCode: 1,
      suggestion: "Re-run with --verbose for more detail.",
    });
  }

  return new CliError({
    code: "UNKNOWN_ERROR",
    message: "An unknown error occurred.",
    exitCode: 1,
    suggestion: "Check the command and its options, then try again.",
  });
}

export function configError(message: string, suggestion?: string): CliError {
  return new CliError({
    code: "CONFIG_ERROR",
    message,
    exitCode: 3,
    suggestion,
  });
}

export function formatCliError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify(
      {
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
        exitCode: error.exitCode,
      },
      null,
      2
    );
  }

  const lines = [`[${error.code}] ${error.message}`];
  if (error.suggestion) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join("\n");
}
