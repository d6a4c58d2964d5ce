import type { HelmClient } from "@chartcheck/core";

export type ExitCode = 0 | 1 | 2 | 3 | 4;

export const OUTPUT_FORMATS = ["pretty", "json", "yaml", "junit"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Everything a command touches outside the process
 */
export interface CliDependencies {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Build a helm client; `binary` comes from CHARTCHECK_HELM */
  createHelm(binary?: string): HelmClient;
  /** Top-level directory of the enclosing git repository, if any */
  findRepositoryRoot(cwd: string): Promise<string | undefined>;
  /** Show a spinner while work is in progress */
  interactive: boolean;
}
