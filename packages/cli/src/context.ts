import type { Command } from "commander";
import type { CliDependencies, OutputFormat } from "./types.js";
import { loadConfig, type LoadedConfig } from "./utils/config.js";
import { configureLogger, info } from "./utils/logger.js";

/**
 * Options defined on the root program
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Configuration file path */
  config?: string;
  /** false with --no-color */
  color?: boolean;
  json?: boolean;
  listEnvironments?: boolean;
}

export interface CommandContext {
  globalOptions: GlobalOptions;
  loaded: LoadedConfig;
  /** Color output enabled */
  color: boolean;
}

/**
 * Configure the logger from the global options and load the configuration
 */
export async function setupGlobalOptions(command: Command, deps: CliDependencies): Promise<CommandContext> {
  const opts = command.optsWithGlobals<GlobalOptions>();
  const noColor = opts.color === false || Boolean(deps.env["NO_COLOR"]);

  configureLogger({
    verbose: opts.verbose,
    quiet: opts.quiet,
    noColor,
    json: opts.json,
  });

  const loaded = await loadConfig({
    configPath: opts.config,
    cwd: deps.cwd,
    findRepositoryRoot: deps.findRepositoryRoot,
  });

  return { globalOptions: opts, loaded, color: !noColor };
}

/**
 * Say where a discovered config file came from, unless the output is
 * meant for another program
 */
export function announceConfig(loaded: LoadedConfig, format: OutputFormat = "pretty"): void {
  if (loaded.discovered && loaded.source && format === "pretty") {
    info(`Using config file from project root: ${loaded.source}`);
  }
}

/**
 * Option parser for repeatable, comma-separated file lists
 */
export function collectFiles(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(",").filter((file) => file.length > 0)];
}
