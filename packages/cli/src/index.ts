/**
 * chartcheck CLI
 *
 * @packageDocumentation
 */

export { createProgram, run, CLI_NAME, CLI_VERSION, EXIT_CODES } from "./cli.js";
export { setupGlobalOptions, type CommandContext, type GlobalOptions } from "./context.js";
export { createDefaultDependencies } from "./dependencies.js";
export { CliError, isCliError, toCliError, configError, formatCliError } from "./errors.js";
export * from "./commands/index.js";
export * from "./formatters/index.js";
export { isOutputFormat, OUTPUT_FORMATS, type CliDependencies, type ExitCode, type OutputFormat } from "./types.js";
export {
  loadConfig,
  loadConfigFile,
  parseConfigContent,
  resolveSettings,
  CONFIG_FILE_NAME,
  type ChartCheckConfig,
  type EnvironmentConfig,
  type LoadedConfig,
  type RunSettings,
} from "./utils/config.js";
export { logger, configureLogger, type Logger, type LoggerOptions } from "./utils/logger.js";
