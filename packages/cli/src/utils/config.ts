/**
 * Configuration for the CLI
 *
 * Loads chartcheck.yaml from --config or from the root of the enclosing git
 * repository, then layers the selected environment, environment variables
 * and command-line flags on top.
 */
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import YAML from "yaml";
import { errorCode, errorMessage } from "@chartcheck/core";
import { configError } from "../errors.js";
import { OUTPUT_FORMATS, isOutputFormat, type OutputFormat } from "../types.js";

export const CONFIG_FILE_NAME = "chartcheck.yaml";

export const DEFAULT_FORMAT: OutputFormat = "pretty";

export interface EnvironmentConfig {
  valuesFiles: string[];
}

/**
 * chartcheck.yaml, with every path made absolute against the file's directory
 */
export interface ChartCheckConfig {
  /** Informational; not used to discover charts */
  chartPath?: string;
  valuesFiles: string[];
  format?: OutputFormat;
  environments: Record<string, EnvironmentConfig>;
}

export interface LoadedConfig {
  config: ChartCheckConfig;
  /** Path of the file the config came from */
  source?: string;
  /** The file was found at the repository root rather than given */
  discovered: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file path (--config) */
  configPath?: string;
  cwd: string;
  findRepositoryRoot(cwd: string): Promise<string | undefined>;
}

function emptyConfig(): ChartCheckConfig {
  return { valuesFiles: [], environments: {} };
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringList(value: unknown, field: string, baseDir: string, source: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw configError(`${field} must be a list of file paths in ${source}`);
  }
  return value.map((file) => resolve(baseDir, file));
}

/**
 * Parse and validate chartcheck.yaml content
 */
export function parseConfigContent(content: string, source: string): ChartCheckConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw configError(`Invalid configuration file ${source}: ${errorMessage(err)}`);
  }

  if (parsed === null || parsed === undefined) {
    return emptyConfig();
  }

  if (!isObjectRecord(parsed)) {
    throw configError(`Configuration must be a mapping: ${source}`);
  }

  const baseDir = dirname(source);
  const config = emptyConfig();

  const chartPath = parsed["chartPath"];
  if (chartPath !== undefined && chartPath !== null) {
    if (typeof chartPath !== "string") {
      throw configError(`chartPath must be a string in ${source}`);
    }
    config.chartPath = resolve(baseDir, chartPath);
  }

  config.valuesFiles = readStringList(parsed["valuesFiles"], "valuesFiles", baseDir, source);

  const format = parsed["format"];
  if (format !== undefined && format !== null && format !== "") {
    if (!isOutputFormat(format)) {
      throw configError(
        `Unknown output format "${String(format)}" in ${source}`,
        `Use one of: ${OUTPUT_FORMATS.join(", ")}`
      );
    }
    config.format = format;
  }

  const environments = parsed["environments"];
  if (environments !== undefined && environments !== null) {
    if (!isObjectRecord(environments)) {
      throw configError(`environments must be a mapping in ${source}`);
    }
    for (const [name, environment] of Object.entries(environments)) {
      let files: unknown;
      if (isObjectRecord(environment)) {
        files = environment["valuesFiles"];
      } else if (environment !== null) {
        throw configError(`environment ${name} must be a mapping in ${source}`);
      }
      config.environments[name] = {
        valuesFiles: readStringList(files, `environments.${name}.valuesFiles`, baseDir, source),
      };
    }
  }

  return config;
}

/**
 * Load a config file; undefined when it does not exist
 */
export async function loadConfigFile(filePath: string): Promise<ChartCheckConfig | undefined> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return undefined;
    }
    throw configError(`Cannot read configuration file ${filePath}: ${errorMessage(err)}`);
  }
  return parseConfigContent(content, filePath);
}

/**
 * Find and load the configuration
 *
 * Lookup order:
 * 1. --config
 * 2. chartcheck.yaml at the git repository root
 * 3. Defaults
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  if (options.configPath) {
    const source = resolve(options.cwd, options.configPath);
    const config = await loadConfigFile(source);
    if (!config) {
      throw configError(`Configuration file not found: ${source}`);
    }
    return { config, source, discovered: false };
  }

  const root = await options.findRepositoryRoot(options.cwd);
  if (root) {
    const source = join(root, CONFIG_FILE_NAME);
    const config = await loadConfigFile(source);
    if (config) {
      return { config, source, discovered: true };
    }
  }

  return { config: emptyConfig(), discovered: false };
}

export interface SettingsOverrides {
  /** --environment */
  environment?: string;
  /** --values, relative to cwd */
  values?: string[];
  /** --output-format */
  format?: OutputFormat;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/**
 * What a command runs with once every configuration layer is applied
 */
export interface RunSettings {
  valuesFiles: string[];
  format: OutputFormat;
  /** helm executable override */
  helmBinary?: string;
}

/**
 * Apply overrides on top of the loaded config
 *
 * Priority (highest to lowest):
 * 1. CLI flags
 * 2. Environment variables (CHARTCHECK_FORMAT, CHARTCHECK_HELM)
 * 3. Selected environment
 * 4. Config file
 * 5. Defaults
 */
export function resolveSettings(loaded: LoadedConfig, overrides: SettingsOverrides): RunSettings {
  const { config } = loaded;
  let valuesFiles = [...config.valuesFiles];
  let format = config.format ?? DEFAULT_FORMAT;

  if (overrides.environment) {
    const environment = Object.hasOwn(config.environments, overrides.environment)
      ? config.environments[overrides.environment]
      : undefined;
    if (!environment) {
      throw configError(
        `environment ${overrides.environment} not found in ${CONFIG_FILE_NAME}`,
        "Run `chartcheck environments` to list the configured environments"
      );
    }
    valuesFiles = [...environment.valuesFiles];
  }

  const envFormat = overrides.env["CHARTCHECK_FORMAT"];
  if (envFormat) {
    if (!isOutputFormat(envFormat)) {
      throw configError(
        `CHARTCHECK_FORMAT has unknown output format "${envFormat}"`,
        `Use one of: ${OUTPUT_FORMATS.join(", ")}`
      );
    }
    format = envFormat;
  }

  const helmBinary = overrides.env["CHARTCHECK_HELM"] || undefined;

  if (overrides.values && overrides.values.length > 0) {
    valuesFiles = overrides.values.map((file) => resolve(overrides.cwd, file));
  }
  if (overrides.format) {
    format = overrides.format;
  }

  return { valuesFiles, format, helmBinary };
}
