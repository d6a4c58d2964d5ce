/**
 * CLI version, kept in step with package.json
 */
export const CLI_VERSION = "0.1.0";

export const CLI_NAME = "chartcheck";

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  CONFIG_ERROR: 3,
  CHARTS_FAILED: 4,
} as const;
