/**
 * chartcheck core - value reference checking for Helm charts
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Errors
export {
  ChartCheckError,
  ConfigError,
  LoadError,
  ParseError,
  ExternalToolError,
  WalkError,
  isChartCheckError,
  errorMessage,
  errorCode,
  type ChartCheckErrorCode,
  type ParseErrorOptions,
  type ExternalToolErrorOptions,
} from './errors.js';

// Values
export * from './values/index.js';

// Templates
export * from './templates/index.js';

// Charts
export * from './chart/index.js';
