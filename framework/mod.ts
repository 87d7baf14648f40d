/**
 * Route Table
 *
 * A routing table compiler and matcher for web frameworks: resolves
 * request paths to named routes and generates URIs from route names.
 *
 * @module route-table
 */

// Router
export * from './router/mod.ts';

// Configuration
export { Config, type ConfigOptions, loadConfig } from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  isLogLevel,
  isOTELEnabled,
  getOTELConfig,
  setRouteAttribute,
  withSpan,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
  type OTELConfig,
} from './telemetry/mod.ts';
