/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry span annotation for route
 * loading and matching.
 */

export {
  Logger,
  getLogger,
  setLogger,
  isLogLevel,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELConfig,
  getActiveSpan,
  setRouteAttribute,
  withSpan,
  type OTELConfig,
  type CreateSpanOptions,
} from './otel.ts';
