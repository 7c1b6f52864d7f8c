/**
 * Layer 8: Telemetry & Observability
 *
 * Cross-cutting observability concerns.
 *
 * Responsibilities:
 * - Structured logging (JSON or pretty)
 * - Distributed tracing through OpenTelemetry
 * - Request correlation
 */

export {
  Logger,
  defaultLoggerOptions,
  formatPretty,
  getLogger,
  isLogLevel,
  setLogger,
  type LogEntry,
  type LogFormat,
  type LoggerOptions,
  type LogLevel,
  type LogOutput,
  type RequestScope,
} from './logger.ts';
export {
  TRACER_NAME,
  TRACER_VERSION,
  getActiveSpan,
  getTracer,
  recordSpanException,
  setRouteAttribute,
  withSpan,
  type CreateSpanOptions,
} from './tracing.ts';
