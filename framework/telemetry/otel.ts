/**
 * OpenTelemetry Integration
 *
 * Annotates spans created by the host application's instrumentation with
 * routing information, and wraps route loading in its own span.
 *
 * Tracing is opt-in: set OTEL_ENABLED=true and register an SDK in the host.
 *
 * @module
 */

import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';

// ============================================================================
// Configuration
// ============================================================================

export interface OTELConfig {
  /** Whether OTEL is enabled (from OTEL_ENABLED) */
  enabled: boolean;
  /** Service name for traces (from OTEL_SERVICE_NAME) */
  serviceName: string;
}

export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

export function getOTELConfig(): OTELConfig {
  return {
    enabled: isOTELEnabled(),
    serviceName: process.env.OTEL_SERVICE_NAME ?? 'route-table',
  };
}

// ============================================================================
// Span Access and Manipulation
// ============================================================================

/**
 * Get the currently active span.
 * Returns undefined if no span is active or OTEL is not enabled
 */
export function getActiveSpan(): Span | undefined {
  if (!isOTELEnabled()) return undefined;
  return trace.getActiveSpan();
}

/**
 * Set the http.route attribute on the active span and optionally rename it.
 * Called after a successful route match.
 *
 * @param routePattern - The matched path template (e.g. '/user/{id}')
 * @param updateName - Whether to update the span name (default: true)
 */
export function setRouteAttribute(routePattern: string, method: string, updateName = true): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', routePattern);
    if (updateName) {
      span.updateName(`${method.toUpperCase()} ${routePattern}`);
    }
  }
}

// ============================================================================
// Tracer Access
// ============================================================================

let _tracer: { name: string; tracer: Tracer } | undefined;

/**
 * Tracer named after the configured service
 */
function getTracer(): Tracer {
  const { serviceName } = getOTELConfig();
  if (_tracer?.name !== serviceName) {
    _tracer = { name: serviceName, tracer: trace.getTracer(serviceName) };
  }
  return _tracer.tracer;
}

// ============================================================================
// Span Creation
// ============================================================================

export interface CreateSpanOptions {
  attributes?: Attributes;
}

/**
 * Run an async function inside a new active span.
 * The span is ended when the function settles; a rejection is recorded
 * on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {}
): Promise<T> {
  if (!isOTELEnabled()) {
    const noopSpan = trace.getTracer('noop').startSpan('noop');
    try {
      return await fn(noopSpan);
    } finally {
      noopSpan.end();
    }
  }

  return getTracer().startActiveSpan(
    name,
    {
      kind: SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    context.active(),
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const exception = error instanceof Error ? error : new Error(String(error));
        span.recordException(exception);
        span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
        throw error;
      } finally {
        span.end();
      }
    }
  );
}
