/**
 * OpenTelemetry Tracing
 *
 * Thin helpers over `@opentelemetry/api`. The framework never registers an
 * SDK itself: when the host application installs a tracer provider, dispatch
 * and middleware spans are exported through it, otherwise the API's no-op
 * tracer is used.
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
  type Context,
  type Attributes,
} from '@opentelemetry/api';

export const TRACER_NAME = 'bramble';
export const TRACER_VERSION = '0.1.0';

/**
 * Get the framework tracer from the global provider
 */
export function getTracer(name = TRACER_NAME, version = TRACER_VERSION): Tracer {
  // Not cached: a provider registered after first use must still be picked up.
  return trace.getTracer(name, version);
}

/**
 * Currently active span, if any
 */
export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/**
 * Set the http.route attribute on the active span and optionally rename it
 *
 * @param routePattern - The matched route template (e.g. '/users/{id:number}')
 * @param updateName - Rename the span to `METHOD pattern`
 */
export function setRouteAttribute(routePattern: string, method: string, updateName = true): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', routePattern);
    if (updateName) {
      span.updateName(`${method} ${routePattern}`);
    }
  }
}

/**
 * Record an exception on a span and mark it failed
 */
export function recordSpanException(span: Span, error: unknown): void {
  const err = error instanceof Error ? error : new Error(String(error));
  span.recordException(err);
  span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
}

export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  attributes?: Attributes;
  /** Parent context (uses the active context if not provided) */
  parentContext?: Context;
}

/**
 * Run an async function inside a new active span.
 * The span is ended when the function settles; errors are recorded and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {}
): Promise<T> {
  const parentCtx = options.parentContext ?? context.active();

  return await getTracer().startActiveSpan(
    name,
    {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    parentCtx,
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        recordSpanException(span, error);
        throw error;
      } finally {
        span.end();
      }
    }
  );
}
