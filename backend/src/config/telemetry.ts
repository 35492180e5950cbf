/**
 * Manual tracing for promotion operations
 *
 * Spans go through @opentelemetry/api and are no-ops until the host process
 * registers an SDK.
 */

import { Span, SpanStatusCode, trace } from '@opentelemetry/api';
import { errorCodeOf, errorMessage } from '../types/content';

export const tracer = trace.getTracer('content-promotion', '1.0.0');

/**
 * Run `fn` inside a span, recording the outcome on it
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = tracer.startSpan(name, { attributes });
  try {
    const result = await fn(span);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
    span.setAttribute('promotion.error_code', errorCodeOf(error));
    if (error instanceof Error) span.recordException(error);
    throw error;
  } finally {
    span.end();
  }
}
