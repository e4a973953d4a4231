import { SpanStatusCode, trace, type Span, type Tracer } from '@opentelemetry/api';

import { TRACER_NAME, isObservabilityEnabled } from '@/config/observability';
import type { ObservabilityRuntime } from '@/config/flags';
import { captureMessage } from './log';
import {
  sanitizeAttributes,
  type SpanAttributeRecord,
  type SpanAttributesInput,
} from './attributes';

export { sanitizeAttributes, type SpanAttributeRecord, type SpanAttributesInput };

type WithSpanOptions = {
  runtime?: ObservabilityRuntime;
};

export type SpanErrorLog = {
  span: string;
  message: string;
  name?: string;
  runtime: ObservabilityRuntime;
  attributes?: SpanAttributeRecord;
};

type SpanErrorReporter = (details: SpanErrorLog) => void | Promise<void>;

const MAX_ERROR_MESSAGE_LENGTH = 512;

let cachedTracer: Tracer | null = null;
let spanErrorReporter: SpanErrorReporter | null = null;

export const setSpanErrorReporter = (reporter: SpanErrorReporter | null) => {
  spanErrorReporter = reporter;
};

const getTracer = (): Tracer => {
  if (cachedTracer) return cachedTracer;
  cachedTracer = trace.getTracer(TRACER_NAME);
  return cachedTracer;
};

const normalizeError = (error: unknown) => {
  if (error instanceof Error) {
    return {
      message: (error.message || 'Unknown error').slice(0, MAX_ERROR_MESSAGE_LENGTH),
      name: error.name,
    };
  }
  if (typeof error === 'string') {
    return {
      message: error.slice(0, MAX_ERROR_MESSAGE_LENGTH),
      name: 'Error',
    };
  }
  return {
    message: 'Unknown error',
    name: 'Error',
  };
};

const emitSpanErrorLog = (details: SpanErrorLog) => {
  if (spanErrorReporter) {
    try {
      const result = spanErrorReporter(details);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          captureMessage('span error reporter rejected', {
            level: 'warn',
            attributes: { span: details.span, error: normalizeError(error).message },
          });
        });
      }
    } catch (error) {
      captureMessage('span error reporter failed', {
        level: 'warn',
        attributes: { span: details.span, error: normalizeError(error).message },
      });
    }
    return;
  }

  captureMessage('span error captured', {
    level: 'error',
    attributes: {
      span: details.span,
      message: details.message,
      name: details.name,
      runtime: details.runtime,
    },
  });
};

export const recordSpanError = (
  span: Span | null | undefined,
  error: unknown,
  attributes?: SpanAttributesInput,
  options?: { spanName?: string; runtime?: ObservabilityRuntime },
) => {
  const runtime = options?.runtime ?? 'node';
  const normalizedError = normalizeError(error);
  const sanitizedAttributes = sanitizeAttributes(attributes);

  if (span) {
    span.recordException(normalizedError);
    span.setStatus({ code: SpanStatusCode.ERROR, message: normalizedError.message });
    span.setAttribute('error.message', normalizedError.message);
    span.setAttribute('error.name', normalizedError.name);
    if (sanitizedAttributes) {
      span.setAttributes(sanitizedAttributes);
    }
  }

  emitSpanErrorLog({
    span: options?.spanName ?? 'unknown-span',
    message: normalizedError.message,
    name: normalizedError.name,
    runtime,
    ...(sanitizedAttributes ? { attributes: sanitizedAttributes } : {}),
  });
};

const spanOptionsFor = (attributes: SpanAttributesInput) => {
  const sanitizedAttributes = sanitizeAttributes(attributes);
  return sanitizedAttributes ? { attributes: sanitizedAttributes } : {};
};

/**
 * Runs `callback` inside an active span when observability is enabled for the runtime.
 * With instrumentation off the callback still runs, receiving `null` in place of the span.
 * Errors are recorded on the span, reported, and rethrown unchanged.
 */
export const withSpanSync = <T>(
  name: string,
  attributes: SpanAttributesInput,
  callback: (span: Span | null) => T,
  options?: WithSpanOptions,
): T => {
  const runtime = options?.runtime ?? 'node';

  if (!isObservabilityEnabled(runtime)) {
    try {
      return callback(null);
    } catch (error) {
      recordSpanError(null, error, attributes, { spanName: name, runtime });
      throw error;
    }
  }

  return getTracer().startActiveSpan(name, spanOptionsFor(attributes), (span): T => {
    try {
      const result = callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordSpanError(span, error, attributes, { spanName: name, runtime });
      throw error;
    } finally {
      span.end();
    }
  });
};

export const withSpanAsync = async <T>(
  name: string,
  attributes: SpanAttributesInput,
  callback: (span: Span | null) => Promise<T>,
  options?: WithSpanOptions,
): Promise<T> => {
  const runtime = options?.runtime ?? 'node';

  if (!isObservabilityEnabled(runtime)) {
    try {
      return await callback(null);
    } catch (error) {
      recordSpanError(null, error, attributes, { spanName: name, runtime });
      throw error;
    }
  }

  return getTracer().startActiveSpan(
    name,
    spanOptionsFor(attributes),
    async (span): Promise<T> => {
      try {
        const result = await callback(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        recordSpanError(span, error, attributes, { spanName: name, runtime });
        throw error;
      } finally {
        span.end();
      }
    },
  );
};

export const __resetTracerForTests = () => {
  cachedTracer = null;
  spanErrorReporter = null;
};
