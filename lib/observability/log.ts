import { sanitizeAttributes, type SpanAttributesInput } from './attributes';

export type LogLevel = 'info' | 'warn' | 'error';

export type MessageOptions = {
  level?: LogLevel;
  attributes?: SpanAttributesInput;
};

export type TelemetrySink = {
  track: (event: string, attributes?: SpanAttributesInput) => void;
  captureException: (error: unknown, attributes?: SpanAttributesInput) => void;
  captureMessage: (message: string, options?: MessageOptions) => void;
};

const noopSink: TelemetrySink = {
  track: () => {},
  captureException: () => {},
  captureMessage: () => {},
};

let activeSink: TelemetrySink = noopSink;

const isProduction = () => process.env.NODE_ENV === 'production';

export const setTelemetrySink = (sink: TelemetrySink | null) => {
  activeSink = sink ?? noopSink;
};

export const getTelemetrySink = () => activeSink;

/**
 * Records a structured message on the active sink and mirrors it to the console
 * outside production.
 */
export const captureMessage = (message: string, options?: MessageOptions) => {
  const level = options?.level ?? 'info';
  const attributes = sanitizeAttributes(options?.attributes);
  if (!isProduction()) {
    const logger =
      level === 'warn' ? console.warn : level === 'error' ? console.error : console.info;
    logger(`[observability] ${message}`, attributes ?? {});
  }
  activeSink.captureMessage(message, { level, ...(attributes ? { attributes } : {}) });
};

export const captureException = (error: unknown, attributes?: SpanAttributesInput) => {
  if (!isProduction()) {
    console.error('[observability] exception captured', error, attributes ?? {});
  }
  activeSink.captureException(error, sanitizeAttributes(attributes));
};

export const trackEvent = (event: string, attributes?: SpanAttributesInput) => {
  activeSink.track(event, sanitizeAttributes(attributes));
};
