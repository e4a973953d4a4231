import type { z } from 'zod';

import { eventEnvelopeSchema, eventPayloadSchemas, sessionEventTypeEnum } from '@/schema/events';
import { createStateError, type InvalidEventInfo } from './errors';
import type { SessionEvent } from './events';

type Envelope = z.infer<typeof eventEnvelopeSchema>;

function invalidPayload(error: z.ZodError): never {
  throw createStateError<InvalidEventInfo>('InvalidEventPayload', {
    code: 'event.invalid_payload',
    details: error.flatten(),
  });
}

function parsePayload<S extends z.ZodTypeAny>(schema: S, envelope: Envelope): z.infer<S> {
  const parsed = schema.safeParse(envelope.payload);
  if (!parsed.success) invalidPayload(parsed.error);
  return parsed.data;
}

/**
 * Checks envelope shape, event type and payload, throwing a named error with an
 * `info` payload on the first failure.
 */
export function validateEventStrict(e: unknown): SessionEvent {
  const base = eventEnvelopeSchema.safeParse(e);
  if (!base.success) {
    throw createStateError<InvalidEventInfo>('InvalidEventShape', {
      code: 'event.invalid_shape',
      details: base.error.flatten(),
    });
  }
  const envelope = base.data;
  const type = sessionEventTypeEnum.safeParse(envelope.type);
  if (!type.success) {
    throw createStateError<InvalidEventInfo>('UnknownEventType', {
      code: 'event.unknown_type',
      details: { type: envelope.type },
    });
  }
  const { eventId, ts } = envelope;
  switch (type.data) {
    case 'match/started':
      return {
        eventId,
        ts,
        type: type.data,
        payload: parsePayload(eventPayloadSchemas['match/started'], envelope),
      };
    case 'round/recorded':
      return {
        eventId,
        ts,
        type: type.data,
        payload: parsePayload(eventPayloadSchemas['round/recorded'], envelope),
      };
    case 'round/edited':
      return {
        eventId,
        ts,
        type: type.data,
        payload: parsePayload(eventPayloadSchemas['round/edited'], envelope),
      };
    case 'round/deleted':
      return {
        eventId,
        ts,
        type: type.data,
        payload: parsePayload(eventPayloadSchemas['round/deleted'], envelope),
      };
    case 'match/ended':
      return {
        eventId,
        ts,
        type: type.data,
        payload: parsePayload(eventPayloadSchemas['match/ended'], envelope),
      };
  }
}
