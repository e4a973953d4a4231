import { uuid } from '@/lib/utils';
import type { EventPayloadByType, SessionEventType } from '@/schema/events';
import type { UUID } from './types';

export type SessionEventOf<T extends SessionEventType> = Readonly<{
  eventId: UUID;
  type: T;
  payload: EventPayloadByType<T>;
  ts: number;
}>;

export type SessionEvent = { [K in SessionEventType]: SessionEventOf<K> }[SessionEventType];

type Meta = { eventId?: string; ts?: number };

export function makeEvent<T extends SessionEventType>(
  type: T,
  payload: EventPayloadByType<T>,
  meta?: Meta,
): SessionEventOf<T> {
  return {
    type,
    payload,
    eventId: meta?.eventId ?? uuid(),
    ts: meta?.ts ?? Date.now(),
  };
}

export const events = {
  matchStarted: (p: EventPayloadByType<'match/started'>, m?: Meta) =>
    makeEvent('match/started', p, m),
  roundRecorded: (p: EventPayloadByType<'round/recorded'>, m?: Meta) =>
    makeEvent('round/recorded', p, m),
  roundEdited: (p: EventPayloadByType<'round/edited'>, m?: Meta) =>
    makeEvent('round/edited', p, m),
  roundDeleted: (p: EventPayloadByType<'round/deleted'>, m?: Meta) =>
    makeEvent('round/deleted', p, m),
  matchEnded: (m?: Meta) => makeEvent('match/ended', {}, m),
};

export type { EventPayloadByType, SessionEventType };
