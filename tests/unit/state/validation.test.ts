import { describe, expect, it } from 'vitest';

import { validateEventStrict } from '@/lib/state/validation';
import { isStateError } from '@/lib/state/errors';

const thrownBy = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

const roundEvent = (payload: unknown) => ({
  eventId: 'e1',
  ts: 1,
  type: 'round/recorded',
  payload,
});

describe('validateEventStrict', () => {
  it('accepts a well-formed event', () => {
    const event = validateEventStrict(
      roundEvent({
        roundId: 'r1',
        input: {
          bids: [0, 2, 1],
          doubled: [false, false, true],
          bombs: 2,
          spring: false,
          landlordResult: true,
        },
      }),
    );
    expect(event.type).toBe('round/recorded');
    expect(event.payload).toEqual({
      roundId: 'r1',
      input: {
        bids: [0, 2, 1],
        doubled: [false, false, true],
        bombs: 2,
        spring: false,
        landlordResult: true,
      },
    });
  });

  it('rejects a malformed envelope', () => {
    const error = thrownBy(() => validateEventStrict({ type: 'round/recorded' }));
    expect(isStateError(error, 'InvalidEventShape')).toBe(true);
  });

  it('rejects unknown event types', () => {
    const error = thrownBy(() =>
      validateEventStrict({ eventId: 'e1', ts: 1, type: 'score/set', payload: {} }),
    );
    expect(isStateError(error, 'UnknownEventType')).toBe(true);
    expect(error).toMatchObject({ info: { code: 'event.unknown_type', details: { type: 'score/set' } } });
  });

  it.each([
    ['bid above 3', { bids: [4, 0, 0], doubled: [false, false, false], bombs: 0, spring: false, landlordResult: true }],
    ['negative bombs', { bids: [1, 0, 0], doubled: [false, false, false], bombs: -1, spring: false, landlordResult: true }],
    ['too many bombs', { bids: [1, 0, 0], doubled: [false, false, false], bombs: 11, spring: false, landlordResult: true }],
    ['two doubled flags', { bids: [1, 0, 0], doubled: [false, false], bombs: 0, spring: false, landlordResult: true }],
  ])('rejects a round payload with %s', (_label, input) => {
    const error = thrownBy(() => validateEventStrict(roundEvent({ roundId: 'r1', input })));
    expect(isStateError(error, 'InvalidEventPayload')).toBe(true);
  });

  it('rejects a match with a player in two seats', () => {
    const error = thrownBy(() =>
      validateEventStrict({
        eventId: 'e1',
        ts: 1,
        type: 'match/started',
        payload: {
          matchId: 'm1',
          playerIds: ['alice', 'alice', 'cara'],
          playerNames: ['Alice', 'Alice', 'Cara'],
          initialStarter: 0,
        },
      }),
    );
    expect(isStateError(error, 'InvalidEventPayload')).toBe(true);
  });
});
