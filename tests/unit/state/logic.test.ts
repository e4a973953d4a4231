import { describe, expect, it } from 'vitest';

import {
  buildRoundRecord,
  firstBidder,
  resolveFirstBidder,
  resolveRound,
  roundInputOf,
} from '@/lib/state/logic';
import { PLAYERS, T0, input, rawRound } from '../../fixtures/rounds';

describe('firstBidder', () => {
  it('cycles through the seats from the match starter', () => {
    expect([0, 1, 2, 3, 4, 5].map((i) => firstBidder(i, 0))).toEqual([0, 1, 2, 0, 1, 2]);
    expect([0, 1, 2, 3].map((i) => firstBidder(i, 2))).toEqual([2, 0, 1, 2]);
  });

  it('normalizes out-of-range starters', () => {
    expect(firstBidder(0, 4)).toBe(1);
    expect(firstBidder(0, -1)).toBe(2);
  });

  it('falls back to seat 0 for non-finite arguments', () => {
    expect(firstBidder(Number.NaN, 1)).toBe(0);
    expect(firstBidder(2, Number.NaN)).toBe(0);
    expect(firstBidder(Number.POSITIVE_INFINITY, 2)).toBe(0);
  });
});

describe('resolveFirstBidder', () => {
  it('prefers the stored value over the rotation', () => {
    expect(resolveFirstBidder({ roundIndex: 1, firstBidder: 0 }, 0)).toBe(0);
  });

  it('falls back to the rotation, then to seat 0', () => {
    expect(resolveFirstBidder({ roundIndex: 1 }, 1)).toBe(2);
    expect(resolveFirstBidder({ roundIndex: 4 }, null)).toBe(0);
  });

  it('treats a stored null like a missing value', () => {
    expect(resolveFirstBidder({ roundIndex: 1, firstBidder: null }, 1)).toBe(2);
  });
});

describe('resolveRound', () => {
  it('resolves landlord, stake and outcomes together', () => {
    const result = resolveRound(
      input({
        bids: [3, 2, 2],
        doubled: [false, true, false],
        bombs: 1,
        landlordResult: false,
      }),
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      landlordSeat: 0,
      landlord: 1,
      level: 3,
      baseStake: 300,
      stake: 600,
      deltas: [-1800, 1200, 600],
      outcomes: ['loss', 'win', 'win'],
    });
  });

  it('passes bid errors through untouched', () => {
    const result = resolveRound(input({ bids: [0, 0, 0] }));
    expect(result).toEqual({ ok: false, error: { code: 'bid.none', message: 'Nobody bid' } });
  });

  it('throws on modifiers outside the allowed range', () => {
    expect(() => resolveRound(input({ bombs: 11 }))).toThrowError('InvalidModifier');
  });
});

describe('buildRoundRecord / roundInputOf', () => {
  it('stores the landlord as a 1-based position and round-trips the input', () => {
    const entry = input({ bids: [0, 0, 2], spring: true });
    const resolution = resolveRound(entry);
    if (!resolution.ok) throw new Error('expected a valid round');
    const record = buildRoundRecord(entry, resolution.value, {
      id: 'r1',
      matchId: 'm1',
      roundIndex: 0,
      playedAt: T0,
      playerIds: PLAYERS,
      firstBidder: 1,
    });
    expect(record.landlord).toBe(3);
    expect(record.deltas).toEqual([-400, -400, 800]);
    expect(record.firstBidder).toBe(1);
    expect(roundInputOf(record)).toEqual(entry);
  });

  it('reads a legacy record without spring as no spring', () => {
    const { spring: _spring, ...legacy } = rawRound([100, -50, -50]);
    expect(roundInputOf(legacy).spring).toBe(false);
  });
});
