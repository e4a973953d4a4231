import { describe, expect, it } from 'vitest';

import {
  normalizePlayerMatches,
  normalizePlayerRounds,
  projectRound,
} from '@/lib/state/player-statistics/normalize';
import { matchOf, rawRound } from '../../../fixtures/rounds';

describe('projectRound', () => {
  it('reads the round from the given seat', () => {
    const record = rawRound([-200, 100, 100], {
      landlord: 1,
      bids: [1, 0, 0],
      doubled: [false, true, false],
      landlordResult: false,
      firstBidder: 1,
    });
    expect(projectRound(record, 1)).toEqual({
      roundId: 'm1-r0',
      matchId: 'm1',
      roundIndex: 0,
      playedAt: record.playedAt,
      seat: 1,
      delta: 100,
      isLandlord: false,
      bid: 0,
      doubled: true,
      spring: false,
      landlordResult: false,
      firstBidder: 1,
    });
  });
});

describe('normalizePlayerRounds', () => {
  it('drops values that are not round records', () => {
    const rounds = normalizePlayerRounds('alice', [
      null,
      'round',
      { id: 'r9' },
      rawRound([100, -50, -50]),
    ]);
    expect(rounds.map((r) => r.roundId)).toEqual(['m1-r0']);
  });

  it('keeps rounds whose spring and first bidder were stored as null', () => {
    const [projected] = normalizePlayerRounds('bob', [
      { ...rawRound([600, -300, -300], { bids: [3, 0, 0] }), spring: null, firstBidder: null },
    ]);
    expect(projected).toMatchObject({ seat: 1, delta: -300, spring: false, firstBidder: 0 });
  });

  it('drops rounds with bids outside the enumeration', () => {
    const rounds = normalizePlayerRounds('alice', [
      { ...rawRound([100, -50, -50]), bids: [5, 0, 0] },
    ]);
    expect(rounds).toEqual([]);
  });
});

describe('normalizePlayerMatches', () => {
  it('keeps matches the player sat in, using their seat', () => {
    const summary = matchOf([rawRound([100, -50, -50])]);
    const other = matchOf([rawRound([100, -50, -50])], {
      id: 'm2',
      playerIds: ['x', 'y', 'z'],
    });
    expect(normalizePlayerMatches('bob', [summary, other, { id: 'junk' }])).toEqual([
      {
        matchId: 'm1',
        startedAt: summary.startedAt,
        seat: 1,
        finalScore: -50,
        maxSnapshot: 0,
        minSnapshot: -50,
        totalGames: 1,
      },
    ]);
  });
});
