import { describe, expect, it, vi } from 'vitest';

import {
  createMemoryScoreStore,
  loadMatchSession,
  loadPlayerStatistics,
  persistFinishedMatch,
  persistMatchEdit,
  type ScoreStore,
} from '@/lib/state/io';
import { events } from '@/lib/state/events';
import { reduceSession, replaySession } from '@/lib/state/reducer';
import { isStateError } from '@/lib/state/errors';
import type { SessionEvent } from '@/lib/state/events';
import type { MatchSession } from '@/lib/state/session';
import { NAMES, PLAYERS, T0, input, matchOf, rawRound } from '../../fixtures/rounds';

function endedSession(roundCount: number, matchId = 'm1', startedAt = T0): MatchSession {
  const sessionEvents: SessionEvent[] = [
    events.matchStarted(
      { matchId, playerIds: PLAYERS, playerNames: NAMES, initialStarter: 0 },
      { ts: startedAt },
    ),
  ];
  for (let i = 0; i < roundCount; i += 1) {
    sessionEvents.push(
      events.roundRecorded({ roundId: `${matchId}-r${i}`, input: input() }, { ts: startedAt + i + 1 }),
    );
  }
  sessionEvents.push(events.matchEnded({ ts: startedAt + 100 }));
  const result = replaySession(sessionEvents);
  if (!result.ok) throw new Error(result.error.error.message);
  return result.value;
}

describe('memory score store', () => {
  it('returns rounds and matches in the documented order', async () => {
    const store = createMemoryScoreStore({
      rounds: [
        rawRound([100, -50, -50], { roundIndex: 1, playedAt: T0 + 20 }),
        rawRound([100, -50, -50], { roundIndex: 0, playedAt: T0 + 10 }),
      ],
      matches: [
        matchOf([rawRound([1, 0, -1])], { id: 'late', startedAt: T0 + 500 }),
        matchOf([rawRound([1, 0, -1])], { id: 'early', startedAt: T0 }),
      ],
    });
    expect((await store.loadPlayerRounds('bob')).map((r) => r.roundIndex)).toEqual([0, 1]);
    expect((await store.loadMatchRounds('m1')).map((r) => r.roundIndex)).toEqual([0, 1]);
    expect((await store.loadMatchSummaries('cara')).map((m) => m.id)).toEqual(['early', 'late']);
    expect(await store.loadPlayerRounds('zoe')).toEqual([]);
  });

  it('rejects updates to records it does not hold', async () => {
    const store = createMemoryScoreStore();
    const error = await store.updateMatchSummary(matchOf([])).catch((e: unknown) => e);
    expect(isStateError(error, 'RecordNotFound')).toBe(true);
    expect(error).toMatchObject({ info: { code: 'store.not_found', kind: 'match', id: 'm1' } });
  });
});

describe('persistFinishedMatch', () => {
  it('saves every round and the summary', async () => {
    const store = createMemoryScoreStore();
    const session = endedSession(3);
    await expect(persistFinishedMatch(store, session)).resolves.toBe(true);
    expect(await store.loadMatchRounds('m1')).toHaveLength(3);
    expect(await store.loadMatchSummaries('alice')).toEqual([session.summary]);
  });

  it('discards matches without rounds and active sessions', async () => {
    const store = createMemoryScoreStore();
    const saveMatchSummary = vi.spyOn(store, 'saveMatchSummary');
    await expect(persistFinishedMatch(store, endedSession(0))).resolves.toBe(false);

    const active = replaySession([
      events.matchStarted(
        { matchId: 'm2', playerIds: PLAYERS, playerNames: NAMES, initialStarter: 0 },
        { ts: T0 },
      ),
    ]);
    if (!active.ok) throw new Error('expected an active session');
    await expect(persistFinishedMatch(store, active.value)).resolves.toBe(false);
    expect(saveMatchSummary).not.toHaveBeenCalled();
  });
});

describe('persistMatchEdit', () => {
  it('rewrites rounds, removes deleted ones and replaces the summary', async () => {
    const store = createMemoryScoreStore();
    const session = endedSession(3);
    await persistFinishedMatch(store, session);

    const edited = reduceSession(
      session,
      events.roundEdited({ index: 0, input: input({ landlordResult: false }) }, { ts: T0 + 200 }),
    );
    if (!edited.ok) throw new Error(edited.error.message);
    const trimmed = reduceSession(edited.value, events.roundDeleted({ index: 2 }, { ts: T0 + 300 }));
    if (!trimmed.ok) throw new Error(trimmed.error.message);

    await persistMatchEdit(store, trimmed.value);

    const rounds = await store.loadMatchRounds('m1');
    expect(rounds.map((r) => [r.id, r.deltas])).toEqual([
      ['m1-r0', [-200, 100, 100]],
      ['m1-r1', [200, -100, -100]],
    ]);
    const [summary] = await store.loadMatchSummaries('alice');
    expect(summary?.finalScore).toEqual([0, 0, 0]);
    expect(summary?.totalGames).toBe(2);
  });

  it('removes the summary once every round is gone', async () => {
    const store = createMemoryScoreStore();
    const session = endedSession(1);
    await persistFinishedMatch(store, session);
    const emptied = reduceSession(session, events.roundDeleted({ index: 0 }, { ts: T0 + 300 }));
    if (!emptied.ok) throw new Error(emptied.error.message);

    await persistMatchEdit(store, emptied.value);

    expect(await store.loadMatchRounds('m1')).toEqual([]);
    expect(await store.loadMatchSummaries('alice')).toEqual([]);
  });
});

describe('loadMatchSession', () => {
  it('reloads a persisted match so a past round can be edited and written back', async () => {
    const store = createMemoryScoreStore();
    await persistFinishedMatch(store, endedSession(3));
    const [summary] = await store.loadMatchSummaries('alice');
    if (!summary) throw new Error('expected a stored summary');

    const restored = await loadMatchSession(store, summary);
    expect(restored.status).toBe('ended');
    expect(restored.scores).toEqual([
      [200, -100, -100],
      [400, -200, -200],
      [600, -300, -300],
    ]);
    expect(restored.summary).toEqual(summary);

    const edited = reduceSession(
      restored,
      events.roundEdited({ index: 1, input: input({ landlordResult: false }) }, { ts: T0 + 200 }),
    );
    if (!edited.ok) throw new Error(edited.error.message);
    await persistMatchEdit(store, edited.value);

    expect(edited.value.scores[0]).toEqual(restored.scores[0]);
    const rounds = await store.loadMatchRounds('m1');
    expect(rounds.map((r) => r.deltas)).toEqual([
      [200, -100, -100],
      [-200, 100, 100],
      [200, -100, -100],
    ]);
    const [rewritten] = await store.loadMatchSummaries('alice');
    expect(rewritten).toMatchObject({
      finalScore: [200, -100, -100],
      totalGames: 3,
      maxSnapshot: [200, 0, 0],
      minSnapshot: [0, -100, -100],
      endedAt: T0 + 100,
    });
  });

  it('fills legacy spring and first bidder from the match starter', async () => {
    const legacy = [
      rawRound([200, -100, -100], { roundIndex: 1, firstBidder: null }),
      rawRound([-200, 100, 100], { roundIndex: 0, firstBidder: undefined, spring: null }),
    ];
    const summary = matchOf(legacy, { initialStarter: 1 });
    const store = createMemoryScoreStore({ rounds: legacy, matches: [summary] });

    const restored = await loadMatchSession(store, summary);

    expect(restored.rounds.map((r) => [r.roundIndex, r.firstBidder, r.spring])).toEqual([
      [0, 1, false],
      [1, 2, false],
    ]);
    expect(restored.scores).toEqual([
      [-200, 100, 100],
      [0, 0, 0],
    ]);
    expect(restored.endedAt).toBe(T0 + 3_600_000);
  });
});

describe('loadPlayerStatistics', () => {
  it('drops duplicate records and sorts before computing', async () => {
    const first = rawRound([100, -50, -50], { roundIndex: 0, playedAt: T0 + 10 });
    const second = rawRound([-300, 150, 150], { roundIndex: 1, playedAt: T0 + 20 });
    const summary = matchOf([first, second]);
    const store: ScoreStore = {
      ...createMemoryScoreStore(),
      loadPlayerRounds: async () => [second, first, first],
      loadMatchSummaries: async () => [summary, summary],
    };

    const stats = await loadPlayerStatistics(store, 'alice');

    expect(stats.totalGames).toBe(2);
    expect(stats.totalMatches).toBe(1);
    expect(stats.currentLossStreak).toBe(1);
    expect(stats.runningMax).toBe(100);
    expect(stats.runningMaxIndex).toBe(0);
    expect(stats.runningMin).toBe(-200);
    expect(stats.runningMinIndex).toBe(1);
  });
});
