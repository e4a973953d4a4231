import { withSpanAsync } from '@/lib/observability/spans';
import { captureMessage } from '@/lib/observability/log';
import { isPlayerStatsLoggingEnabled } from '@/config/observability';
import { recordNotFound } from './errors';
import { resolveFirstBidder } from './logic';
import { computeStatistics, type PlayerStatistics } from './player-statistics';
import { refoldSession } from './reducer';
import { INITIAL_SESSION, type MatchSession } from './session';
import type { MatchSummary, RoundRecord, StoredRoundRecord } from './types';

/**
 * Persistence collaborator. Round lists come back ordered: by time played for a
 * player, by round index for a match. Summaries come back by start time.
 */
export interface ScoreStore {
  loadPlayerRounds(playerId: string): Promise<StoredRoundRecord[]>;
  loadMatchRounds(matchId: string): Promise<StoredRoundRecord[]>;
  loadMatchSummaries(playerId: string): Promise<MatchSummary[]>;
  saveRoundRecord(record: RoundRecord): Promise<void>;
  saveMatchSummary(summary: MatchSummary): Promise<void>;
  updateRoundRecord(record: RoundRecord): Promise<void>;
  updateMatchSummary(summary: MatchSummary): Promise<void>;
  deleteRoundRecord(id: string): Promise<void>;
  deleteMatchSummary(id: string): Promise<void>;
}

export const compareRounds = (a: StoredRoundRecord, b: StoredRoundRecord) =>
  a.playedAt - b.playedAt || a.roundIndex - b.roundIndex;

export const compareMatches = (a: MatchSummary, b: MatchSummary) => a.startedAt - b.startedAt;

function dedupeById<T extends { id: string }>(items: ReadonlyArray<T>): { kept: T[]; dropped: number } {
  const seen = new Set<string>();
  const kept: T[] = [];
  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    kept.push(item);
  }
  return { kept, dropped: items.length - kept.length };
}

/** In-process store keyed by record id. */
export function createMemoryScoreStore(
  seed: Readonly<{ rounds?: ReadonlyArray<StoredRoundRecord>; matches?: ReadonlyArray<MatchSummary> }> = {},
): ScoreStore {
  const rounds = new Map<string, StoredRoundRecord>();
  const matches = new Map<string, MatchSummary>();
  for (const round of seed.rounds ?? []) rounds.set(round.id, round);
  for (const match of seed.matches ?? []) matches.set(match.id, match);

  return {
    async loadPlayerRounds(playerId) {
      return [...rounds.values()]
        .filter((round) => round.playerIds.includes(playerId))
        .sort(compareRounds);
    },
    async loadMatchRounds(matchId) {
      return [...rounds.values()]
        .filter((round) => round.matchId === matchId)
        .sort((a, b) => a.roundIndex - b.roundIndex);
    },
    async loadMatchSummaries(playerId) {
      return [...matches.values()]
        .filter((match) => match.playerIds.includes(playerId))
        .sort(compareMatches);
    },
    async saveRoundRecord(record) {
      rounds.set(record.id, record);
    },
    async saveMatchSummary(summary) {
      matches.set(summary.id, summary);
    },
    async updateRoundRecord(record) {
      if (!rounds.has(record.id)) throw recordNotFound('round', record.id);
      rounds.set(record.id, record);
    },
    async updateMatchSummary(summary) {
      if (!matches.has(summary.id)) throw recordNotFound('match', summary.id);
      matches.set(summary.id, summary);
    },
    async deleteRoundRecord(id) {
      rounds.delete(id);
    },
    async deleteMatchSummary(id) {
      matches.delete(id);
    },
  };
}

/**
 * Loads a player's history and computes their statistics. Duplicate records are
 * dropped by id and both lists are re-sorted before the statistics pass.
 */
export async function loadPlayerStatistics(
  store: ScoreStore,
  playerId: string,
): Promise<PlayerStatistics> {
  return withSpanAsync('state.player-statistics-load', { playerId }, async (span) => {
    const [rawRounds, rawMatches] = await Promise.all([
      store.loadPlayerRounds(playerId),
      store.loadMatchSummaries(playerId),
    ]);
    const rounds = dedupeById(rawRounds);
    const matches = dedupeById(rawMatches);
    if ((rounds.dropped > 0 || matches.dropped > 0) && isPlayerStatsLoggingEnabled()) {
      captureMessage('player stats: duplicate records dropped', {
        level: 'warn',
        attributes: { playerId, rounds: rounds.dropped, matches: matches.dropped },
      });
    }
    span?.setAttribute('stats.rounds', rounds.kept.length);
    span?.setAttribute('stats.matches', matches.kept.length);
    return computeStatistics(
      playerId,
      rounds.kept.sort(compareRounds),
      matches.kept.sort(compareMatches),
    );
  });
}

/** Saves an ended match. Matches without rounds are discarded; returns whether anything was written. */
export async function persistFinishedMatch(store: ScoreStore, session: MatchSession): Promise<boolean> {
  const { summary } = session;
  if (session.status !== 'ended' || summary === null || session.rounds.length === 0) {
    return false;
  }
  return withSpanAsync(
    'state.match-persist',
    { matchId: summary.id, rounds: session.rounds.length },
    async () => {
      for (const round of session.rounds) {
        await store.saveRoundRecord(round);
      }
      await store.saveMatchSummary(summary);
      return true;
    },
  );
}

/**
 * Writes an edited match back after the session has been re-folded. Every stored
 * round is rewritten, rounds no longer in the session are deleted, and the
 * summary is replaced (or removed once the match has no rounds left).
 */
export async function persistMatchEdit(store: ScoreStore, session: MatchSession): Promise<void> {
  const { matchId } = session;
  if (matchId === null) return;
  await withSpanAsync('state.match-edit-persist', { matchId }, async (span) => {
    const stored = await store.loadMatchRounds(matchId);
    const storedIds = new Set(stored.map((round) => round.id));
    const liveIds = new Set(session.rounds.map((round) => round.id));

    for (const round of session.rounds) {
      if (storedIds.has(round.id)) await store.updateRoundRecord(round);
      else await store.saveRoundRecord(round);
    }
    const removed = stored.filter((round) => !liveIds.has(round.id));
    for (const round of removed) {
      await store.deleteRoundRecord(round.id);
    }
    span?.setAttribute('rounds.removed', removed.length);

    if (session.summary) {
      await store.updateMatchSummary(session.summary);
    } else if (session.status === 'ended') {
      await store.deleteMatchSummary(matchId);
    }
  });
}

/**
 * Rebuilds an ended session from a stored summary and its rounds, so a past match
 * can be edited through `reduceSession` and written back with `persistMatchEdit`.
 * Legacy rounds get their first bidder from the rotation and no spring.
 */
export function restoreMatchSession(
  summary: MatchSummary,
  stored: ReadonlyArray<StoredRoundRecord>,
): MatchSession {
  const rounds: RoundRecord[] = stored
    .filter((round) => round.matchId === summary.id)
    .sort((a, b) => a.roundIndex - b.roundIndex)
    .map((round) =>
      Object.freeze({
        ...round,
        spring: round.spring ?? false,
        firstBidder: resolveFirstBidder(round, summary.initialStarter),
      }),
    );
  const base: MatchSession = {
    ...INITIAL_SESSION,
    status: 'ended',
    matchId: summary.id,
    playerIds: summary.playerIds,
    playerNames: summary.playerNames,
    initialStarter: summary.initialStarter,
    startedAt: summary.startedAt,
    endedAt: summary.endedAt,
  };
  return refoldSession(base, rounds);
}

export async function loadMatchSession(
  store: ScoreStore,
  summary: MatchSummary,
): Promise<MatchSession> {
  return withSpanAsync('state.match-restore', { matchId: summary.id }, async (span) => {
    const session = restoreMatchSession(summary, await store.loadMatchRounds(summary.id));
    span?.setAttribute('rounds.restored', session.rounds.length);
    return session;
  });
}
