import { matchSummarySchema, storedRoundRecordSchema } from '@/schema/records';
import { isPlayerStatsLoggingEnabled } from '@/config/observability';
import { captureMessage } from '@/lib/observability/log';
import type { SpanAttributesInput } from '@/lib/observability/attributes';
import {
  seatOf,
  seatOfLandlord,
  type Bid,
  type MatchSummary,
  type Seat,
  type StoredRoundRecord,
} from '../types';

/** One round seen from a single player's seat. */
export type PlayerRound = Readonly<{
  roundId: string;
  matchId: string;
  roundIndex: number;
  playedAt: number;
  seat: Seat;
  delta: number;
  isLandlord: boolean;
  bid: Bid;
  doubled: boolean;
  spring: boolean;
  landlordResult: boolean;
  firstBidder: Seat;
}>;

/** One match seen from a single player's seat. */
export type PlayerMatch = Readonly<{
  matchId: string;
  startedAt: number;
  seat: Seat;
  finalScore: number;
  maxSnapshot: number;
  minSnapshot: number;
  totalGames: number;
}>;

const logNormalization = (message: string, attributes: SpanAttributesInput) => {
  if (!isPlayerStatsLoggingEnabled()) return;
  captureMessage(message, { level: 'warn', attributes });
};

const idOf = (value: unknown): string | null => {
  if (!value || typeof value !== 'object' || !('id' in value)) return null;
  return typeof value.id === 'string' ? value.id : null;
};

/**
 * Projects a stored round onto `seat`. Legacy records without `spring` or
 * `firstBidder` read as no spring and seat 0.
 */
export function projectRound(record: StoredRoundRecord, seat: Seat): PlayerRound {
  return {
    roundId: record.id,
    matchId: record.matchId,
    roundIndex: record.roundIndex,
    playedAt: record.playedAt,
    seat,
    delta: record.deltas[seat],
    isLandlord: seatOfLandlord(record.landlord) === seat,
    bid: record.bids[seat],
    doubled: record.doubled[seat],
    spring: record.spring ?? false,
    landlordResult: record.landlordResult,
    firstBidder: record.firstBidder ?? 0,
  };
}

/**
 * Validates and projects a player's round history. Malformed rounds and rounds
 * the player did not sit in are dropped and logged; nothing here throws.
 */
export function normalizePlayerRounds(
  playerId: string,
  rounds: ReadonlyArray<unknown>,
): PlayerRound[] {
  const result: PlayerRound[] = [];
  for (const raw of rounds) {
    const parsed = storedRoundRecordSchema.safeParse(raw);
    if (!parsed.success) {
      logNormalization('player stats: dropped malformed round', {
        playerId,
        roundId: idOf(raw),
        issues: parsed.error.issues.length,
      });
      continue;
    }
    const record = parsed.data;
    const seat = seatOf(record.playerIds, playerId);
    if (seat === null) {
      logNormalization('player stats: player not seated in round', {
        playerId,
        roundId: record.id,
        matchId: record.matchId,
      });
      continue;
    }
    result.push(projectRound(record, seat));
  }
  return result;
}

type MatchSnapshotSource = Pick<
  MatchSummary,
  'id' | 'startedAt' | 'finalScore' | 'maxSnapshot' | 'minSnapshot' | 'totalGames'
>;

export function projectMatch(summary: MatchSnapshotSource, seat: Seat): PlayerMatch {
  return {
    matchId: summary.id,
    startedAt: summary.startedAt,
    seat,
    finalScore: summary.finalScore[seat],
    maxSnapshot: summary.maxSnapshot[seat],
    minSnapshot: summary.minSnapshot[seat],
    totalGames: summary.totalGames,
  };
}

export function normalizePlayerMatches(
  playerId: string,
  matches: ReadonlyArray<unknown>,
): PlayerMatch[] {
  const result: PlayerMatch[] = [];
  for (const raw of matches) {
    const parsed = matchSummarySchema.safeParse(raw);
    if (!parsed.success) {
      logNormalization('player stats: dropped malformed match', {
        playerId,
        matchId: idOf(raw),
        issues: parsed.error.issues.length,
      });
      continue;
    }
    const summary = parsed.data;
    const seat = seatOf(summary.playerIds, playerId);
    if (seat === null) {
      logNormalization('player stats: player not seated in match', {
        playerId,
        matchId: summary.id,
      });
      continue;
    }
    result.push(projectMatch(summary, seat));
  }
  return result;
}
