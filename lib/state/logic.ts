import { withSpanSync } from '@/lib/observability/spans';
import { resolveBids, type BidError, type BidLevel } from './bids';
import { applyMultipliers, outcomeOf } from './multipliers';
import {
  landlordPositionOf,
  mapTriple,
  ok,
  type LandlordPosition,
  type Result,
  type RoundInput,
  type RoundOutcome,
  type RoundRecord,
  type ScoreTriple,
  type Seat,
  type StoredRoundRecord,
  type Triple,
  type UUID,
} from './types';

export const SEAT_COUNT = 3;

/**
 * Seat that opens the bidding for the given 0-based round of a match. Non-finite
 * arguments fall back to seat 0, as an unknown starter does in `resolveFirstBidder`.
 */
export function firstBidder(roundIndex: number, matchStarter: number): Seat {
  if (!Number.isFinite(roundIndex) || !Number.isFinite(matchStarter)) return 0;
  const raw = (Math.trunc(roundIndex) + Math.trunc(matchStarter)) % SEAT_COUNT;
  const normalized = raw < 0 ? raw + SEAT_COUNT : raw;
  return normalized === 0 ? 0 : normalized === 1 ? 1 : 2;
}

/**
 * Recorded first bidder when present; otherwise the rotation value for the
 * round's position. Stored values always win over the formula.
 */
export function resolveFirstBidder(
  record: Pick<StoredRoundRecord, 'firstBidder' | 'roundIndex'>,
  matchStarter: number | null | undefined,
): Seat {
  if (record.firstBidder != null) return record.firstBidder;
  return matchStarter == null ? 0 : firstBidder(record.roundIndex, matchStarter);
}

export type RoundResolution = Readonly<{
  landlordSeat: Seat;
  landlord: LandlordPosition;
  level: BidLevel;
  baseStake: number;
  stake: number;
  deltas: ScoreTriple;
  outcomes: Triple<RoundOutcome>;
}>;

/**
 * Validates bids and applies modifiers for a full round entry. Bid problems come
 * back as a result for the caller to show; bad modifiers throw.
 */
export function resolveRound(input: RoundInput): Result<RoundResolution, BidError> {
  return withSpanSync<Result<RoundResolution, BidError>>(
    'state.resolve-round',
    { bombs: input.bombs, spring: input.spring, landlordResult: input.landlordResult },
    (span) => {
      const bids = resolveBids(input);
      if (!bids.ok) {
        span?.setAttribute('round.error', bids.error.code);
        return bids;
      }
      const { landlordSeat, level, baseStake } = bids.value;
      const breakdown = applyMultipliers(baseStake, {
        landlordSeat,
        bombs: input.bombs,
        spring: input.spring,
        doubled: input.doubled,
        landlordResult: input.landlordResult,
      });
      span?.setAttribute('round.stake', breakdown.stake);
      return ok(
        Object.freeze({
          landlordSeat,
          landlord: landlordPositionOf(landlordSeat),
          level,
          baseStake,
          stake: breakdown.stake,
          deltas: breakdown.deltas,
          outcomes: mapTriple(breakdown.deltas, outcomeOf),
        }),
      );
    },
  );
}

export type RoundRecordMeta = Readonly<{
  id: UUID;
  matchId: UUID;
  roundIndex: number;
  playedAt: number;
  playerIds: Triple<string>;
  firstBidder: Seat;
}>;

export function buildRoundRecord(
  input: RoundInput,
  resolution: RoundResolution,
  meta: RoundRecordMeta,
): RoundRecord {
  return Object.freeze({
    ...meta,
    landlord: resolution.landlord,
    bids: input.bids,
    doubled: input.doubled,
    bombs: input.bombs,
    spring: input.spring,
    landlordResult: input.landlordResult,
    deltas: resolution.deltas,
  });
}

export function roundInputOf(record: StoredRoundRecord): RoundInput {
  return {
    bids: record.bids,
    doubled: record.doubled,
    bombs: record.bombs,
    spring: record.spring ?? false,
    landlordResult: record.landlordResult,
  };
}
