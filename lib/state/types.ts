export type UUID = string;

/** Seat index within a match: 0 = A, 1 = B, 2 = C. */
export type Seat = 0 | 1 | 2;

/** Persisted landlord position, 1-indexed (1 = A, 2 = B, 3 = C). */
export type LandlordPosition = 1 | 2 | 3;

/** Bid level; 0 means the seat passed. */
export type Bid = 0 | 1 | 2 | 3;

export type Triple<T> = readonly [T, T, T];

export type ScoreTriple = Triple<number>;

export type RoundOutcome = 'win' | 'loss' | 'neutral';

export const SEATS: ReadonlyArray<Seat> = Object.freeze([0, 1, 2] as const);

export const BID_NONE: Bid = 0;

export const MAX_BOMBS = 10;

export const ZERO_SCORES: ScoreTriple = Object.freeze([0, 0, 0] as const);

export type RoundInput = Readonly<{
  bids: Triple<Bid>;
  doubled: Triple<boolean>;
  bombs: number;
  spring: boolean;
  /** true when the landlord's side won the round */
  landlordResult: boolean;
}>;

export type RoundRecord = Readonly<{
  id: UUID;
  matchId: UUID;
  roundIndex: number;
  playedAt: number;
  playerIds: Triple<string>;
  landlord: LandlordPosition;
  bids: Triple<Bid>;
  doubled: Triple<boolean>;
  bombs: number;
  spring: boolean;
  landlordResult: boolean;
  deltas: ScoreTriple;
  firstBidder: Seat;
}>;

/**
 * Round as it may come back from storage. Records written before spring and
 * first-bidder tracking existed lack those fields, or carry them as null.
 */
export type StoredRoundRecord = Omit<RoundRecord, 'spring' | 'firstBidder'> &
  Readonly<{
    spring?: boolean | null | undefined;
    firstBidder?: Seat | null | undefined;
  }>;

export type MatchSummary = Readonly<{
  id: UUID;
  playerIds: Triple<string>;
  playerNames: Triple<string>;
  startedAt: number;
  endedAt: number | null;
  finalScore: ScoreTriple;
  totalGames: number;
  maxSnapshot: ScoreTriple;
  minSnapshot: ScoreTriple;
  initialStarter: Seat;
}>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export function isSeat(value: unknown): value is Seat {
  return value === 0 || value === 1 || value === 2;
}

export function seatOfLandlord(landlord: LandlordPosition): Seat {
  return landlord === 1 ? 0 : landlord === 2 ? 1 : 2;
}

export function landlordPositionOf(seat: Seat): LandlordPosition {
  return seat === 0 ? 1 : seat === 1 ? 2 : 3;
}

export function mapTriple<T, R>(triple: Triple<T>, fn: (value: T, seat: Seat) => R): Triple<R> {
  return [fn(triple[0], 0), fn(triple[1], 1), fn(triple[2], 2)];
}

export function seatOf(playerIds: Triple<string>, playerId: string): Seat | null {
  for (const seat of SEATS) {
    if (playerIds[seat] === playerId) return seat;
  }
  return null;
}
