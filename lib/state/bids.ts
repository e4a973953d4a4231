import { err, ok, SEATS, type Bid, type Result, type RoundInput, type Seat } from './types';

export type BidLevel = Exclude<Bid, 0>;

export type BidResolution = Readonly<{
  landlordSeat: Seat;
  level: BidLevel;
  baseStake: number;
}>;

export type BidError =
  | Readonly<{ code: 'bid.ambiguous'; level: BidLevel; seats: ReadonlyArray<Seat>; message: string }>
  | Readonly<{ code: 'bid.none'; message: string }>;

export const BASE_STAKE_PER_LEVEL = 100;

const fail = (error: BidError): Result<BidResolution, BidError> => err(error);

const LEVELS_DESC: ReadonlyArray<BidLevel> = [3, 2, 1];

export function ambiguousBidMessage(level: BidLevel): string {
  return `Multiple players bid ${level}`;
}

export const NO_BID_MESSAGE = 'Nobody bid';

/**
 * Picks the landlord from three bids. Only the highest level anyone bid matters:
 * a single seat there wins, a tie there is an error, ties below it are ignored.
 */
export function resolveBids(input: Pick<RoundInput, 'bids'>): Result<BidResolution, BidError> {
  for (const level of LEVELS_DESC) {
    const seats = SEATS.filter((seat) => input.bids[seat] === level);
    if (seats.length === 0) continue;
    const [landlordSeat] = seats;
    if (seats.length > 1 || landlordSeat === undefined) {
      return fail({
        code: 'bid.ambiguous',
        level,
        seats,
        message: ambiguousBidMessage(level),
      });
    }
    return ok({ landlordSeat, level, baseStake: BASE_STAKE_PER_LEVEL * level });
  }
  return fail({ code: 'bid.none', message: NO_BID_MESSAGE });
}
