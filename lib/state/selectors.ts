import { firstBidder } from './logic';
import { outcomeOf } from './multipliers';
import type { MatchSession } from './session';
import {
  SEATS,
  ZERO_SCORES,
  mapTriple,
  seatOfLandlord,
  type RoundOutcome,
  type ScoreTriple,
  type Seat,
  type Triple,
} from './types';

// Simple memo helpers keyed by object identity and primitive args.
function memo1<A extends object, R>(fn: (a: A) => R) {
  let last: { arg: A; result: R } | null = null;
  return (a: A): R => {
    if (last && last.arg === a) return last.result;
    const result = fn(a);
    last = { arg: a, result };
    return result;
  };
}

function memo2<A1 extends object, A2 extends number | string, R>(fn: (a1: A1, a2: A2) => R) {
  let last: { a1: A1; a2: A2; result: R } | null = null;
  return (a1: A1, a2: A2): R => {
    if (last && last.a1 === a1 && last.a2 === a2) return last.result;
    const result = fn(a1, a2);
    last = { a1, a2, result };
    return result;
  };
}

export type ScoreDisplayMode = 'per-round' | 'cumulative';

export type RoundRow = Readonly<{
  roundIndex: number;
  landlordSeat: Seat;
  firstBidder: Seat;
  values: ScoreTriple;
  outcomes: Triple<RoundOutcome>;
}>;

export type Leader = Readonly<{ seat: Seat; playerId: string; name: string; score: number }>;

export const selectTotals = memo1(
  (s: MatchSession): ScoreTriple => s.scores[s.scores.length - 1] ?? ZERO_SCORES,
);

/** Seat that bids first in the next round, or null when no match is running. */
export const selectNextFirstBidder = memo1((s: MatchSession): Seat | null =>
  s.status === 'active' ? firstBidder(s.rounds.length, s.initialStarter) : null,
);

export const selectRoundRows = memo2(
  (s: MatchSession, mode: ScoreDisplayMode): ReadonlyArray<RoundRow> =>
    s.rounds.map((round, i) => ({
      roundIndex: round.roundIndex,
      landlordSeat: seatOfLandlord(round.landlord),
      firstBidder: round.firstBidder,
      values: mode === 'cumulative' ? (s.scores[i] ?? round.deltas) : round.deltas,
      outcomes: mapTriple(round.deltas, outcomeOf),
    })),
);

export const selectLeaders = memo1((s: MatchSession): ReadonlyArray<Leader> => {
  const totals = selectTotals(s);
  const leaders: Leader[] = SEATS.map((seat) => ({
    seat,
    playerId: s.playerIds[seat],
    name: s.playerNames[seat],
    score: totals[seat],
  }));
  // Array.prototype.sort is stable, so equal scores keep seat order.
  leaders.sort((a, b) => b.score - a.score);
  return leaders;
});
