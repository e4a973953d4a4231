import { mapTriple, type MatchSummary, type Seat, type StoredRoundRecord, type Triple } from '../types';
import { projectRound } from './normalize';
import { ratePercent, tallyDoubled, tallyRoles, tallyRoundTotals } from './tallies';

export type MatchPlayerBreakdown = Readonly<{
  seat: Seat;
  playerId: string;
  name: string;
  rounds: number;
  wins: number;
  losses: number;
  winRate: number;
  landlordGames: number;
  landlordWins: number;
  landlordWinRate: number;
  farmerGames: number;
  farmerWins: number;
  farmerWinRate: number;
  springCount: number;
  springAgainstCount: number;
  doubledGames: number;
  doubledWins: number;
  doubledWinRate: number;
  bestRound: number;
  worstRound: number;
  finalScore: number;
}>;

export type MatchBreakdown = Readonly<{
  matchId: string;
  totalGames: number;
  /** rounds of the match that ended in a spring */
  springRounds: number;
  players: Triple<MatchPlayerBreakdown>;
}>;

export function computeMatchPlayerBreakdown(
  summary: MatchSummary,
  rounds: ReadonlyArray<StoredRoundRecord>,
  seat: Seat,
): MatchPlayerBreakdown {
  const seen = rounds.map((record) => projectRound(record, seat));
  const totals = tallyRoundTotals(seen);
  const roles = tallyRoles(seen);
  const doubled = tallyDoubled(seen);
  const deltas = seen.map((round) => round.delta);
  return {
    seat,
    playerId: summary.playerIds[seat],
    name: summary.playerNames[seat],
    rounds: totals.totalGames,
    wins: totals.totalWins,
    losses: totals.totalLosses,
    winRate: ratePercent(totals.totalWins, totals.totalGames),
    landlordGames: roles.landlordGames,
    landlordWins: roles.landlordWins,
    landlordWinRate: roles.landlordWinRate,
    farmerGames: roles.farmerGames,
    farmerWins: roles.farmerWins,
    farmerWinRate: roles.farmerWinRate,
    springCount: roles.springCount,
    springAgainstCount: roles.springAgainstCount,
    doubledGames: doubled.doubledGames,
    doubledWins: doubled.doubledWins,
    doubledWinRate: doubled.doubledWinRate,
    bestRound: deltas.length ? Math.max(...deltas) : 0,
    worstRound: deltas.length ? Math.min(...deltas) : 0,
    finalScore: summary.finalScore[seat],
  };
}

/** Every seat's view of one finished match, from its summary and rounds. */
export function computeMatchBreakdown(
  summary: MatchSummary,
  rounds: ReadonlyArray<StoredRoundRecord>,
): MatchBreakdown {
  const own = rounds.filter((record) => record.matchId === summary.id);
  const players = mapTriple(summary.playerIds, (_playerId, seat) =>
    computeMatchPlayerBreakdown(summary, own, seat),
  );
  return {
    matchId: summary.id,
    totalGames: own.length,
    springRounds: own.filter((record) => record.spring === true).length,
    players,
  };
}
