import type { PlayerMatch, PlayerRound } from './normalize';

/** Percentage in [0, 100]; 0 when there is nothing to divide by. */
export const ratePercent = (count: number, total: number): number =>
  total > 0 ? (count / total) * 100 : 0;

export type RoundTotals = Readonly<{
  totalGames: number;
  totalWins: number;
  totalLosses: number;
  totalTies: number;
  winRate: number;
  totalScore: number;
  averageScore: number;
}>;

export type RoleSplit = Readonly<{
  landlordGames: number;
  landlordWins: number;
  landlordLosses: number;
  landlordWinRate: number;
  farmerGames: number;
  farmerWins: number;
  farmerLosses: number;
  farmerWinRate: number;
  springCount: number;
  springAgainstCount: number;
}>;

export type DoubledTally = Readonly<{
  doubledGames: number;
  doubledWins: number;
  doubledLosses: number;
  doubledWinRate: number;
}>;

export type FirstBidTally = Readonly<{
  firstBidderGames: number;
  firstBidNone: number;
  firstBidOne: number;
  firstBidTwo: number;
  firstBidThree: number;
}>;

export type MatchTally = Readonly<{
  totalMatches: number;
  matchesWon: number;
  matchesLost: number;
  matchesTied: number;
  matchWinRate: number;
}>;

export function tallyRoundTotals(rounds: ReadonlyArray<PlayerRound>): RoundTotals {
  let wins = 0;
  let losses = 0;
  let score = 0;
  for (const round of rounds) {
    if (round.delta > 0) wins += 1;
    else if (round.delta < 0) losses += 1;
    score += round.delta;
  }
  const total = rounds.length;
  return {
    totalGames: total,
    totalWins: wins,
    totalLosses: losses,
    totalTies: total - wins - losses,
    winRate: ratePercent(wins, total),
    totalScore: score,
    averageScore: total > 0 ? score / total : 0,
  };
}

/**
 * Landlord and farmer counts. Spring counts only rounds the landlord won:
 * "sprung" as landlord, "sprung against" as a farmer.
 */
export function tallyRoles(rounds: ReadonlyArray<PlayerRound>): RoleSplit {
  const tally = {
    landlordGames: 0,
    landlordWins: 0,
    landlordLosses: 0,
    farmerGames: 0,
    farmerWins: 0,
    farmerLosses: 0,
    springCount: 0,
    springAgainstCount: 0,
  };
  for (const round of rounds) {
    const sprung = round.spring && round.landlordResult;
    if (round.isLandlord) {
      tally.landlordGames += 1;
      if (round.delta > 0) tally.landlordWins += 1;
      if (round.delta < 0) tally.landlordLosses += 1;
      if (sprung) tally.springCount += 1;
    } else {
      tally.farmerGames += 1;
      if (round.delta > 0) tally.farmerWins += 1;
      if (round.delta < 0) tally.farmerLosses += 1;
      if (sprung) tally.springAgainstCount += 1;
    }
  }
  return {
    ...tally,
    landlordWinRate: ratePercent(tally.landlordWins, tally.landlordGames),
    farmerWinRate: ratePercent(tally.farmerWins, tally.farmerGames),
  };
}

export function tallyDoubled(rounds: ReadonlyArray<PlayerRound>): DoubledTally {
  let games = 0;
  let wins = 0;
  let losses = 0;
  for (const round of rounds) {
    if (!round.doubled) continue;
    games += 1;
    if (round.delta > 0) wins += 1;
    if (round.delta < 0) losses += 1;
  }
  return {
    doubledGames: games,
    doubledWins: wins,
    doubledLosses: losses,
    doubledWinRate: ratePercent(wins, games),
  };
}

/** Bid distribution over the rounds where this player opened the bidding. */
export function tallyFirstBids(rounds: ReadonlyArray<PlayerRound>): FirstBidTally {
  const counts = [0, 0, 0, 0];
  let games = 0;
  for (const round of rounds) {
    if (round.firstBidder !== round.seat) continue;
    games += 1;
    counts[round.bid] = (counts[round.bid] ?? 0) + 1;
  }
  return {
    firstBidderGames: games,
    firstBidNone: counts[0] ?? 0,
    firstBidOne: counts[1] ?? 0,
    firstBidTwo: counts[2] ?? 0,
    firstBidThree: counts[3] ?? 0,
  };
}

export function tallyMatches(matches: ReadonlyArray<PlayerMatch>): MatchTally {
  let won = 0;
  let lost = 0;
  for (const match of matches) {
    if (match.finalScore > 0) won += 1;
    else if (match.finalScore < 0) lost += 1;
  }
  return {
    totalMatches: matches.length,
    matchesWon: won,
    matchesLost: lost,
    matchesTied: matches.length - won - lost,
    matchWinRate: ratePercent(won, matches.length),
  };
}
