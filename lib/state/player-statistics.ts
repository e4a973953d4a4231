import { withSpanSync } from '@/lib/observability/spans';
import {
  normalizePlayerMatches,
  normalizePlayerRounds,
  type PlayerMatch,
  type PlayerRound,
} from './player-statistics/normalize';
import {
  tallyDoubled,
  tallyFirstBids,
  tallyMatches,
  tallyRoles,
  tallyRoundTotals,
  type DoubledTally,
  type FirstBidTally,
  type MatchTally,
  type RoleSplit,
  type RoundTotals,
} from './player-statistics/tallies';
import { computeStreaks } from './player-statistics/streaks';
import {
  computeRunningMilestones,
  computeScoreMilestones,
  type RunningMilestones,
  type ScoreMilestones,
} from './player-statistics/milestones';
import type { MatchSummary, StoredRoundRecord } from './types';

export type StreakStats = Readonly<{
  currentWinStreak: number;
  currentLossStreak: number;
  maxWinStreak: number;
  maxLossStreak: number;
  currentMatchWinStreak: number;
  currentMatchLossStreak: number;
  maxMatchWinStreak: number;
  maxMatchLossStreak: number;
}>;

/**
 * Flat aggregate over a player's history. Always recomputed from the full round
 * and match lists; never stored or patched.
 */
export type PlayerStatistics = Readonly<
  { playerId: string } & RoundTotals &
    RoleSplit &
    FirstBidTally &
    DoubledTally &
    MatchTally &
    StreakStats &
    ScoreMilestones &
    RunningMilestones
>;

export function computeStreakStats(
  rounds: ReadonlyArray<PlayerRound>,
  matches: ReadonlyArray<PlayerMatch>,
): StreakStats {
  const byRound = computeStreaks(rounds.map((round) => round.delta));
  const byMatch = computeStreaks(matches.map((match) => match.finalScore));
  return {
    currentWinStreak: byRound.currentWin,
    currentLossStreak: byRound.currentLoss,
    maxWinStreak: byRound.maxWin,
    maxLossStreak: byRound.maxLoss,
    currentMatchWinStreak: byMatch.currentWin,
    currentMatchLossStreak: byMatch.currentLoss,
    maxMatchWinStreak: byMatch.maxWin,
    maxMatchLossStreak: byMatch.maxLoss,
  };
}

/**
 * Statistics for `playerId`. Rounds are expected in play order and matches in
 * start order; malformed or foreign entries are skipped, never thrown on.
 */
export function computeStatistics(
  playerId: string,
  rounds: ReadonlyArray<StoredRoundRecord>,
  matches: ReadonlyArray<MatchSummary>,
): PlayerStatistics {
  return withSpanSync(
    'state.player-statistics',
    { playerId, rounds: rounds.length, matches: matches.length },
    (span) => {
      const playerRounds = normalizePlayerRounds(playerId, rounds);
      const playerMatches = normalizePlayerMatches(playerId, matches);
      span?.setAttribute('stats.rounds.used', playerRounds.length);
      span?.setAttribute('stats.matches.used', playerMatches.length);

      return Object.freeze({
        playerId,
        ...tallyRoundTotals(playerRounds),
        ...tallyRoles(playerRounds),
        ...tallyFirstBids(playerRounds),
        ...tallyDoubled(playerRounds),
        ...tallyMatches(playerMatches),
        ...computeStreakStats(playerRounds, playerMatches),
        ...computeScoreMilestones(playerRounds, playerMatches),
        ...computeRunningMilestones(playerRounds),
      });
    },
  );
}

export { computeMatchBreakdown, computeMatchPlayerBreakdown } from './player-statistics/match-breakdown';
export type { MatchBreakdown, MatchPlayerBreakdown } from './player-statistics/match-breakdown';
export type { PlayerMatch, PlayerRound } from './player-statistics/normalize';
