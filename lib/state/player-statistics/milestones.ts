import type { PlayerMatch, PlayerRound } from './normalize';

export type ScoreMilestones = Readonly<{
  bestGameScore: number;
  worstGameScore: number;
  bestMatchScore: number;
  worstMatchScore: number;
  /** highest running total reached inside any single match */
  bestSnapshot: number;
  worstSnapshot: number;
}>;

export type RunningMilestones = Readonly<{
  runningMax: number;
  /** 0-based position in the player's round history; null with no rounds */
  runningMaxIndex: number | null;
  runningMin: number;
  runningMinIndex: number | null;
}>;

const extremes = (values: ReadonlyArray<number>): { max: number; min: number } => {
  if (values.length === 0) return { max: 0, min: 0 };
  return { max: Math.max(...values), min: Math.min(...values) };
};

export function computeScoreMilestones(
  rounds: ReadonlyArray<PlayerRound>,
  matches: ReadonlyArray<PlayerMatch>,
): ScoreMilestones {
  const games = extremes(rounds.map((round) => round.delta));
  const finals = extremes(matches.map((match) => match.finalScore));
  const highs = extremes(matches.map((match) => match.maxSnapshot));
  const lows = extremes(matches.map((match) => match.minSnapshot));
  return {
    bestGameScore: games.max,
    worstGameScore: games.min,
    bestMatchScore: finals.max,
    worstMatchScore: finals.min,
    bestSnapshot: highs.max,
    worstSnapshot: lows.min,
  };
}

/**
 * One cumulative sum across every round regardless of match boundaries. Ties
 * keep the earliest index.
 */
export function computeRunningMilestones(rounds: ReadonlyArray<PlayerRound>): RunningMilestones {
  let running = 0;
  let runningMax = 0;
  let runningMin = 0;
  let runningMaxIndex: number | null = null;
  let runningMinIndex: number | null = null;

  for (const [index, round] of rounds.entries()) {
    running += round.delta;
    if (runningMaxIndex === null || running > runningMax) {
      runningMax = running;
      runningMaxIndex = index;
    }
    if (runningMinIndex === null || running < runningMin) {
      runningMin = running;
      runningMinIndex = index;
    }
  }

  return { runningMax, runningMaxIndex, runningMin, runningMinIndex };
}
