import { withSpanSync } from '@/lib/observability/spans';
import {
  ZERO_SCORES,
  type MatchSummary,
  type ScoreTriple,
  type Seat,
  type StoredRoundRecord,
  type Triple,
  type UUID,
} from './types';

export type MatchTotals = Readonly<{
  finalScore: ScoreTriple;
  totalGames: number;
  /** per-seat running-total extremes, including the zero state before round 1 */
  maxSnapshot: ScoreTriple;
  minSnapshot: ScoreTriple;
}>;

export type MatchFold = Readonly<{
  scores: ReadonlyArray<ScoreTriple>;
  summary: MatchTotals;
}>;

export type MatchHeader = Readonly<{
  id: UUID;
  playerIds: Triple<string>;
  playerNames: Triple<string>;
  startedAt: number;
  initialStarter: Seat;
}>;

type DeltaSource = Pick<StoredRoundRecord, 'deltas'>;

export function addScores(a: ScoreTriple, b: ScoreTriple): ScoreTriple {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/**
 * Prefix sums of round deltas plus the snapshot extremes. Always a full pass over
 * the rounds; callers re-fold after any edit instead of patching totals.
 */
export function foldMatch(rounds: ReadonlyArray<DeltaSource>): MatchFold {
  return withSpanSync('state.fold-match', { rounds: rounds.length }, () => {
    const scores: ScoreTriple[] = [];
    let running: ScoreTriple = ZERO_SCORES;
    let max: ScoreTriple = ZERO_SCORES;
    let min: ScoreTriple = ZERO_SCORES;

    for (const round of rounds) {
      running = addScores(running, round.deltas);
      scores.push(running);
      max = [
        Math.max(max[0], running[0]),
        Math.max(max[1], running[1]),
        Math.max(max[2], running[2]),
      ];
      min = [
        Math.min(min[0], running[0]),
        Math.min(min[1], running[1]),
        Math.min(min[2], running[2]),
      ];
    }

    return Object.freeze({
      scores: Object.freeze(scores),
      summary: Object.freeze({
        finalScore: running,
        totalGames: rounds.length,
        maxSnapshot: max,
        minSnapshot: min,
      }),
    });
  });
}

export function finalizeMatch(
  header: MatchHeader,
  rounds: ReadonlyArray<DeltaSource>,
  endedAt: number | null,
): MatchSummary {
  const { summary } = foldMatch(rounds);
  return Object.freeze({
    ...header,
    ...summary,
    endedAt,
  });
}

export function sumDeltas(deltas: ScoreTriple): number {
  return deltas[0] + deltas[1] + deltas[2];
}
