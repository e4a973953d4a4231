export type StreakSummary = Readonly<{
  currentWin: number;
  currentLoss: number;
  maxWin: number;
  maxLoss: number;
}>;

/**
 * Win/loss streaks over signed results in play order. A zero result resets both
 * counters, so a tie ends a winning streak as well as a losing one.
 */
export function computeStreaks(results: Iterable<number>): StreakSummary {
  let currentWin = 0;
  let currentLoss = 0;
  let maxWin = 0;
  let maxLoss = 0;
  for (const value of results) {
    if (value > 0) {
      currentWin += 1;
      currentLoss = 0;
      if (currentWin > maxWin) maxWin = currentWin;
    } else if (value < 0) {
      currentLoss += 1;
      currentWin = 0;
      if (currentLoss > maxLoss) maxLoss = currentLoss;
    } else {
      currentWin = 0;
      currentLoss = 0;
    }
  }
  return { currentWin, currentLoss, maxWin, maxLoss };
}
