import { describe, expect, it } from 'vitest';

import { computeStreaks } from '@/lib/state/player-statistics/streaks';

describe('computeStreaks', () => {
  it('reports the run still going after the last result', () => {
    expect(computeStreaks([50, 30, -10, 20, 0, 5])).toEqual({
      currentWin: 1,
      currentLoss: 0,
      maxWin: 2,
      maxLoss: 1,
    });
  });

  it('resets both counters on a tie', () => {
    expect(computeStreaks([-1, -1, 0])).toEqual({
      currentWin: 0,
      currentLoss: 0,
      maxWin: 0,
      maxLoss: 2,
    });
  });

  it('keeps the longest run even after it is broken', () => {
    expect(computeStreaks([1, 1, 1, -1, 1])).toEqual({
      currentWin: 1,
      currentLoss: 0,
      maxWin: 3,
      maxLoss: 1,
    });
  });

  it('is all zeros without results', () => {
    expect(computeStreaks([])).toEqual({ currentWin: 0, currentLoss: 0, maxWin: 0, maxLoss: 0 });
  });
});
