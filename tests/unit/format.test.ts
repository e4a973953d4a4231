import { describe, expect, it } from 'vitest';

import { formatBid, formatOutcome, formatPercent, formatSignedScore } from '@/lib/format';

describe('format helpers', () => {
  it('labels bids', () => {
    expect([formatBid(0), formatBid(1), formatBid(2), formatBid(3)]).toEqual([
      'Pass',
      '1',
      '2',
      '3',
    ]);
  });

  it('signs scores', () => {
    expect(formatSignedScore(2400)).toBe('+2400');
    expect(formatSignedScore(-800)).toBe('-800');
    expect(formatSignedScore(0)).toBe('0');
  });

  it('prints percentages with one decimal', () => {
    expect(formatPercent(100 / 3)).toBe('33.3%');
    expect(formatPercent(50)).toBe('50.0%');
    expect(formatPercent(Number.NaN)).toBe('0.0%');
  });

  it('names outcomes', () => {
    expect(formatOutcome('win')).toBe('Win');
    expect(formatOutcome('loss')).toBe('Loss');
    expect(formatOutcome('neutral')).toBe('Even');
  });
});
