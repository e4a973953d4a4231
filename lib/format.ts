import type { Bid, RoundOutcome } from './state/types';

export function formatDate(
  input: number | Date | undefined | null,
  options?: Intl.DateTimeFormatOptions,
): string {
  if (!input) return 'Unknown date';

  const d = typeof input === 'number' ? new Date(input) : input;
  if (isNaN(d.getTime())) return 'Invalid date';

  const base: Intl.DateTimeFormatOptions = {
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
  };
  return d.toLocaleDateString(undefined, { ...base, ...(options || {}) });
}

const BID_LABELS: Readonly<Record<Bid, string>> = {
  0: 'Pass',
  1: '1',
  2: '2',
  3: '3',
};

export function formatBid(bid: Bid): string {
  return BID_LABELS[bid];
}

/** Round or match score with an explicit sign; zero stays unsigned. */
export function formatSignedScore(value: number): string {
  if (value > 0) return `+${value}`;
  if (value < 0) return `${value}`;
  return '0';
}

/** Percentage with one decimal, e.g. `66.7%`. */
export function formatPercent(value: number): string {
  if (!Number.isFinite(value)) return '0.0%';
  return `${value.toFixed(1)}%`;
}

export function formatOutcome(outcome: RoundOutcome): string {
  return outcome === 'win' ? 'Win' : outcome === 'loss' ? 'Loss' : 'Even';
}
