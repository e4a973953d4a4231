import type { BidError } from './bids';
import type { MatchHeader } from './match';
import type { MatchSummary, RoundRecord, ScoreTriple, Seat, Triple, UUID } from './types';

export type SessionStatus = 'idle' | 'active' | 'ended';

/**
 * Explicit match context owned by the caller. Every change goes through
 * `reduceSession`, which re-folds the full round list.
 */
export type MatchSession = Readonly<{
  status: SessionStatus;
  matchId: UUID | null;
  playerIds: Triple<string>;
  playerNames: Triple<string>;
  initialStarter: Seat;
  startedAt: number | null;
  endedAt: number | null;
  rounds: ReadonlyArray<RoundRecord>;
  scores: ReadonlyArray<ScoreTriple>;
  summary: MatchSummary | null;
}>;

export const INITIAL_SESSION: MatchSession = Object.freeze({
  status: 'idle',
  matchId: null,
  playerIds: Object.freeze(['', '', ''] as const),
  playerNames: Object.freeze(['', '', ''] as const),
  initialStarter: 0,
  startedAt: null,
  endedAt: null,
  rounds: Object.freeze([]),
  scores: Object.freeze([]),
  summary: null,
});

export type SessionError =
  | BidError
  | Readonly<{ code: 'session.not_active'; message: string }>
  | Readonly<{ code: 'session.not_started'; message: string }>
  | Readonly<{ code: 'session.already_active'; message: string }>
  | Readonly<{ code: 'session.round_not_found'; index: number; message: string }>;

export function sessionHeader(session: MatchSession): MatchHeader | null {
  if (session.matchId === null || session.startedAt === null) return null;
  return {
    id: session.matchId,
    playerIds: session.playerIds,
    playerNames: session.playerNames,
    startedAt: session.startedAt,
    initialStarter: session.initialStarter,
  };
}
