import { withSpanSync } from '@/lib/observability/spans';
import {
  trackMatchFinalized,
  trackRoundEdited,
  trackRoundRecorded,
} from '@/lib/observability/events';
import type { SessionEvent, SessionEventOf } from './events';
import { buildRoundRecord, firstBidder, resolveRound } from './logic';
import { finalizeMatch, foldMatch } from './match';
import { INITIAL_SESSION, sessionHeader, type MatchSession, type SessionError } from './session';
import { err, ok, type Result, type RoundRecord } from './types';
import { validateEventStrict } from './validation';

export type SessionResult = Result<MatchSession, SessionError>;

const NOT_ACTIVE_MESSAGE = 'No match is in progress';
const NOT_STARTED_MESSAGE = 'Start a match before editing rounds';
const ALREADY_ACTIVE_MESSAGE = 'Finish the current match before starting a new one';

const fail = (error: SessionError): SessionResult => err(error);

function roundNotFound(index: number): SessionResult {
  return fail({
    code: 'session.round_not_found',
    index,
    message: `Round ${index + 1} does not exist`,
  });
}

/** Replaces the round list and re-folds scores, and the summary once the match has ended. */
export function refoldSession(
  session: MatchSession,
  rounds: ReadonlyArray<RoundRecord>,
): MatchSession {
  const { scores } = foldMatch(rounds);
  const header = sessionHeader(session);
  const summary =
    session.status === 'ended' && header && rounds.length > 0
      ? finalizeMatch(header, rounds, session.endedAt)
      : null;
  return { ...session, rounds: Object.freeze([...rounds]), scores, summary };
}

function applyMatchStarted(
  session: MatchSession,
  event: SessionEventOf<'match/started'>,
): SessionResult {
  if (session.status === 'active') {
    return fail({ code: 'session.already_active', message: ALREADY_ACTIVE_MESSAGE });
  }
  const { matchId, playerIds, playerNames, initialStarter } = event.payload;
  const started: MatchSession = {
    ...INITIAL_SESSION,
    status: 'active',
    matchId,
    playerIds,
    playerNames: [playerNames[0].trim(), playerNames[1].trim(), playerNames[2].trim()],
    initialStarter,
    startedAt: event.ts,
  };
  return ok(started);
}

function applyRoundRecorded(
  session: MatchSession,
  event: SessionEventOf<'round/recorded'>,
): SessionResult {
  if (session.status !== 'active' || session.matchId === null) {
    return fail({ code: 'session.not_active', message: NOT_ACTIVE_MESSAGE });
  }
  const { roundId, input } = event.payload;
  const resolution = resolveRound(input);
  if (!resolution.ok) return resolution;

  const roundIndex = session.rounds.length;
  const record = buildRoundRecord(input, resolution.value, {
    id: roundId,
    matchId: session.matchId,
    roundIndex,
    playedAt: event.ts,
    playerIds: session.playerIds,
    firstBidder: event.payload.firstBidder ?? firstBidder(roundIndex, session.initialStarter),
  });
  trackRoundRecorded({
    matchId: session.matchId,
    roundIndex,
    landlord: record.landlord,
    stake: resolution.value.stake,
    landlordResult: record.landlordResult,
  });
  return ok(refoldSession(session, [...session.rounds, record]));
}

function applyRoundEdited(
  session: MatchSession,
  event: SessionEventOf<'round/edited'>,
): SessionResult {
  if (session.status === 'idle') {
    return fail({ code: 'session.not_started', message: NOT_STARTED_MESSAGE });
  }
  const { index, input } = event.payload;
  const existing = session.rounds[index];
  if (!existing) return roundNotFound(index);

  const resolution = resolveRound(input);
  if (!resolution.ok) return resolution;

  // Identity and the recorded first bidder survive the edit.
  const record = buildRoundRecord(input, resolution.value, {
    id: existing.id,
    matchId: existing.matchId,
    roundIndex: existing.roundIndex,
    playedAt: existing.playedAt,
    playerIds: existing.playerIds,
    firstBidder: existing.firstBidder,
  });
  const rounds = session.rounds.map((round, i) => (i === index ? record : round));
  trackRoundEdited(existing.matchId, index);
  return ok(refoldSession(session, rounds));
}

function applyRoundDeleted(
  session: MatchSession,
  event: SessionEventOf<'round/deleted'>,
): SessionResult {
  if (session.status === 'idle') {
    return fail({ code: 'session.not_started', message: NOT_STARTED_MESSAGE });
  }
  const { index } = event.payload;
  if (!session.rounds[index]) return roundNotFound(index);

  const rounds = session.rounds
    .filter((_, i) => i !== index)
    .map((round, i) => (round.roundIndex === i ? round : Object.freeze({ ...round, roundIndex: i })));
  return ok(refoldSession(session, rounds));
}

function applyMatchEnded(
  session: MatchSession,
  event: SessionEventOf<'match/ended'>,
): SessionResult {
  if (session.status !== 'active' || session.matchId === null) {
    return fail({ code: 'session.not_active', message: NOT_ACTIVE_MESSAGE });
  }
  const ended: MatchSession = { ...session, status: 'ended', endedAt: event.ts };
  const next = refoldSession(ended, session.rounds);
  trackMatchFinalized({
    matchId: session.matchId,
    totalGames: session.rounds.length,
    discarded: next.summary === null,
  });
  return ok(next);
}

/**
 * Applies one session event. Never mutates `session`; validation failures come
 * back as errors carrying a message for the player.
 */
export function reduceSession(session: MatchSession, event: SessionEvent): SessionResult {
  return withSpanSync<SessionResult>(
    'state.reduce-session',
    { type: event.type, rounds: session.rounds.length },
    () => {
      switch (event.type) {
        case 'match/started':
          return applyMatchStarted(session, event);
        case 'round/recorded':
          return applyRoundRecorded(session, event);
        case 'round/edited':
          return applyRoundEdited(session, event);
        case 'round/deleted':
          return applyRoundDeleted(session, event);
        case 'match/ended':
          return applyMatchEnded(session, event);
      }
    },
  );
}

/** Validates an untyped event before reducing it; malformed events throw. */
export function applySessionEvent(session: MatchSession, raw: unknown): SessionResult {
  return reduceSession(session, validateEventStrict(raw));
}

export type ReplayFailure = Readonly<{ eventIndex: number; error: SessionError }>;

export function replaySession(
  sessionEvents: ReadonlyArray<SessionEvent>,
  base: MatchSession = INITIAL_SESSION,
): Result<MatchSession, ReplayFailure> {
  let session = base;
  for (const [eventIndex, event] of sessionEvents.entries()) {
    const result = reduceSession(session, event);
    if (!result.ok) return err({ eventIndex, error: result.error });
    session = result.value;
  }
  return ok(session);
}
