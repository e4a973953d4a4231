import { clampInt } from '@/lib/utils';
import { events } from '@/lib/state/events';
import { replaySession } from '@/lib/state/reducer';
import type { MatchSession } from '@/lib/state/session';
import type { SessionEvent } from '@/lib/state/events';
import { MAX_BOMBS, SEATS, type Bid, type RoundInput, type Seat, type Triple } from '@/lib/state/types';
import { getRng, pick, randomInt, type Rng } from './rng';

export { getRng, hashSeed, mulberry32, type Rng } from './rng';

const LEVELS: ReadonlyArray<Bid> = [1, 2, 3];

export type RoundInputOptions = Readonly<{
  rng: Rng;
  /** upper bound for generated bomb counts, capped at MAX_BOMBS */
  maxBombs?: number;
  /** chance of a fully random bid triple that may be ambiguous or empty */
  invalidBidRate?: number;
}>;

const isBidBelow =
  (level: Bid) =>
  (value: number): value is Bid =>
    value === 0 || ((value === 1 || value === 2 || value === 3) && value < level);

function validBids(rng: Rng): Triple<Bid> {
  const landlord = pick<Seat>(rng, SEATS, 0);
  const level = pick<Bid>(rng, LEVELS, 1);
  const below = (): Bid => pick<Bid>(rng, [0, 1, 2, 3].filter(isBidBelow(level)), 0);
  return [
    landlord === 0 ? level : below(),
    landlord === 1 ? level : below(),
    landlord === 2 ? level : below(),
  ];
}

function randomBid(rng: Rng): Bid {
  return pick<Bid>(rng, [0, 1, 2, 3], 0);
}

export function generateRoundInput(options: RoundInputOptions): RoundInput {
  const { rng } = options;
  const maxBombs = clampInt(options.maxBombs ?? 3, 0, MAX_BOMBS);
  const invalid = rng() < (options.invalidBidRate ?? 0);
  return {
    bids: invalid ? [randomBid(rng), randomBid(rng), randomBid(rng)] : validBids(rng),
    doubled: [rng() < 0.3, rng() < 0.3, rng() < 0.3],
    bombs: randomInt(rng, 0, maxBombs),
    spring: rng() < 0.15,
    landlordResult: rng() < 0.5,
  };
}

export type GeneratedMatchOptions = Readonly<{
  seed?: string | number;
  rng?: Rng;
  matchId?: string;
  playerIds?: Triple<string>;
  playerNames?: Triple<string>;
  roundCount?: number;
  startTimestamp?: number;
  /** gap between consecutive events */
  stepMs?: number;
}>;

export type GeneratedMatch = Readonly<{
  events: ReadonlyArray<SessionEvent>;
  inputs: ReadonlyArray<RoundInput>;
  session: MatchSession;
}>;

/**
 * Deterministic ended match: start, `roundCount` valid rounds, end. The events
 * are replayed through the session reducer so the result is what a live match
 * would have produced.
 */
export function generateMatch(options: GeneratedMatchOptions = {}): GeneratedMatch {
  const rng = options.rng ?? getRng(options.seed);
  const matchId = options.matchId ?? `match-${Math.floor(rng() * 1e9).toString(36)}`;
  const playerIds = options.playerIds ?? ['p1', 'p2', 'p3'];
  const playerNames = options.playerNames ?? ['Player 1', 'Player 2', 'Player 3'];
  const roundCount = Math.max(0, Math.trunc(options.roundCount ?? randomInt(rng, 1, 12)));
  const start = options.startTimestamp ?? 1_700_000_000_000;
  const step = options.stepMs ?? 60_000;

  const inputs: RoundInput[] = [];
  const sessionEvents: SessionEvent[] = [
    events.matchStarted(
      { matchId, playerIds, playerNames, initialStarter: pick<Seat>(rng, SEATS, 0) },
      { eventId: `${matchId}-start`, ts: start },
    ),
  ];
  for (let i = 0; i < roundCount; i += 1) {
    const input = generateRoundInput({ rng });
    inputs.push(input);
    sessionEvents.push(
      events.roundRecorded(
        { roundId: `${matchId}-r${i}`, input },
        { eventId: `${matchId}-e${i}`, ts: start + step * (i + 1) },
      ),
    );
  }
  sessionEvents.push(
    events.matchEnded({ eventId: `${matchId}-end`, ts: start + step * (roundCount + 1) }),
  );

  const replayed = replaySession(sessionEvents);
  if (!replayed.ok) {
    throw new Error(
      `Generated match ${matchId} failed at event ${replayed.error.eventIndex}: ${replayed.error.error.message}`,
    );
  }
  return { events: sessionEvents, inputs, session: replayed.value };
}
