import { z } from 'zod';

import { MAX_BOMBS } from '@/lib/state/types';

export const idSchema = z.string().min(1);
const nonEmpty = z.string().trim().min(1);
const score = z.number().int();
const timestamp = z.number().finite();

export const seatSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);
export const landlordPositionSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);
export const bidSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

const triple = <T extends z.ZodTypeAny>(item: T) => z.tuple([item, item, item]).readonly();

export const playerIdsSchema = triple(idSchema).refine(
  ([a, b, c]) => a !== b && b !== c && a !== c,
  { message: 'Each seat needs a different player' },
);

export const scoreTripleSchema = triple(score);

export const roundInputSchema = z.object({
  bids: triple(bidSchema),
  doubled: triple(z.boolean()),
  bombs: z.number().int().min(0).max(MAX_BOMBS),
  spring: z.boolean(),
  landlordResult: z.boolean(),
});

export const storedRoundRecordSchema = z.object({
  id: idSchema,
  matchId: idSchema,
  roundIndex: z.number().int().nonnegative(),
  playedAt: timestamp,
  playerIds: triple(idSchema),
  landlord: landlordPositionSchema,
  bids: triple(bidSchema),
  doubled: triple(z.boolean()),
  bombs: z.number().int().nonnegative(),
  spring: z.boolean().nullish(),
  landlordResult: z.boolean(),
  deltas: scoreTripleSchema,
  firstBidder: seatSchema.nullish(),
});

export const matchSummarySchema = z.object({
  id: idSchema,
  playerIds: triple(idSchema),
  playerNames: triple(nonEmpty),
  startedAt: timestamp,
  endedAt: timestamp.nullable(),
  finalScore: scoreTripleSchema,
  totalGames: z.number().int().nonnegative(),
  maxSnapshot: scoreTripleSchema,
  minSnapshot: scoreTripleSchema,
  initialStarter: seatSchema.nullish(),
});

export type RoundInputPayload = z.infer<typeof roundInputSchema>;
export type StoredRoundRecordPayload = z.infer<typeof storedRoundRecordSchema>;
export type MatchSummaryPayload = z.infer<typeof matchSummarySchema>;
