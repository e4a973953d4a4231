import { z } from 'zod';

import { idSchema, playerIdsSchema, roundInputSchema, seatSchema } from './records';

const index = z.number().int().nonnegative();
const playerName = z.string().trim().min(1);

export const eventPayloadSchemas = {
  'match/started': z.object({
    matchId: idSchema,
    playerIds: playerIdsSchema,
    playerNames: z.tuple([playerName, playerName, playerName]).readonly(),
    initialStarter: seatSchema,
  }),
  'round/recorded': z.object({
    roundId: idSchema,
    input: roundInputSchema,
    firstBidder: seatSchema.optional(),
  }),
  'round/edited': z.object({ index, input: roundInputSchema }),
  'round/deleted': z.object({ index }),
  'match/ended': z.object({}),
} as const;

export type SessionEventType = keyof typeof eventPayloadSchemas;

export type EventPayloadByType<T extends SessionEventType> = z.infer<(typeof eventPayloadSchemas)[T]>;

export type EventPayloadSchemaMap = typeof eventPayloadSchemas;

export const sessionEventTypeList: ReadonlyArray<SessionEventType> = [
  'match/started',
  'round/recorded',
  'round/edited',
  'round/deleted',
  'match/ended',
];

export const sessionEventTypeEnum = z.enum([
  'match/started',
  'round/recorded',
  'round/edited',
  'round/deleted',
  'match/ended',
]);

export const eventEnvelopeSchema = z.object({
  eventId: z.string().min(1),
  ts: z.number().finite(),
  type: z.string().min(1),
  payload: z.unknown(),
});
