import { z } from 'zod';

export type ObservabilityRuntime = 'node';

const truthyValues = new Set(['1', 'true', 'yes', 'on']);
const falsyValues = new Set(['0', 'false', 'no', 'off']);

const FeatureFlagsSchema = z.object({
  observability: z.object({
    node: z.boolean(),
  }),
  playerStatsLogs: z.boolean(),
});

export type FeatureFlags = z.infer<typeof FeatureFlagsSchema>;

const getRawFlagValue = (value: string | undefined) => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (truthyValues.has(normalized)) return true;
  if (falsyValues.has(normalized)) return false;
  return undefined;
};

const coerceBooleanFlag = (value: string | undefined, fallback = false) =>
  getRawFlagValue(value) ?? fallback;

export const getFeatureFlags = (env: NodeJS.ProcessEnv = process.env): FeatureFlags =>
  FeatureFlagsSchema.parse({
    observability: {
      node: coerceBooleanFlag(env.LANDLORD_OBSERVABILITY_ENABLED),
    },
    // Statistics warnings stay on during development unless explicitly disabled.
    playerStatsLogs: coerceBooleanFlag(env.PLAYER_STATS_LOGS, env.NODE_ENV !== 'production'),
  });

export const getObservabilityFlags = (env?: NodeJS.ProcessEnv) =>
  getFeatureFlags(env).observability;

export const isFlagExplicitlySet = (value: string | undefined) =>
  getRawFlagValue(value) !== undefined;
