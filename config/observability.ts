import { getFeatureFlags, getObservabilityFlags, type ObservabilityRuntime } from './flags';

export const SERVICE_NAME = 'landlord-ledger';

export const TRACER_NAME = `${SERVICE_NAME}-domain`;

export const isObservabilityEnabled = (runtime: ObservabilityRuntime = 'node') =>
  getObservabilityFlags()[runtime];

export const isPlayerStatsLoggingEnabled = () => getFeatureFlags().playerStatsLogs;
