import { randomUUID } from 'node:crypto';

// UUID utility used across the state layer and tests
export function uuid(): string {
  return randomUUID();
}

export function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}
