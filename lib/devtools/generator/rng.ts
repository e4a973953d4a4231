export type Rng = () => number;

/** Mulberry32: small seeded PRNG returning floats in [0, 1). */
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function hashSeed(value: string): number {
  let hash = 2166136261;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

export function getRng(seed?: string | number): Rng {
  if (typeof seed === 'number') return mulberry32(seed);
  const normalized = typeof seed === 'string' && seed.trim().length > 0 ? seed.trim() : null;
  return mulberry32(hashSeed(normalized ?? `${Date.now()}:${Math.random()}`));
}

export function randomInt(rng: Rng, minInclusive: number, maxInclusive: number): number {
  return minInclusive + Math.floor(rng() * (maxInclusive - minInclusive + 1));
}

export function pick<T>(rng: Rng, items: ReadonlyArray<T>, fallback: T): T {
  return items[Math.floor(rng() * items.length)] ?? fallback;
}
