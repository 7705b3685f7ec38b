import type { Rng } from "./types";

export type StreamName = "footprint" | "spikes" | "noise" | "motion";

const UINT32_RANGE = 4294967296;

function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / UINT32_RANGE;
  };
}

// murmur3 finalizer
function mix32(h: number): number {
  let x = h >>> 0;
  x ^= x >>> 16;
  x = Math.imul(x, 0x85ebca6b);
  x ^= x >>> 13;
  x = Math.imul(x, 0xc2b2ae35);
  x ^= x >>> 16;
  return x >>> 0;
}

function hashString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i += 1) {
    hash = (Math.imul(hash, 31) + str.charCodeAt(i)) | 0;
  }
  return hash >>> 0;
}

export function makeRng(seed: number): Rng {
  return mulberry32(seed);
}

/**
 * Seed of the sub-stream addressed by (stream, index) under a root seed.
 * Each cell and frame draws from its own sub-stream, so the order in which
 * indices are processed never changes the values an index receives.
 */
export function deriveSeed(seed: number, stream: StreamName, index: number): number {
  let h = mix32(seed);
  h = mix32(h ^ hashString(stream));
  h = mix32(h + Math.imul(index + 1, 0x9e3779b9));
  return h;
}

export function subStream(seed: number, stream: StreamName, index = 0): Rng {
  return mulberry32(deriveSeed(seed, stream, index));
}

export function randomSeed(): number {
  return Math.floor(Math.random() * UINT32_RANGE) >>> 0;
}

export function randUniform(rng: Rng, lo: number, hi: number): number {
  return lo + (hi - lo) * rng();
}

/** Integer in [lo, hi). */
export function randInt(rng: Rng, lo: number, hi: number): number {
  return lo + Math.floor((hi - lo) * rng());
}

export function randNormal(rng: Rng): number {
  const u1 = Math.max(1e-12, rng());
  const u2 = rng();
  const mag = Math.sqrt(-2.0 * Math.log(u1));
  return mag * Math.cos(2.0 * Math.PI * u2);
}
