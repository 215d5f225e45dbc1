/* engine/utils/rng.ts */
import type { RngFn } from "@/types/experiment";

/* Deterministic RNG (xorshift32) seeded by string; FNV-1a hash of the seed */
export function seededRng(seedStr: string): RngFn {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < seedStr.length; i++) { h ^= seedStr.charCodeAt(i); h = Math.imul(h, 16777619) >>> 0; }
  let x = h || 0x9e3779b9;
  // divide by 2^32 so the result stays in [0, 1)
  return () => { x ^= x << 13; x >>>= 0; x ^= x >>> 17; x >>>= 0; x ^= x << 5; x >>>= 0; return x / 0x100000000; };
}

/** Integer in [0, n) */
export function randomInt(rng: RngFn, n: number): number {
  if (!Number.isInteger(n) || n <= 0) throw new Error(`randomInt: n must be a positive integer, got ${n}`);
  return Math.min(n - 1, Math.floor(rng() * n));
}

export function pick<T>(rng: RngFn, arr: readonly T[]): T {
  if (arr.length === 0) throw new Error("pick: empty array");
  return arr[randomInt(rng, arr.length)];
}

/** Fisher–Yates on a copy */
export function shuffle<T>(rng: RngFn, arr: readonly T[]): T[] {
  const a = arr.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

/** k distinct elements in random order */
export function sample<T>(rng: RngFn, arr: readonly T[], k: number): T[] {
  if (k > arr.length) throw new Error(`sample: cannot draw ${k} from ${arr.length}`);
  return shuffle(rng, arr).slice(0, k);
}

export function chance(rng: RngFn, p: number): boolean {
  return rng() < p;
}

/** Seed strings are namespaced so independent streams never collide. */
export function deriveSeed(base: string, ...parts: Array<string | number>): string {
  return [base, ...parts].join(":");
}
