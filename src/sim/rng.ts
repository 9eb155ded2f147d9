/** Largest seed the 32-bit generator state can hold without aliasing. */
export const MAX_SEED = 0xffffffff;

/**
 * Seeded Mulberry32 stream. One instance per driver run, so a run never
 * shares draws with another.
 */
export class RNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  nextU32(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Uniform on [0, 1). */
  uniform(): number {
    return this.nextU32() / 2 ** 32;
  }

  /** Standard normal, Box-Muller cosine branch; each call consumes two uniforms. */
  normal01(): number {
    let u1 = this.uniform();
    while (u1 === 0) u1 = this.uniform();
    let u2 = this.uniform();
    while (u2 === 0) u2 = this.uniform();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}

export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

/** [min, max] in one pass; [0, 0] for no values. */
export function extent(arr: number[]): [number, number] {
  if (arr.length === 0) return [0, 0];
  let lo = arr[0];
  let hi = arr[0];
  for (const x of arr) {
    if (x < lo) lo = x;
    if (x > hi) hi = x;
  }
  return [lo, hi];
}

export function mean(arr: number[]): number {
  if (arr.length === 0) return 0;
  let s = 0;
  for (const x of arr) s += x;
  return s / arr.length;
}

// Sample standard deviation (n - 1)
export function stdDev(arr: number[]): number {
  const n = arr.length;
  if (n <= 1) return 0;
  const m = mean(arr);
  let ss = 0;
  for (const x of arr) ss += (x - m) * (x - m);
  return Math.sqrt(ss / (n - 1));
}

// p in [0,1], linear interpolation between closest ranks
export function percentile(arr: number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const idx = (sorted.length - 1) * p;
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  const w = idx - lo;
  return sorted[lo] * (1 - w) + sorted[hi] * w;
}

export function median(arr: number[]): number {
  return percentile(arr, 0.5);
}
