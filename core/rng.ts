export type RNG = () => number;

export function mulberry32(seed: number): RNG {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded when a seed is given; unseeded runs fall back to Math.random. */
export function createRng(seed?: number): RNG {
  return seed === undefined ? Math.random : mulberry32(seed);
}

/** Uniform integer in [0, max). */
export function nextInt(rng: RNG, max: number): number {
  return Math.min(max - 1, Math.floor(rng() * max));
}

/** In-place Fisher-Yates. */
export function shuffleInPlace<T>(items: T[], rng: RNG): void {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = nextInt(rng, i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
}
