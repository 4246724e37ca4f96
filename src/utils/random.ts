/** Uniform source in [0, 1). */
export type Rng = () => number;

/** Deterministic generator for reproducible simulations. */
export function mulberry32(seed: number): Rng {
  let a = seed >>> 0;
  return function () {
    let t = (a += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function standardNormal(rng: Rng): number {
  let u = 0;
  while (u === 0) u = rng();
  const v = rng();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Normal(mean, std) restricted to [min, max] by rejection. Falls back to
 * clamping after 32 rejected draws so a window far in the tail still returns.
 */
export function truncatedNormal(rng: Rng, mean: number, std: number, min: number, max: number): number {
  if (std <= 0) return Math.min(max, Math.max(min, mean));
  for (let i = 0; i < 32; i++) {
    const x = mean + std * standardNormal(rng);
    if (x >= min && x <= max) return x;
  }
  return Math.min(max, Math.max(min, mean));
}
