/**
 * Seeded PRNG (splitmix32). Shared by the randomized tests and the benchmark
 * presets so their worlds are reproducible across runs.
 */
export type Rng = () => number;

export function splitmix32(seed: number): Rng {
  return () => {
    seed |= 0;
    seed = (seed + 0x9e3779b9) | 0;
    let t = seed ^ (seed >>> 16);
    t = Math.imul(t, 0x21f0aaad);
    t = t ^ (t >>> 15);
    t = Math.imul(t, 0x735a2d97);
    t = t ^ (t >>> 15);
    return (t >>> 0) / 0xffffffff;
  };
}
