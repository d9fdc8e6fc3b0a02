/**
 * Seeded deterministic RNG for fuzz tests.
 *
 * xorshift32; the same seed always yields the same sequence on every platform.
 */

export type Rng = Readonly<{
  /** Next unsigned 32-bit integer. */
  u32: () => number;
  /** Next float in [0, 1). */
  float: () => number;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  if (state === 0) state = 0x9e3779b9;

  function u32(): number {
    let x = state;
    x ^= x << 13;
    x >>>= 0;
    x ^= x >>> 17;
    x ^= x << 5;
    x >>>= 0;
    state = x;
    return x;
  }

  return Object.freeze({
    u32,
    float: () => u32() / 0x1_0000_0000,
  });
}
