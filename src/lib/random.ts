/**
 * Injectable random sources. Services take a RandomSource so tests can pin outcomes.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/** Deterministic mulberry32 generator. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Replays the given draws in order, repeating the last one once exhausted. */
export function createSequenceRandom(draws: number[]): RandomSource {
  if (draws.length === 0) throw new Error('createSequenceRandom requires at least one draw');
  let i = 0;
  return () => {
    const value = draws[Math.min(i, draws.length - 1)];
    i += 1;
    return value;
  };
}
