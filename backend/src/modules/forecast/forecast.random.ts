/**
 * Per-call random source
 *
 * Each forecast owns its generator, so concurrent forecasts never share state.
 */

import { randomBytes } from 'crypto';

export type Rng = () => number;

/**
 * Mulberry32 - fast deterministic PRNG
 */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function () {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Box-Muller transform for N(0,1)
 */
export function randn(rng: Rng): number {
  let u = 0, v = 0;
  while (u === 0) u = rng();
  while (v === 0) v = rng();
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}

export function freshSeed(): number {
  return randomBytes(4).readUInt32LE(0);
}

export function createRng(seed: number = freshSeed()): Rng {
  return mulberry32(seed);
}
