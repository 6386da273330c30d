/**
 * 随机源
 *
 * Mulberry32 提供可复现的均匀分布，Box-Muller 变换生成高斯噪声。
 * 同一种子产生完全相同的仿真序列。
 */

import type { RandomSource } from './types';

/** Mulberry32 确定性 PRNG */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class RandomGenerator implements RandomSource {
  constructor(private readonly rng: () => number = Math.random) {}

  next(): number {
    return this.rng();
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.rng();
  }

  /** Box-Muller：N(mean, stdDev²) */
  gaussian(mean: number, stdDev: number): number {
    let u = 0;
    let v = 0;
    while (u === 0) u = this.rng();
    while (v === 0) v = this.rng();
    const z = Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
    return mean + stdDev * z;
  }
}

/** 给定种子时可复现，否则使用 Math.random */
export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? new RandomGenerator() : new RandomGenerator(mulberry32(seed));
}
