// src/core/math/random.ts
/**
 * Seeded random numbers for reproducible prior simulation
 */

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;

  constructor(seed?: number) {
    const engine = seed !== undefined
      ? MersenneTwister19937.seed(seed)
      : MersenneTwister19937.autoSeed();
    this.random = new Random(engine);
  }

  /**
   * Uniform in the open interval (0, 1), safe to feed an inverse CDF
   */
  uniform(): number {
    let u = 0;
    while (u === 0) {
      u = this.random.real(0, 1, false);
    }
    return u;
  }

  uniforms(n: number): number[] {
    return Array.from({ length: n }, () => this.uniform());
  }
}
