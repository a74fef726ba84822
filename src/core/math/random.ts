// src/core/math/random.ts
/**
 * Random number generation for the simulation
 */

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * The only capability the simulation needs from a generator.
 * Tests inject scripted implementations of this.
 */
export interface RandomSource {
  /**
   * Integer in range [min, max] inclusive
   */
  integer(min: number, max: number): number;
}

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG implements RandomSource {
  private random: Random;
  private engine: MersenneTwister19937;

  constructor(seed?: number) {
    this.engine = seed !== undefined
      ? MersenneTwister19937.seed(seed)
      : MersenneTwister19937.autoSeed();
    this.random = new Random(this.engine);
  }

  /**
   * Reset the RNG with a new seed
   */
  setSeed(seed: number): void {
    this.engine = MersenneTwister19937.seed(seed);
    this.random = new Random(this.engine);
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  integer(min: number, max: number): number {
    return this.random.integer(min, max);
  }
}

// Default RNG instance (unseeded)
export const defaultRNG = new RNG();
