/**
 * Prizes a single draw can award
 */

import { PRIZE_COUNT } from '../../config/simulation.config';
import { SimulationError, ErrorCode } from '../errors';
import { RandomSource } from '../math/random';

export const PRIZES = [
  'first',
  'second',
  'third',
  'fourth',
  'fifth',
  'sixth',
  'seventh',
  'eighth',
] as const;

export type Prize = (typeof PRIZES)[number];

export function prizeIndex(prize: Prize): number {
  return PRIZES.indexOf(prize);
}

export function prizeFromIndex(index: number): Prize {
  const prize = Number.isInteger(index) ? PRIZES[index] : undefined;
  if (prize === undefined) {
    throw new SimulationError(
      ErrorCode.INVALID_INPUT,
      `Prize index must be an integer in [0, ${PRIZE_COUNT})`,
      { index }
    );
  }
  return prize;
}

/**
 * Uniform draw over every prize
 */
export function sampleOutcome(rng: RandomSource): Prize {
  return prizeFromIndex(rng.integer(0, PRIZE_COUNT - 1));
}
