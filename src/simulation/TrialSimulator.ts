// src/simulation/TrialSimulator.ts
import { RANDOM_DRAW_LIMIT } from '../config/simulation.config';
import { SimulationError, ErrorCode } from '../core/errors';
import { RandomSource, defaultRNG } from '../core/math/random';
import { Prize, prizeFromIndex, prizeIndex, sampleOutcome } from '../core/prizes/Prize';
import { EarnedSet } from './EarnedSet';

/**
 * Prizes in the order they were drawn; ends on the draw that completes the set
 */
export type TrialResult = readonly Prize[];

/**
 * Keep drawing until every prize has been earned.
 *
 * The first RANDOM_DRAW_LIMIT draws are uniform. After that the lowest-indexed
 * missing prize is handed out on each draw, so a trial never exceeds
 * RANDOM_DRAW_LIMIT + 7 draws.
 */
export function runTrial(rng: RandomSource = defaultRNG): TrialResult {
  const draws: Prize[] = [];
  const earned = new EarnedSet();

  while (!earned.isComplete()) {
    const prize = draws.length < RANDOM_DRAW_LIMIT
      ? sampleOutcome(rng)
      : nextMissingPrize(earned, draws.length);

    earned.mark(prizeIndex(prize));
    draws.push(prize);
  }

  return draws;
}

function nextMissingPrize(earned: EarnedSet, drawn: number): Prize {
  const index = earned.firstMissing();
  if (index === undefined) {
    // Unreachable while the loop condition holds
    throw new SimulationError(
      ErrorCode.INTERNAL_ERROR,
      'No missing prize left to hand out',
      { drawn, earned: earned.size }
    );
  }
  return prizeFromIndex(index);
}
