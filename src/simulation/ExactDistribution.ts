/**
 * Exact trial length distribution
 *
 * Tracks the probability of having seen k distinct prizes after each random
 * draw. A trial ends on the draw that reaches PRIZE_COUNT; whatever is still
 * incomplete after RANDOM_DRAW_LIMIT draws finishes one missing prize per draw.
 */

import { PRIZE_COUNT, RANDOM_DRAW_LIMIT } from '../config/simulation.config';

/**
 * Probability of each trial length under the simulator's drawing policy
 */
export function exactLengthDistribution(): Map<number, number> {
  const distribution = new Map<number, number>();

  // seen[k] = P(k distinct prizes so far, trial still running)
  let seen = new Array<number>(PRIZE_COUNT + 1).fill(0);
  seen[0] = 1;

  for (let draw = 1; draw <= RANDOM_DRAW_LIMIT; draw++) {
    const next = new Array<number>(PRIZE_COUNT + 1).fill(0);
    for (let k = 0; k < PRIZE_COUNT; k++) {
      next[k] += seen[k] * (k / PRIZE_COUNT);
      next[k + 1] += seen[k] * ((PRIZE_COUNT - k) / PRIZE_COUNT);
    }
    if (next[PRIZE_COUNT] > 0) {
      distribution.set(draw, next[PRIZE_COUNT]);
    }
    next[PRIZE_COUNT] = 0;
    seen = next;
  }

  for (let k = 0; k < PRIZE_COUNT; k++) {
    if (seen[k] > 0) {
      const length = RANDOM_DRAW_LIMIT + PRIZE_COUNT - k;
      distribution.set(length, (distribution.get(length) ?? 0) + seen[k]);
    }
  }

  return distribution;
}

export function expectedTrialLength(): number {
  let mean = 0;
  for (const [length, probability] of exactLengthDistribution()) {
    mean += length * probability;
  }
  return mean;
}

/**
 * n * H(n): the expected number of uniform draws to see all n prizes when
 * every draw is random
 */
export function unboundedExpectedTrialLength(n: number = PRIZE_COUNT): number {
  let harmonic = 0;
  for (let i = 1; i <= n; i++) {
    harmonic += 1 / i;
  }
  return n * harmonic;
}
