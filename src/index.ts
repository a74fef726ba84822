/**
 * Prize collector simulation
 *
 * Estimates how many uniform draws it takes to collect all 8 prizes, and
 * summarizes batches of trials as a mean and a length histogram.
 */

// Error handling
export { SimulationError, ErrorCode, isSimulationError, wrapError } from './core/errors';

// Configuration
export {
  PRIZE_COUNT,
  RANDOM_DRAW_LIMIT,
  MIN_TRIAL_LENGTH,
  MAX_TRIAL_LENGTH,
  DEFAULT_CHART_RANGE,
  REFERENCE_TRIAL_COUNTS,
  resolveRunConfig,
} from './config/simulation.config';
export type { LengthRange, RunConfig } from './config/simulation.config';

// Random number generation
export { RNG, defaultRNG } from './core/math/random';
export type { RandomSource } from './core/math/random';

// Prizes
export { PRIZES, prizeIndex, prizeFromIndex, sampleOutcome } from './core/prizes/Prize';
export type { Prize } from './core/prizes/Prize';

// Simulation
export { EarnedSet } from './simulation/EarnedSet';
export { runTrial } from './simulation/TrialSimulator';
export type { TrialResult } from './simulation/TrialSimulator';
export { buildHistogram, mergeHistograms, histogramTotal } from './simulation/Histogram';
export type { Histogram } from './simulation/Histogram';
export {
  BatchSimulator,
  runBatch,
  runPartitionedBatch,
  partitionTrialCount,
  summarizeLengths,
  summarizeHistogram,
  mergeSummaries,
} from './simulation/BatchSimulator';
export type { BatchSummary, PartitionOptions } from './simulation/BatchSimulator';
export {
  exactLengthDistribution,
  expectedTrialLength,
  unboundedExpectedTrialLength,
} from './simulation/ExactDistribution';

// Renderer hand-off
export { toHistogramBins, countAxisMax, formatSummary } from './reporting/ChartData';
export type { HistogramBin } from './reporting/ChartData';

// Version
export const VERSION = '0.1.0';
