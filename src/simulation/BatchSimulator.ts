// src/simulation/BatchSimulator.ts
import jStat from 'jstat';
import { SimulationError, ErrorCode } from '../core/errors';
import { RNG, RandomSource, defaultRNG } from '../core/math/random';
import { Histogram, buildHistogram, histogramTotal, mergeHistograms } from './Histogram';
import { runTrial } from './TrialSimulator';

/**
 * Aggregated results of a batch of trials
 */
export interface BatchSummary {
  trialCount: number;
  meanTrialLength: number;
  histogram: Histogram;

  minTrialLength: number;
  maxTrialLength: number;
  standardDeviation: number;      // Sample standard deviation, 0 for a single trial
  meanConfidenceInterval: [number, number];  // 95%, normal approximation
}

export interface PartitionOptions {
  partitions: number;
  seed?: number;
}

const CONFIDENCE_LEVEL = 0.95;
const PROGRESS_UPDATES = 20;

function assertTrialCount(trialCount: number): void {
  if (!Number.isSafeInteger(trialCount) || trialCount < 1) {
    throw new SimulationError(
      ErrorCode.INVALID_INPUT,
      'Trial count must be a positive integer',
      { trialCount }
    );
  }
}

function* trialLengths(
  trialCount: number,
  rng: RandomSource,
  onProgress?: (progress: number) => void
): Generator<number> {
  const updateInterval = Math.ceil(trialCount / PROGRESS_UPDATES);

  for (let i = 0; i < trialCount; i++) {
    yield runTrial(rng).length;

    const done = i + 1;
    if (onProgress && (done % updateInterval === 0 || done === trialCount)) {
      onProgress(done / trialCount);
    }
  }
}

/**
 * Reduce a histogram of trial lengths to summary statistics
 */
export function summarizeHistogram(histogram: Histogram): BatchSummary {
  const n = histogramTotal(histogram);
  if (n === 0) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Cannot summarize an empty histogram');
  }

  let sum = 0;
  let minTrialLength = Infinity;
  let maxTrialLength = -Infinity;
  for (const [length, count] of histogram) {
    sum += length * count;
    minTrialLength = Math.min(minTrialLength, length);
    maxTrialLength = Math.max(maxTrialLength, length);
  }
  const meanTrialLength = sum / n;

  let squaredDeviations = 0;
  for (const [length, count] of histogram) {
    squaredDeviations += count * (length - meanTrialLength) ** 2;
  }
  const standardDeviation = n > 1 ? Math.sqrt(squaredDeviations / (n - 1)) : 0;

  const z = jStat.normal.inv(1 - (1 - CONFIDENCE_LEVEL) / 2, 0, 1);
  const halfWidth = z * standardDeviation / Math.sqrt(n);

  return {
    trialCount: n,
    meanTrialLength,
    histogram: new Map(histogram),
    minTrialLength,
    maxTrialLength,
    standardDeviation,
    meanConfidenceInterval: [meanTrialLength - halfWidth, meanTrialLength + halfWidth],
  };
}

export function summarizeLengths(lengths: Iterable<number>): BatchSummary {
  return summarizeHistogram(buildHistogram(lengths));
}

/**
 * Combine summaries of disjoint batches into the summary of their union
 */
export function mergeSummaries(summaries: BatchSummary[]): BatchSummary {
  return summarizeHistogram(mergeHistograms(...summaries.map(s => s.histogram)));
}

/**
 * Run trialCount independent trials and summarize their lengths
 */
export function runBatch(trialCount: number, rng: RandomSource = defaultRNG): BatchSummary {
  assertTrialCount(trialCount);
  return summarizeLengths(trialLengths(trialCount, rng));
}

/**
 * Split a trial count into near-equal positive parts
 */
export function partitionTrialCount(total: number, partitions: number): number[] {
  assertTrialCount(total);
  if (!Number.isSafeInteger(partitions) || partitions < 1 || partitions > total) {
    throw new SimulationError(
      ErrorCode.INVALID_INPUT,
      'Partition count must be an integer between 1 and the trial count',
      { total, partitions }
    );
  }

  const base = Math.floor(total / partitions);
  const remainder = total % partitions;
  return Array.from({ length: partitions }, (_, i) => (i < remainder ? base + 1 : base));
}

/**
 * Run a batch as independent partitions, each with its own generator, and
 * merge the partial summaries. Seeded runs give partition i the seed seed + i.
 */
export function runPartitionedBatch(trialCount: number, options: PartitionOptions): BatchSummary {
  const parts = partitionTrialCount(trialCount, options.partitions);
  const { seed } = options;

  const summaries = parts.map((count, i) =>
    runBatch(count, new RNG(seed === undefined ? undefined : seed + i))
  );
  return mergeSummaries(summaries);
}

export class BatchSimulator {
  private rng: RNG;

  constructor(seed?: number) {
    this.rng = new RNG(seed);
    if (seed !== undefined) {
      console.log(`BatchSimulator initialized with seed: ${seed}`);
    }
  }

  /**
   * Run a batch, reporting progress as a fraction of trials completed
   */
  simulate(trialCount: number, onProgress?: (progress: number) => void): BatchSummary {
    assertTrialCount(trialCount);
    return summarizeLengths(trialLengths(trialCount, this.rng, onProgress));
  }
}
