/**
 * Prize collection demo
 *
 * Runs a batch with the settings from SIM_TRIALS, SIM_SEED and SIM_PARTITIONS
 * and prints the report a chart renderer would be fed.
 */

import { pathToFileURL } from 'node:url';
import { resolveRunConfig, RunConfig } from '../src/config/simulation.config';
import { ErrorCode, wrapError } from '../src/core/errors';
import { BatchSimulator, BatchSummary, runPartitionedBatch } from '../src/simulation/BatchSimulator';
import { expectedTrialLength } from '../src/simulation/ExactDistribution';
import { countAxisMax, formatSummary, toHistogramBins } from '../src/reporting/ChartData';

export function collectPrizes(config: RunConfig): BatchSummary {
  console.log(`=== Prize collection: ${config.trialCount} trials ===\n`);

  const summary = config.partitions > 1
    ? runPartitionedBatch(config.trialCount, { partitions: config.partitions, seed: config.seed })
    : new BatchSimulator(config.seed).simulate(config.trialCount);

  console.log(formatSummary(summary));
  console.log(`Expected: ${expectedTrialLength().toFixed(3)}`);
  console.log(
    `95% CI: [${summary.meanConfidenceInterval[0].toFixed(3)}, ${summary.meanConfidenceInterval[1].toFixed(3)}]`
  );
  console.log(`Range: ${summary.minTrialLength}-${summary.maxTrialLength}\n`);

  const axisMax = countAxisMax(summary.histogram);
  for (const bin of toHistogramBins(summary.histogram)) {
    const bar = '#'.repeat(Math.round((bin.count / axisMax) * 50));
    console.log(`${String(bin.length).padStart(2)} | ${bar} ${bin.count}`);
  }

  return summary;
}

export function main(env: Record<string, string | undefined> = process.env): number {
  try {
    collectPrizes(resolveRunConfig(env));
    return 0;
  } catch (error) {
    const failure = wrapError(error);
    console.error(failure.toString());
    if (failure.is(ErrorCode.INVALID_CONFIG)) {
      console.error('Set SIM_TRIALS, SIM_SEED and SIM_PARTITIONS to plain non-negative integers.');
    }
    // 2 for bad settings or arguments, 1 for anything else
    return failure.isOneOf([ErrorCode.INVALID_CONFIG, ErrorCode.INVALID_INPUT]) ? 2 : 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = main();
}
