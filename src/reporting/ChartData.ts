/**
 * Plain data handed to a chart renderer
 */

import { COUNT_AXIS_HEADROOM, DEFAULT_CHART_RANGE, LengthRange } from '../config/simulation.config';
import { SimulationError, ErrorCode } from '../core/errors';
import { BatchSummary } from '../simulation/BatchSimulator';
import { Histogram } from '../simulation/Histogram';

export interface HistogramBin {
  length: number;
  count: number;
}

/**
 * One bin per length in the inclusive range, zero-filled, ascending
 */
export function toHistogramBins(
  histogram: Histogram,
  range: LengthRange = DEFAULT_CHART_RANGE
): HistogramBin[] {
  const { minLength, maxLength } = range;
  if (!Number.isInteger(minLength) || !Number.isInteger(maxLength) || minLength > maxLength) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Invalid chart range', { minLength, maxLength });
  }

  for (const length of histogram.keys()) {
    if (length < minLength || length > maxLength) {
      throw new SimulationError(
        ErrorCode.INVALID_INPUT,
        `Trial length ${length} falls outside the chart range`,
        { length, minLength, maxLength }
      );
    }
  }

  const bins: HistogramBin[] = [];
  for (let length = minLength; length <= maxLength; length++) {
    bins.push({ length, count: histogram.get(length) ?? 0 });
  }
  return bins;
}

/**
 * Upper bound of the count axis
 */
export function countAxisMax(histogram: Histogram): number {
  return Math.max(0, ...histogram.values()) + COUNT_AXIS_HEADROOM;
}

export function formatSummary(summary: BatchSummary): string {
  return `Average number of draws to earn all prizes: ${summary.meanTrialLength}`;
}
