/**
 * Trial length → number of trials with that length
 */
export type Histogram = ReadonlyMap<number, number>;

export function buildHistogram(lengths: Iterable<number>): Histogram {
  const histogram = new Map<number, number>();
  for (const length of lengths) {
    histogram.set(length, (histogram.get(length) ?? 0) + 1);
  }
  return histogram;
}

/**
 * Add counts key by key. Order of arguments does not matter.
 */
export function mergeHistograms(...histograms: Histogram[]): Histogram {
  const merged = new Map<number, number>();
  for (const histogram of histograms) {
    for (const [length, count] of histogram) {
      merged.set(length, (merged.get(length) ?? 0) + count);
    }
  }
  return merged;
}

export function histogramTotal(histogram: Histogram): number {
  let total = 0;
  for (const count of histogram.values()) {
    total += count;
  }
  return total;
}
