import { SimulationError, ErrorCode } from '../core/errors';

export const PRIZE_COUNT = 8;

// Draws made before the simulator stops sampling and hands out the missing prizes in order
export const RANDOM_DRAW_LIMIT = 25;

export const MIN_TRIAL_LENGTH = PRIZE_COUNT;
export const MAX_TRIAL_LENGTH = RANDOM_DRAW_LIMIT + PRIZE_COUNT - 1;

export interface LengthRange {
  minLength: number;
  maxLength: number;
}

// Length axis of the reference chart, which runs past MAX_TRIAL_LENGTH
export const DEFAULT_CHART_RANGE: LengthRange = {
  minLength: MIN_TRIAL_LENGTH,
  maxLength: 35,
};

export const COUNT_AXIS_HEADROOM = 5;

export const REFERENCE_TRIAL_COUNTS = [100, 1_000_000] as const;

/**
 * Settings for one driver run
 */
export interface RunConfig {
  trialCount: number;
  seed?: number;
  partitions: number;
}

export const DEFAULT_RUN_CONFIG: RunConfig = {
  trialCount: REFERENCE_TRIAL_COUNTS[0],
  partitions: 1,
};

type Env = Record<string, string | undefined>;

// random-js seeds are 32-bit
export const MAX_SEED = 2 ** 32 - 1;

function readInteger(
  env: Env,
  name: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const digits = raw.trim();
  const value = /^\d+$/.test(digits) ? Number(digits) : NaN;
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    const bounds = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new SimulationError(
      ErrorCode.INVALID_CONFIG,
      `${name} must be an integer ${bounds}`,
      { variable: name, value: raw }
    );
  }
  return value;
}

/**
 * Build a run configuration from SIM_TRIALS, SIM_SEED and SIM_PARTITIONS
 */
export function resolveRunConfig(env: Env = process.env): RunConfig {
  const trialCount = readInteger(env, 'SIM_TRIALS', 1) ?? DEFAULT_RUN_CONFIG.trialCount;
  const seed = readInteger(env, 'SIM_SEED', 0, MAX_SEED);
  const partitions = readInteger(env, 'SIM_PARTITIONS', 1) ?? DEFAULT_RUN_CONFIG.partitions;

  if (partitions > trialCount) {
    throw new SimulationError(
      ErrorCode.INVALID_CONFIG,
      'SIM_PARTITIONS cannot exceed SIM_TRIALS',
      { partitions, trialCount }
    );
  }

  return seed === undefined ? { trialCount, partitions } : { trialCount, seed, partitions };
}
