import { describe, it, expect } from 'vitest';
import { PRIZES, prizeFromIndex, prizeIndex, sampleOutcome } from '../../core/prizes/Prize';
import { RNG } from '../../core/math/random';
import { ErrorCode, SimulationError } from '../../core/errors';
import { ScriptedRandomSource } from '../utilities/ScriptedRandomSource';

describe('Prize', () => {
  it('should have 8 distinct prizes', () => {
    expect(PRIZES).toHaveLength(8);
    expect(new Set(PRIZES).size).toBe(8);
  });

  it('should convert between prizes and indices', () => {
    expect(prizeIndex('first')).toBe(0);
    expect(prizeIndex('eighth')).toBe(7);
    expect(prizeFromIndex(0)).toBe('first');
    expect(prizeFromIndex(5)).toBe('sixth');

    for (const prize of PRIZES) {
      expect(prizeFromIndex(prizeIndex(prize))).toBe(prize);
    }
  });

  it('should reject indices outside [0, 8)', () => {
    for (const index of [-1, 8, 2.5, NaN]) {
      expect(() => prizeFromIndex(index)).toThrow(SimulationError);
    }

    try {
      prizeFromIndex(8);
    } catch (error) {
      expect(error).toBeInstanceOf(SimulationError);
      if (error instanceof SimulationError) {
        expect(error.code).toBe(ErrorCode.INVALID_INPUT);
        expect(error.context).toEqual({ index: 8 });
      }
    }
  });
});

describe('sampleOutcome', () => {
  it('should request an integer in [0, 7] and map it to a prize', () => {
    const source = new ScriptedRandomSource([3]);

    expect(sampleOutcome(source)).toBe('fourth');
    expect(source.requests).toEqual([[0, 7]]);
  });

  it('should produce every prize from a seeded generator', () => {
    const rng = new RNG(42);
    const seen = new Set<string>();
    for (let i = 0; i < 500; i++) {
      seen.add(sampleOutcome(rng));
    }
    expect(seen.size).toBe(8);
  });
});
