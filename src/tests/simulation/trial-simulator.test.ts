import { describe, it, expect } from 'vitest';
import { runTrial } from '../../simulation/TrialSimulator';
import { PRIZES, Prize } from '../../core/prizes/Prize';
import { RNG } from '../../core/math/random';
import { RANDOM_DRAW_LIMIT } from '../../config/simulation.config';
import { ScriptedRandomSource, repeat } from '../utilities/ScriptedRandomSource';

describe('runTrial', () => {
  describe('with a scripted source', () => {
    it('should stop as soon as every prize has been drawn', () => {
      const source = new ScriptedRandomSource([0, 1, 2, 3, 4, 5, 6, 7, 0, 0]);
      const trial = runTrial(source);

      expect(trial).toEqual([...PRIZES]);
      expect(source.consumed).toBe(8);
    });

    it('should keep duplicates drawn during the random phase', () => {
      const source = new ScriptedRandomSource([2, 2, 0, 1, 2, 3, 4, 5, 6, 7]);
      const trial = runTrial(source);

      expect(trial).toEqual([
        'third', 'third', 'first', 'second', 'third',
        'fourth', 'fifth', 'sixth', 'seventh', 'eighth',
      ]);
    });

    it('should hand out the missing prizes in index order after 25 draws', () => {
      const source = new ScriptedRandomSource(repeat(0, 40));
      const trial = runTrial(source);

      expect(source.consumed).toBe(RANDOM_DRAW_LIMIT);
      expect(trial).toHaveLength(32);
      expect(trial.slice(0, 25)).toEqual(repeat(0, 25).map(() => 'first'));
      expect(trial.slice(25)).toEqual(['second', 'third', 'fourth', 'fifth', 'sixth', 'seventh', 'eighth']);
    });

    it('should skip prizes already earned when falling back', () => {
      const source = new ScriptedRandomSource([...repeat(0, 24), 7]);
      const trial = runTrial(source);

      expect(trial).toHaveLength(31);
      expect(trial.slice(25)).toEqual(['second', 'third', 'fourth', 'fifth', 'sixth', 'seventh']);
    });

    it('should supply a single stalled prize on the 26th draw', () => {
      const source = new ScriptedRandomSource([0, 1, 2, 3, 4, 5, 6, ...repeat(0, 18), 7]);
      const trial = runTrial(source);

      expect(source.consumed).toBe(25);
      expect(trial).toHaveLength(26);
      expect(trial[25]).toBe('eighth');
    });

    it('should finish on the 25th draw without falling back', () => {
      const source = new ScriptedRandomSource([1, 2, 3, 4, 5, 6, 7, ...repeat(1, 17), 0]);
      const trial = runTrial(source);

      expect(source.consumed).toBe(25);
      expect(trial).toHaveLength(25);
      expect(trial[24]).toBe('first');
    });
  });

  describe('with a seeded generator', () => {
    const rng = new RNG(2024);
    const trials = Array.from({ length: 2000 }, () => runTrial(rng));

    it('should produce lengths between 8 and 32', () => {
      for (const trial of trials) {
        expect(trial.length).toBeGreaterThanOrEqual(8);
        expect(trial.length).toBeLessThanOrEqual(32);
      }
    });

    it('should contain every prize', () => {
      for (const trial of trials) {
        expect(new Set(trial).size).toBe(8);
      }
    });

    it('should end on the draw that completes the set', () => {
      for (const trial of trials) {
        const last = trial[trial.length - 1];
        expect(trial.indexOf(last)).toBe(trial.length - 1);
      }
    });

    it('should earn a new prize on every draw past the 25th', () => {
      for (const trial of trials) {
        for (let i = RANDOM_DRAW_LIMIT; i < trial.length; i++) {
          const earlier: Prize[] = trial.slice(0, i);
          expect(earlier).not.toContain(trial[i]);
        }
      }
    });

    it('should reproduce the same trial for the same seed', () => {
      expect(runTrial(new RNG(99))).toEqual(runTrial(new RNG(99)));
    });
  });
});
