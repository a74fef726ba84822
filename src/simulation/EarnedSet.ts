import { PRIZE_COUNT } from '../config/simulation.config';

/**
 * Prizes seen so far in one trial. Marks are never cleared.
 */
export class EarnedSet {
  private readonly earned: boolean[] = new Array<boolean>(PRIZE_COUNT).fill(false);
  private count = 0;

  get size(): number {
    return this.count;
  }

  mark(index: number): void {
    if (!this.earned[index]) {
      this.earned[index] = true;
      this.count++;
    }
  }

  has(index: number): boolean {
    return this.earned[index] === true;
  }

  isComplete(): boolean {
    return this.count === PRIZE_COUNT;
  }

  /**
   * Lowest index not yet earned, or undefined once every prize is in
   */
  firstMissing(): number | undefined {
    const index = this.earned.indexOf(false);
    return index === -1 ? undefined : index;
  }
}
