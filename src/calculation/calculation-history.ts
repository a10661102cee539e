import type { Calculation } from './calculation.js';

/**
 * Calculations made during one session, oldest first.
 * Entries are only ever appended; `clear` is the one way to remove them.
 */
export class CalculationHistory {
  private readonly calculations: Calculation[] = [];

  add(calculation: Calculation): void {
    this.calculations.push(calculation);
  }

  /**
   * Snapshot of every entry. Later changes to the history do not affect it.
   */
  getAll(): Calculation[] {
    return [...this.calculations];
  }

  getLatest(): Calculation | undefined {
    return this.calculations.at(-1);
  }

  clear(): void {
    this.calculations.length = 0;
  }

  get size(): number {
    return this.calculations.length;
  }

  toString(): string {
    return `CalculationHistory(${this.size} calculations)`;
  }
}
