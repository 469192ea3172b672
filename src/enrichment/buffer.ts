/**
 * Report Buffer
 *
 * Fixed-size, position-indexed store for enrichment outcomes. Each
 * inventory position is written exactly once, so the order of the report
 * never depends on which lookup finished first.
 */

import type { EnrichmentOutcome } from "../types.js";

export class ReportBuffer {
  readonly size: number;
  private slots: Array<EnrichmentOutcome | undefined>;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Buffer size must be a non-negative integer, got ${size}`);
    }
    this.size = size;
    this.slots = new Array<EnrichmentOutcome | undefined>(size).fill(undefined);
  }

  set(index: number, outcome: EnrichmentOutcome): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Slot ${index} is outside a buffer of ${this.size}`);
    }
    if (this.slots[index] !== undefined) {
      throw new Error(`Slot ${index} was already written`);
    }
    this.slots[index] = outcome;
  }

  at(index: number): EnrichmentOutcome | undefined {
    return this.slots[index];
  }

  /**
   * Lowest position holding a failed outcome
   */
  firstFailure(): number | undefined {
    const index = this.slots.findIndex((slot) => slot?.status === "failed");
    return index === -1 ? undefined : index;
  }

  /**
   * Outcomes for positions [0, end), in inventory order.
   * Every position in the range must have been written.
   */
  collect(end: number = this.size): EnrichmentOutcome[] {
    const outcomes: EnrichmentOutcome[] = [];
    for (let index = 0; index < Math.min(end, this.size); index += 1) {
      const slot = this.slots[index];
      if (slot === undefined) {
        throw new Error(`Slot ${index} was never written`);
      }
      outcomes.push(slot);
    }
    return outcomes;
  }
}
