import type { LeaveAdjustments } from "../types";

/**
 * Service holding leave days reported for the current session.
 * Nothing here is persisted; a new run starts with no leave recorded.
 */
export class LeaveService {
  private readonly leave = new Map<string, number>();

  /**
   * @param periodDays - Upper bound for leave days within one period
   */
  constructor(private readonly periodDays: number) {}

  /**
   * Records leave days for a contributor
   * @throws {Error} When days is not an integer between 0 and the period length
   */
  set(contributor: string, days: number): void {
    if (!Number.isInteger(days) || days < 0 || days > this.periodDays) {
      throw new Error(
        `Invalid leave days for ${contributor}: ${days}\n` +
          `Expected a whole number between 0 and ${this.periodDays}`
      );
    }

    if (days === 0) {
      this.leave.delete(contributor);
    } else {
      this.leave.set(contributor, days);
    }
  }

  /**
   * Clears a contributor's leave back to zero
   */
  reset(contributor: string): void {
    this.leave.delete(contributor);
  }

  get(contributor: string): number {
    return this.leave.get(contributor) ?? 0;
  }

  /**
   * Snapshot of the recorded leave, passed to the efficiency calculation
   */
  toMap(): LeaveAdjustments {
    return new Map(this.leave);
  }
}
