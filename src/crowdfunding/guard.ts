import { CampaignError } from "./errors.js";

/**
 * Busy flag held for the duration of a mutating call. A second entry while
 * held (e.g. from inside a transfer callback) is rejected.
 */
export class ReentrancyGuard {
  private locked = false;

  isLocked(): boolean {
    return this.locked;
  }

  run<T>(fn: () => T): T {
    if (this.locked) {
      throw new CampaignError("ReentrantCall", "Re-entrant call rejected");
    }
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }
}
