import type { Logger } from "pino";
import { CampaignError } from "./errors.js";
import { NOOP_SINK } from "./events.js";
import type { EventSink, LedgerEvent } from "./events.js";
import { ReentrancyGuard } from "./guard.js";
import { isNullIdentity } from "./identity.js";
import type { AssetTransfer } from "./transfer.js";
import type { CampaignDetails, CampaignPhase, Clock, LedgerConfig, PublicKeyLike } from "./types.js";
import { makeNoopLogger } from "../logger.js";

export interface LedgerDeps {
  clock: Clock;
  transfer: AssetTransfer;
  events?: EventSink;
  logger?: Logger;
}

export function isAmount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/** Checks shared by proposal submission and ledger construction. */
export function assertValidTerms(terms: { minTarget: number; maxTarget: number; windowStart: number; windowEnd: number }): void {
  if (!isAmount(terms.minTarget) || !isAmount(terms.maxTarget) || terms.maxTarget <= terms.minTarget) {
    throw new CampaignError("InvalidAmounts", "maxTarget must be greater than minTarget");
  }
  if (!Number.isFinite(terms.windowStart) || !Number.isFinite(terms.windowEnd) || terms.windowEnd <= terms.windowStart) {
    throw new CampaignError("InvalidWindow", "windowEnd must be after windowStart");
  }
}

/**
 * Funds accounting for one approved campaign.
 *
 * Contributions are accepted while `windowStart <= now <= windowEnd` and up to
 * `maxTarget`. Once `now > windowEnd` the campaign settles exactly one way:
 * the creator claims everything if `minTarget` was reached, otherwise every
 * contributor may pull back their own balance.
 *
 * Each mutating call updates internal accounting before calling the asset
 * transfer and restores it if the transfer fails, so a failed call leaves
 * the ledger as it was and emits nothing.
 */
export class CampaignLedger {
  private readonly config: Readonly<LedgerConfig>;
  private readonly clock: Clock;
  private readonly transfer: AssetTransfer;
  private readonly events: EventSink;
  private readonly logger: Logger;
  private readonly guard = new ReentrancyGuard();
  private readonly balances = new Map<PublicKeyLike, number>();
  private totalCollected = 0;
  private totalRefunded = 0;
  private claimed = false;

  constructor(config: LedgerConfig, deps: LedgerDeps) {
    assertValidTerms(config);
    if (isNullIdentity(config.address) || isNullIdentity(config.creator)) {
      throw new CampaignError("InvalidIdentity", "Ledger address and creator are required");
    }
    if (isNullIdentity(config.settlementAsset)) {
      throw new CampaignError("InvalidAsset", "Settlement asset is required");
    }
    this.config = Object.freeze({ ...config });
    this.clock = deps.clock;
    this.transfer = deps.transfer;
    this.events = deps.events ?? NOOP_SINK;
    this.logger = (deps.logger ?? makeNoopLogger()).child({ ledger: config.address });
  }

  get address(): PublicKeyLike {
    return this.config.address;
  }

  contribute(caller: PublicKeyLike, amount: number, sourceAsset: PublicKeyLike): void {
    this.guard.run(() => {
      const now = this.clock.now();
      if (now < this.config.windowStart || now > this.config.windowEnd) {
        throw new CampaignError("NotActive", "Campaign is not accepting contributions");
      }
      if (!isAmount(amount) || amount === 0) {
        throw new CampaignError("InvalidAmount", "Contribution must be > 0");
      }
      if (isNullIdentity(sourceAsset)) {
        throw new CampaignError("InvalidAsset", "Source asset is required");
      }
      // Balances are paid back in the settlement asset, so custody must only ever hold it.
      if (sourceAsset !== this.config.settlementAsset) {
        throw new CampaignError("InvalidAsset", "Contributions must be made in the settlement asset");
      }
      if (this.totalCollected + amount > this.config.maxTarget) {
        throw new CampaignError("TargetExceeded", "Contribution would exceed the maximum target");
      }

      const known = this.balances.has(caller);
      const previous = this.balances.get(caller) ?? 0;
      this.balances.set(caller, previous + amount);
      this.totalCollected += amount;

      try {
        this.move(sourceAsset, caller, this.config.address, amount);
      } catch (err) {
        if (known) this.balances.set(caller, previous);
        else this.balances.delete(caller);
        this.totalCollected -= amount;
        throw err;
      }

      this.emit({ type: "ContributionRecorded", ledger: this.config.address, contributor: caller, asset: sourceAsset, amount });
    });
  }

  /**
   * Pays the whole collected total to the creator. Returns the amount paid.
   */
  claimFunds(caller: PublicKeyLike): number {
    return this.guard.run(() => {
      if (caller !== this.config.creator) {
        throw new CampaignError("Unauthorized", "Only the creator can claim funds");
      }
      if (this.claimed) {
        throw new CampaignError("AlreadyClaimed", "Funds have already been claimed");
      }
      if (this.clock.now() <= this.config.windowEnd) {
        throw new CampaignError("NotEnded", "Campaign has not ended");
      }
      if (this.totalCollected < this.config.minTarget) {
        throw new CampaignError("TargetNotReached", "Minimum target not reached");
      }

      const amount = this.totalCollected;
      this.claimed = true;
      try {
        this.move(this.config.settlementAsset, this.config.address, caller, amount);
      } catch (err) {
        this.claimed = false;
        throw err;
      }

      this.emit({ type: "FundsClaimed", ledger: this.config.address, creator: caller, amount });
      this.emit({ type: "CampaignEnded", ledger: this.config.address, successful: true, totalCollected: amount });
      return amount;
    });
  }

  /**
   * Returns the caller's whole balance after a failed campaign. Returns the
   * amount refunded.
   */
  refund(caller: PublicKeyLike): number {
    return this.guard.run(() => {
      if (this.clock.now() <= this.config.windowEnd) {
        throw new CampaignError("NotEnded", "Campaign has not ended");
      }
      if (this.totalCollected >= this.config.minTarget) {
        throw new CampaignError("CampaignSuccessful", "Campaign reached its minimum target");
      }
      const amount = this.balances.get(caller) ?? 0;
      if (amount === 0) {
        throw new CampaignError("NoContribution", "No contribution to refund");
      }

      // totalCollected shrinks with the balance so it keeps equalling the sum of balances.
      this.balances.set(caller, 0);
      this.totalCollected -= amount;
      this.totalRefunded += amount;
      try {
        this.move(this.config.settlementAsset, this.config.address, caller, amount);
      } catch (err) {
        this.balances.set(caller, amount);
        this.totalCollected += amount;
        this.totalRefunded -= amount;
        throw err;
      }

      this.emit({ type: "RefundProcessed", ledger: this.config.address, contributor: caller, amount });
      if (this.totalCollected === 0) {
        this.emit({ type: "CampaignEnded", ledger: this.config.address, successful: false, totalCollected: this.totalRefunded });
      }
      return amount;
    });
  }

  getDetails(): CampaignDetails {
    return {
      ...this.config,
      totalCollected: this.totalCollected,
      totalRefunded: this.totalRefunded,
      claimed: this.claimed,
      contributorCount: this.getContributors().length,
      isActive: this.isActive(),
      isSuccessful: this.isSuccessful(),
      phase: this.getPhase()
    };
  }

  getContribution(contributor: PublicKeyLike): number {
    return this.balances.get(contributor) ?? 0;
  }

  /** Contributors with an outstanding balance, in order of first contribution. */
  getContributors(): PublicKeyLike[] {
    return Array.from(this.balances.entries())
      .filter(([, amount]) => amount > 0)
      .map(([contributor]) => contributor);
  }

  getPhase(): CampaignPhase {
    const now = this.clock.now();
    if (now < this.config.windowStart) return "upcoming";
    if (now <= this.config.windowEnd) return "active";
    if (this.claimed) return "claimed";
    return this.isSuccessful() ? "successful" : "failed";
  }

  canClaim(caller: PublicKeyLike): boolean {
    return caller === this.config.creator && !this.claimed && this.getPhase() === "successful";
  }

  canRefund(contributor: PublicKeyLike): boolean {
    return this.getPhase() === "failed" && this.getContribution(contributor) > 0;
  }

  private isActive(): boolean {
    const now = this.clock.now();
    return now >= this.config.windowStart && now <= this.config.windowEnd;
  }

  private isSuccessful(): boolean {
    return this.totalCollected >= this.config.minTarget;
  }

  private move(asset: PublicKeyLike, from: PublicKeyLike, to: PublicKeyLike, amount: number): void {
    let ok: boolean;
    try {
      ok = this.transfer.transfer(asset, from, to, amount);
    } catch (err) {
      this.logger.warn({ err, asset, from, to, amount }, "asset transfer threw; rolling back");
      throw new CampaignError("TransferFailed", "Asset transfer failed", { cause: err });
    }
    if (!ok) {
      this.logger.warn({ asset, from, to, amount }, "asset transfer rejected; rolling back");
      throw new CampaignError("TransferFailed", "Asset transfer failed");
    }
  }

  // Runs after the call has committed; a failing sink is logged, not surfaced as a failed call.
  private emit(event: LedgerEvent): void {
    try {
      this.events.emit(event);
    } catch (err) {
      this.logger.error({ err, event: event.type }, "event sink failed");
    }
  }
}
