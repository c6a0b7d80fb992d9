import { isNullIdentity } from "./identity.js";
import type { PublicKeyLike } from "./types.js";

/**
 * Moves `amount` of `asset` between two holders. Must be all-or-nothing:
 * `false` (or a thrown error) means nothing moved.
 */
export interface AssetTransfer {
  transfer(asset: PublicKeyLike, from: PublicKeyLike, to: PublicKeyLike, amount: number): boolean;
}

/**
 * In-process token balances keyed by asset then holder. Stands in for an
 * on-chain token program in tests and local simulation.
 */
export class TokenVault implements AssetTransfer {
  private readonly balances = new Map<PublicKeyLike, Map<PublicKeyLike, number>>();

  mint(asset: PublicKeyLike, owner: PublicKeyLike, amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new Error("Mint amount must be a positive integer");
    }
    this.holders(asset).set(owner, this.balanceOf(asset, owner) + amount);
  }

  balanceOf(asset: PublicKeyLike, owner: PublicKeyLike): number {
    return this.balances.get(asset)?.get(owner) ?? 0;
  }

  transfer(asset: PublicKeyLike, from: PublicKeyLike, to: PublicKeyLike, amount: number): boolean {
    if (isNullIdentity(asset) || !Number.isSafeInteger(amount) || amount <= 0) return false;

    const available = this.balanceOf(asset, from);
    if (available < amount) return false;

    const holders = this.holders(asset);
    holders.set(from, available - amount);
    holders.set(to, (holders.get(to) ?? 0) + amount);
    return true;
  }

  private holders(asset: PublicKeyLike): Map<PublicKeyLike, number> {
    let holders = this.balances.get(asset);
    if (!holders) {
      holders = new Map();
      this.balances.set(asset, holders);
    }
    return holders;
  }
}
