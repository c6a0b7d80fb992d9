import { PublicKey } from "@solana/web3.js";
import { CampaignError } from "./errors.js";
import type { PublicKeyLike } from "./types.js";

/** The all-zero public key, used as "no identity" */
export const NULL_IDENTITY: PublicKeyLike = PublicKey.default.toBase58();

const LEDGER_SEED = "campaign";

export function isNullIdentity(key: PublicKeyLike): boolean {
  return key.trim() === "" || key === NULL_IDENTITY;
}

/**
 * Deterministic address for the ledger deployed from a proposal, derived
 * off-curve from the registry address so nobody holds its private key.
 */
export function deriveLedgerAddress(registryAddress: PublicKeyLike, proposalId: number): PublicKeyLike {
  let programId: PublicKey;
  try {
    programId = new PublicKey(registryAddress);
  } catch (err) {
    throw new CampaignError("InvalidIdentity", `Registry address is not a valid public key: ${registryAddress}`, {
      cause: err
    });
  }

  const idSeed = Buffer.alloc(8);
  idSeed.writeBigUInt64LE(BigInt(proposalId));
  const [address] = PublicKey.findProgramAddressSync([Buffer.from(LEDGER_SEED), idSeed], programId);
  return address.toBase58();
}
