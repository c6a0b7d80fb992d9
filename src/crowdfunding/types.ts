export type PublicKeyLike = string;

export interface Clock {
  now(): number;
}

/** Terms frozen at submission and copied into the deployed ledger. */
export interface CampaignTerms {
  minTarget: number;
  maxTarget: number;
  /** Unix seconds, inclusive */
  windowStart: number;
  /** Unix seconds, inclusive for contributions */
  windowEnd: number;
}

export interface LedgerConfig extends CampaignTerms {
  /** Address holding custody of contributed funds */
  address: PublicKeyLike;
  creator: PublicKeyLike;
  /** Token (mint) in which claims and refunds are paid */
  settlementAsset: PublicKeyLike;
}

export type ProposalStatus = "pending" | "accepted" | "rejected";

export interface ProposalDetails extends CampaignTerms {
  id: number;
  submitter: PublicKeyLike;
  status: ProposalStatus;
  submittedAt: number;
  reviewedAt?: number;
  /** Present only once the proposal is accepted */
  ledgerAddress?: PublicKeyLike;
}

export type CampaignPhase = "upcoming" | "active" | "successful" | "failed" | "claimed";

export interface CampaignDetails extends LedgerConfig {
  totalCollected: number;
  /** Sum of refunds paid out; totalCollected + totalRefunded is what was raised */
  totalRefunded: number;
  claimed: boolean;
  contributorCount: number;
  isActive: boolean;
  isSuccessful: boolean;
  phase: CampaignPhase;
}
