import type { Logger } from "pino";
import { CampaignLedger, assertValidTerms } from "./campaign.js";
import { CampaignError } from "./errors.js";
import { NOOP_SINK } from "./events.js";
import type { EventSink, RegistryEvent } from "./events.js";
import { deriveLedgerAddress, isNullIdentity } from "./identity.js";
import type { AssetTransfer } from "./transfer.js";
import type { Clock, LedgerConfig, ProposalDetails, ProposalStatus, PublicKeyLike } from "./types.js";
import { makeNoopLogger } from "../logger.js";

export interface RegistryConfig {
  /** Registry address; ledger addresses are derived from it */
  address: PublicKeyLike;
  reviewer: PublicKeyLike;
  settlementAsset: PublicKeyLike;
}

export type LedgerFactory = (config: LedgerConfig) => CampaignLedger;

export interface RegistryDeps {
  clock: Clock;
  transfer: AssetTransfer;
  events?: EventSink;
  logger?: Logger;
  /** Overrides how approved proposals become ledgers */
  createLedger?: LedgerFactory;
}

interface ProposalRecord extends ProposalDetails {
  ledger?: CampaignLedger;
}

/**
 * CampaignRegistry vets campaign proposals and deploys a ledger for each one
 * the reviewer accepts. After deployment the registry only keeps a reference;
 * contributions and settlement go to the ledger directly.
 */
export class CampaignRegistry {
  private readonly config: Readonly<RegistryConfig>;
  private readonly clock: Clock;
  private readonly events: EventSink;
  private readonly logger: Logger;
  private readonly createLedger: LedgerFactory;
  private readonly proposals: ProposalRecord[] = [];
  private readonly history = new Map<PublicKeyLike, number[]>();
  private reviewer: PublicKeyLike;

  constructor(config: RegistryConfig, deps: RegistryDeps) {
    if (isNullIdentity(config.address) || isNullIdentity(config.reviewer)) {
      throw new CampaignError("InvalidIdentity", "Registry address and reviewer are required");
    }
    if (isNullIdentity(config.settlementAsset)) {
      throw new CampaignError("InvalidAsset", "Settlement asset is required");
    }
    this.config = Object.freeze({ ...config });
    this.reviewer = config.reviewer;
    this.clock = deps.clock;
    this.events = deps.events ?? NOOP_SINK;
    this.logger = (deps.logger ?? makeNoopLogger()).child({ registry: config.address });
    this.createLedger =
      deps.createLedger ??
      ((ledgerConfig) =>
        new CampaignLedger(ledgerConfig, {
          clock: deps.clock,
          transfer: deps.transfer,
          events: deps.events,
          logger: deps.logger
        }));
  }

  getReviewer(): PublicKeyLike {
    return this.reviewer;
  }

  /**
   * Submit campaign terms for review. Returns the new proposal id.
   */
  submit(
    submitter: PublicKeyLike,
    minTarget: number,
    maxTarget: number,
    windowStart: number,
    windowEnd: number
  ): number {
    if (isNullIdentity(submitter)) {
      throw new CampaignError("InvalidIdentity", "Submitter is required");
    }
    assertValidTerms({ minTarget, maxTarget, windowStart, windowEnd });
    const now = this.clock.now();
    if (windowStart <= now) {
      throw new CampaignError("InvalidWindow", "windowStart must be in the future");
    }

    const id = this.proposals.length;
    this.proposals.push({
      id,
      submitter,
      minTarget,
      maxTarget,
      windowStart,
      windowEnd,
      status: "pending",
      submittedAt: now
    });

    const ids = this.history.get(submitter) ?? [];
    ids.push(id);
    this.history.set(submitter, ids);

    this.emit({ type: "ProposalSubmitted", proposalId: id, submitter, minTarget, maxTarget, windowStart, windowEnd });
    return id;
  }

  /**
   * Accept or reject a pending proposal. Accepting deploys its ledger.
   */
  review(caller: PublicKeyLike, proposalId: number, approve: boolean): void {
    this.assertReviewer(caller);
    const proposal = this.record(proposalId);
    if (proposal.status !== "pending") {
      throw new CampaignError("AlreadyReviewed", "Proposal has already been reviewed");
    }

    if (approve) {
      const ledger = this.createLedger({
        address: deriveLedgerAddress(this.config.address, proposal.id),
        creator: proposal.submitter,
        settlementAsset: this.config.settlementAsset,
        minTarget: proposal.minTarget,
        maxTarget: proposal.maxTarget,
        windowStart: proposal.windowStart,
        windowEnd: proposal.windowEnd
      });
      proposal.ledger = ledger;
      proposal.ledgerAddress = ledger.address;
      proposal.status = "accepted";
      this.logger.info({ proposalId, ledger: ledger.address }, "ledger deployed");
      this.emit({ type: "LedgerDeployed", proposalId, ledger: ledger.address, creator: proposal.submitter });
    } else {
      proposal.status = "rejected";
    }
    proposal.reviewedAt = this.clock.now();

    this.emit({ type: "ProposalReviewed", proposalId, approved: approve });
  }

  getProposal(proposalId: number): ProposalDetails {
    const { ledger: _ledger, ...details } = this.record(proposalId);
    return details;
  }

  /**
   * The deployed ledger for an accepted proposal, if any.
   */
  getLedger(proposalId: number): CampaignLedger | undefined {
    return this.record(proposalId).ledger;
  }

  getSubmitterHistory(submitter: PublicKeyLike): number[] {
    return [...(this.history.get(submitter) ?? [])];
  }

  listProposals(status?: ProposalStatus): ProposalDetails[] {
    return this.proposals
      .filter((p) => status === undefined || p.status === status)
      .map((p) => this.getProposal(p.id));
  }

  proposalCount(): number {
    return this.proposals.length;
  }

  transferReviewerRole(caller: PublicKeyLike, newReviewer: PublicKeyLike): void {
    this.assertReviewer(caller);
    if (isNullIdentity(newReviewer)) {
      throw new CampaignError("InvalidIdentity", "New reviewer is required");
    }

    const previousReviewer = this.reviewer;
    this.reviewer = newReviewer;
    this.emit({ type: "ReviewerChanged", previousReviewer, newReviewer });
  }

  private assertReviewer(caller: PublicKeyLike): void {
    if (caller !== this.reviewer) {
      throw new CampaignError("Unauthorized", "Caller is not the reviewer");
    }
  }

  private record(proposalId: number): ProposalRecord {
    const proposal = Number.isInteger(proposalId) ? this.proposals[proposalId] : undefined;
    if (!proposal) {
      throw new CampaignError("UnknownProposal", `Unknown proposal ${proposalId}`);
    }
    return proposal;
  }

  private emit(event: RegistryEvent): void {
    try {
      this.events.emit(event);
    } catch (err) {
      this.logger.error({ err, event: event.type }, "event sink failed");
    }
  }
}
