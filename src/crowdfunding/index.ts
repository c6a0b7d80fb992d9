export { CampaignLedger, assertValidTerms, isAmount } from "./campaign.js";
export type { LedgerDeps } from "./campaign.js";
export { CampaignRegistry } from "./registry.js";
export type { LedgerFactory, RegistryConfig, RegistryDeps } from "./registry.js";
export { CampaignError, isCampaignError } from "./errors.js";
export type { CampaignErrorCode, CampaignErrorKind } from "./errors.js";
export { EventLog, LoggingEventSink, NOOP_SINK, fanOut } from "./events.js";
export type {
  CampaignEvent,
  CampaignEventType,
  EventListener,
  EventSink,
  LedgerEvent,
  RecordedEvent,
  RegistryEvent
} from "./events.js";
export { ReentrancyGuard } from "./guard.js";
export { NULL_IDENTITY, deriveLedgerAddress, isNullIdentity } from "./identity.js";
export { TokenVault } from "./transfer.js";
export type { AssetTransfer } from "./transfer.js";
export type {
  CampaignDetails,
  CampaignPhase,
  CampaignTerms,
  Clock,
  LedgerConfig,
  ProposalDetails,
  ProposalStatus,
  PublicKeyLike
} from "./types.js";
