export type CampaignErrorKind = "validation" | "authorization" | "state" | "external";

const ERROR_KINDS = {
  InvalidAmounts: "validation",
  InvalidWindow: "validation",
  InvalidAmount: "validation",
  InvalidAsset: "validation",
  InvalidIdentity: "validation",
  Unauthorized: "authorization",
  UnknownProposal: "state",
  AlreadyReviewed: "state",
  NotActive: "state",
  TargetExceeded: "state",
  AlreadyClaimed: "state",
  NotEnded: "state",
  TargetNotReached: "state",
  CampaignSuccessful: "state",
  NoContribution: "state",
  ReentrantCall: "state",
  TransferFailed: "external"
} as const satisfies Record<string, CampaignErrorKind>;

export type CampaignErrorCode = keyof typeof ERROR_KINDS;

export class CampaignError extends Error {
  readonly code: CampaignErrorCode;
  readonly kind: CampaignErrorKind;

  constructor(code: CampaignErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CampaignError";
    this.code = code;
    this.kind = ERROR_KINDS[code];
  }
}

export function isCampaignError(err: unknown, code?: CampaignErrorCode): err is CampaignError {
  if (!(err instanceof CampaignError)) return false;
  return code === undefined || err.code === code;
}
