import dotenv from "dotenv";

dotenv.config();

export const LOG_LEVEL = process.env.PINO_LOG_LEVEL?.trim() || "info";

export const SERVICE_NAME = process.env.SERVICE_NAME?.trim() || "campaign-ledger";

/** Wrapped SOL mint unless overridden */
export const SETTLEMENT_ASSET =
  process.env.CAMPAIGN_SETTLEMENT_ASSET?.trim() || "So11111111111111111111111111111111111111112";
