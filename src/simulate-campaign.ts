import { Keypair } from "@solana/web3.js";
import { CampaignRegistry } from "./crowdfunding/registry.js";
import { isCampaignError } from "./crowdfunding/errors.js";
import type { CampaignErrorCode } from "./crowdfunding/errors.js";
import { EventLog, LoggingEventSink, fanOut } from "./crowdfunding/events.js";
import { TokenVault } from "./crowdfunding/transfer.js";
import type { Clock } from "./crowdfunding/types.js";
import { SETTLEMENT_ASSET } from "./env.js";
import { makeLogger } from "./logger.js";

type Outcome = "success" | "failure";

const DAY = 86_400;

class ManualClock implements Clock {
  constructor(private nowUnix: number) {}

  now(): number {
    return this.nowUnix;
  }

  set(unix: number): void {
    this.nowUnix = unix;
  }
}

function getOutcome(): Outcome {
  const arg = process.argv.find((a) => a.startsWith("--outcome="));
  const outcome = arg?.split("=")[1] ?? "success";
  if (outcome !== "success" && outcome !== "failure") {
    throw new Error("Invalid --outcome. Use --outcome=success or --outcome=failure");
  }
  return outcome;
}

/** Runs a call that must be refused and reports the refusal code. */
function expectRefusal(label: string, code: CampaignErrorCode, fn: () => unknown): void {
  try {
    fn();
  } catch (err) {
    if (isCampaignError(err, code)) {
      console.log(`${label}: refused with ${code}`);
      return;
    }
    throw err;
  }
  throw new Error(`${label} should have been refused with ${code}`);
}

function address(): string {
  return Keypair.generate().publicKey.toBase58();
}

async function main() {
  const outcome = getOutcome();
  const logger = makeLogger({ script: "simulate-campaign" });
  const start = Math.floor(Date.now() / 1000);
  const clock = new ManualClock(start);
  const vault = new TokenVault();
  const log = new EventLog(clock, logger);
  const events = fanOut([log, new LoggingEventSink(logger)], logger);

  const reviewer = address();
  const creator = address();
  const backers = [address(), address()];

  const registry = new CampaignRegistry(
    { address: address(), reviewer, settlementAsset: SETTLEMENT_ASSET },
    { clock, transfer: vault, events, logger }
  );

  const id = registry.submit(creator, 100, 1_000, start + DAY, start + 10 * DAY);
  registry.review(reviewer, id, true);
  const ledger = registry.getLedger(id);
  if (!ledger) {
    throw new Error(`Proposal ${id} was accepted but has no ledger`);
  }

  const pledges = outcome === "success" ? [500, 300] : [30, 20];
  for (const backer of backers) vault.mint(SETTLEMENT_ASSET, backer, 1_000);

  clock.set(start + DAY + 1);
  backers.forEach((backer, i) => ledger.contribute(backer, pledges[i], SETTLEMENT_ASSET));
  const { maxTarget } = ledger.getDetails();
  expectRefusal("Over-cap contribution", "TargetExceeded", () => ledger.contribute(backers[0], maxTarget, SETTLEMENT_ASSET));

  clock.set(start + 10 * DAY + 1);
  if (ledger.canClaim(creator)) {
    ledger.claimFunds(creator);
    expectRefusal("Second claim", "AlreadyClaimed", () => ledger.claimFunds(creator));
  } else {
    const refunded = ledger.getContributors();
    for (const backer of refunded) ledger.refund(backer);
    expectRefusal("Second refund", "NoContribution", () => ledger.refund(refunded[0]));
  }

  const details = ledger.getDetails();
  console.log("Outcome:", details.phase);
  console.log("Ledger:", details.address);
  console.log("Collected:", details.totalCollected, "Refunded:", details.totalRefunded);
  console.log("Creator balance:", vault.balanceOf(SETTLEMENT_ASSET, creator));
  console.log("Events:", log.getEvents().map((e) => e.type).join(", "));
}

main().catch((err) => {
  console.error("Campaign simulation failed:", err);
  process.exit(1);
});
