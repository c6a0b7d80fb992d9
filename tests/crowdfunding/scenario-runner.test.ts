import { describe, expect, it } from "vitest";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { CampaignLedger } from "../../src/crowdfunding/campaign.js";
import { isCampaignError } from "../../src/crowdfunding/errors.js";
import type { CampaignErrorCode } from "../../src/crowdfunding/errors.js";
import { EventLog } from "../../src/crowdfunding/events.js";
import { CampaignRegistry } from "../../src/crowdfunding/registry.js";
import { TokenVault } from "../../src/crowdfunding/transfer.js";
import type { CampaignPhase } from "../../src/crowdfunding/types.js";
import { FakeClock } from "../helpers/clock.js";
import { participant } from "../helpers/participants.js";

type Actor = "creator" | "alice" | "bob";

interface ScenarioStep {
  at: "windowStart" | "windowEnd";
  offset: number;
  action: "contribute" | "claim" | "refund";
  actor: Actor;
  amount?: number;
  expectError?: CampaignErrorCode;
}

interface Scenario {
  name: string;
  description: string;
  terms: { minTarget: number; maxTarget: number; startOffset: number; endOffset: number };
  approve: boolean;
  funding: Partial<Record<Actor, number>>;
  steps: ScenarioStep[];
  expected: {
    phase?: CampaignPhase;
    totalCollected?: number;
    balances?: Partial<Record<Actor, number>>;
    wallets?: Partial<Record<Actor, number>>;
    events: string[];
  };
}

const SCENARIOS = ["successful-claim.json", "failed-refund.json", "rejected-proposal.json"];
const START_UNIX = 1_700_000_000;
const ASSET = participant(50);

const ACTORS: Actor[] = ["creator", "alice", "bob"];
const actors: Record<Actor, string> = {
  creator: participant(1),
  alice: participant(10),
  bob: participant(11)
};
const reviewer = participant(2);

async function loadScenario(filename: string): Promise<Scenario> {
  const path = fileURLToPath(new URL(`../scenarios/${filename}`, import.meta.url));
  const content = await readFile(path, "utf-8");
  return JSON.parse(content);
}

function runStep(ledger: CampaignLedger, step: ScenarioStep): void {
  const who = actors[step.actor];
  switch (step.action) {
    case "contribute":
      ledger.contribute(who, step.amount ?? 0, ASSET);
      break;
    case "claim":
      ledger.claimFunds(who);
      break;
    case "refund":
      ledger.refund(who);
      break;
  }
}

function executeScenario(scenario: Scenario) {
  const clock = new FakeClock(START_UNIX);
  const vault = new TokenVault();
  const events = new EventLog(clock);
  const registry = new CampaignRegistry(
    { address: participant(30), reviewer, settlementAsset: ASSET },
    { clock, transfer: vault, events }
  );

  for (const actor of ACTORS) {
    const amount = scenario.funding[actor];
    if (amount) vault.mint(ASSET, actors[actor], amount);
  }

  const { minTarget, maxTarget, startOffset, endOffset } = scenario.terms;
  const id = registry.submit(actors.creator, minTarget, maxTarget, START_UNIX + startOffset, START_UNIX + endOffset);
  registry.review(reviewer, id, scenario.approve);
  const ledger = registry.getLedger(id);

  if (ledger) {
    const { windowStart, windowEnd } = ledger.getDetails();
    for (const [index, step] of scenario.steps.entries()) {
      clock.set((step.at === "windowStart" ? windowStart : windowEnd) + step.offset);
      let failure: unknown;
      try {
        runStep(ledger, step);
      } catch (err) {
        failure = err;
      }

      const label = `${scenario.name} step ${index} (${step.action} by ${step.actor})`;
      if (step.expectError) {
        expect(isCampaignError(failure, step.expectError), label).toBe(true);
      } else {
        expect(failure, label).toBeUndefined();
      }
    }
  }

  return { registry, ledger, vault, events, id };
}

describe("scenario runner", () => {
  it.each(SCENARIOS)("runs %s", async (filename) => {
    const scenario = await loadScenario(filename);
    const { registry, ledger, vault, events, id } = executeScenario(scenario);
    const { expected } = scenario;

    expect(registry.getProposal(id).status).toBe(scenario.approve ? "accepted" : "rejected");
    expect(ledger === undefined).toBe(!scenario.approve);

    if (ledger) {
      const details = ledger.getDetails();
      if (expected.phase) expect(details.phase).toBe(expected.phase);
      if (expected.totalCollected !== undefined) expect(details.totalCollected).toBe(expected.totalCollected);
      for (const actor of ACTORS) {
        const amount = expected.balances?.[actor];
        if (amount !== undefined) {
          expect(ledger.getContribution(actors[actor]), `balance of ${actor}`).toBe(amount);
        }
      }
    }
    for (const actor of ACTORS) {
      const amount = expected.wallets?.[actor];
      if (amount !== undefined) {
        expect(vault.balanceOf(ASSET, actors[actor]), `wallet of ${actor}`).toBe(amount);
      }
    }
    expect(events.getEvents().map((e) => e.type)).toEqual(expected.events);
  });
});
