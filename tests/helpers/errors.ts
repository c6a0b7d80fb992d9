import { expect } from "vitest";
import { CampaignError, isCampaignError } from "../../src/crowdfunding/errors.js";
import type { CampaignErrorCode } from "../../src/crowdfunding/errors.js";

export function expectCampaignError(fn: () => unknown, code: CampaignErrorCode): CampaignError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(CampaignError);
  if (!isCampaignError(caught)) {
    throw new Error(`Expected CampaignError ${code}`);
  }
  expect(caught.code).toBe(code);
  return caught;
}
