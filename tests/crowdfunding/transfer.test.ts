import { describe, expect, it } from "vitest";
import { NULL_IDENTITY } from "../../src/crowdfunding/identity.js";
import { TokenVault } from "../../src/crowdfunding/transfer.js";
import { participant } from "../helpers/participants.js";

const ASSET = participant(50);
const alice = participant(10);
const bob = participant(11);

describe("TokenVault", () => {
  it("moves balances between holders", () => {
    const vault = new TokenVault();
    vault.mint(ASSET, alice, 100);

    expect(vault.transfer(ASSET, alice, bob, 40)).toBe(true);
    expect(vault.balanceOf(ASSET, alice)).toBe(60);
    expect(vault.balanceOf(ASSET, bob)).toBe(40);
  });

  it("refuses transfers it cannot complete and moves nothing", () => {
    const vault = new TokenVault();
    vault.mint(ASSET, alice, 10);

    expect(vault.transfer(ASSET, alice, bob, 11)).toBe(false);
    expect(vault.transfer(ASSET, alice, bob, 0)).toBe(false);
    expect(vault.transfer(NULL_IDENTITY, alice, bob, 5)).toBe(false);
    expect(vault.balanceOf(ASSET, alice)).toBe(10);
    expect(vault.balanceOf(ASSET, bob)).toBe(0);
  });

  it("keeps assets apart", () => {
    const vault = new TokenVault();
    const other = participant(51);
    vault.mint(ASSET, alice, 10);

    expect(vault.transfer(other, alice, bob, 5)).toBe(false);
    expect(vault.balanceOf(other, alice)).toBe(0);
  });

  it("only mints positive integer amounts", () => {
    const vault = new TokenVault();
    expect(() => vault.mint(ASSET, alice, 0)).toThrow("Mint amount must be a positive integer");
    expect(() => vault.mint(ASSET, alice, 2.5)).toThrow("Mint amount must be a positive integer");
  });
});
