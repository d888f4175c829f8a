import { describe, it, expect, beforeEach } from "vitest";

import { createTimestampHeightSource, ManualHeightSource } from "../../src/escrow/height.js";
import { InMemoryTokenLedger } from "../../src/escrow/tokenLedger.js";
import { alice, bob, custody } from "../fixtures.js";

describe("InMemoryTokenLedger", () => {
  let ledger: InMemoryTokenLedger;

  beforeEach(() => {
    ledger = new InMemoryTokenLedger(custody.address);
    ledger.mint(alice.address, 100n);
  });

  it("refuses pulls without an allowance to the custodian", async () => {
    expect(await ledger.transferFrom(alice.address, custody.address, 10n)).toBe(false);
    expect(await ledger.balanceOf(alice.address)).toBe(100n);
  });

  it("pulls within the allowance and spends it", async () => {
    ledger.approveFrom(alice.address, custody.address, 50n);

    expect(await ledger.transferFrom(alice.address, custody.address, 30n)).toBe(true);
    expect(await ledger.balanceOf(alice.address)).toBe(70n);
    expect(await ledger.balanceOf(custody.address)).toBe(30n);
    expect(ledger.allowance(alice.address, custody.address)).toBe(20n);

    expect(await ledger.transferFrom(alice.address, custody.address, 21n)).toBe(false);
  });

  it("refuses pulls beyond the owner's balance", async () => {
    ledger.approveFrom(alice.address, custody.address, 500n);

    expect(await ledger.transferFrom(alice.address, custody.address, 101n)).toBe(false);
    expect(ledger.allowance(alice.address, custody.address)).toBe(500n);
  });

  it("pushes out of the custodian's holdings", async () => {
    ledger.mint(custody.address, 40n);

    expect(await ledger.transfer(bob.address, 40n)).toBe(true);
    expect(await ledger.balanceOf(bob.address)).toBe(40n);
    expect(await ledger.transfer(bob.address, 1n)).toBe(false);
  });

  it("rejects negative amounts", async () => {
    ledger.mint(custody.address, 40n);

    expect(await ledger.transfer(bob.address, -1n)).toBe(false);
  });

  it("records custodian approvals", async () => {
    expect(await ledger.approve(bob.address, 9n)).toBe(true);
    expect(ledger.allowance(custody.address, bob.address)).toBe(9n);
  });
});

describe("height sources", () => {
  it("advances a manual height", async () => {
    const height = new ManualHeightSource(10n);

    expect(await height.currentHeight()).toBe(10n);
    expect(height.advance()).toBe(11n);
    expect(height.advance(4n)).toBe(15n);

    height.set(3n);
    expect(await height.currentHeight()).toBe(3n);
  });

  it("uses unix seconds for timestamp heights", async () => {
    const height = createTimestampHeightSource(() => 1_700_000_123_456);

    expect(await height.currentHeight()).toBe(1_700_000_123n);
  });
});
