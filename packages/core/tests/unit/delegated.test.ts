import { describe, it, expect, vi } from "vitest";
import { zeroAddress } from "viem";

import { signDepositAuthorization, signOpenChannelAuthorization } from "../../src/escrow/client.js";
import { openChannelMessageDigest } from "../../src/escrow/messages.js";
import type { EscrowEvent } from "../../src/escrow/types.js";
import { alice, bob, carol, createTestEscrow, custody, GROUP_ID, relayer } from "../fixtures.js";

const openFields = {
  signer: alice.address,
  recipient: bob.address,
  groupId: GROUP_ID,
  value: 80n,
  expiration: 600n,
  fee: 5n,
  messageNonce: 1n,
};

const depositFields = {
  signer: alice.address,
  value: 60n,
  fee: 4n,
  messageNonce: 1n,
};

const signOpen = (relayerAddress = relayer.address) =>
  signOpenChannelAuthorization(alice, {
    escrow: custody.address,
    relayer: relayerAddress,
    ...openFields,
  });

const signDeposit = () =>
  signDepositAuthorization(alice, {
    escrow: custody.address,
    relayer: relayer.address,
    ...depositFields,
  });

describe("openChannelByThirdParty", () => {
  it("opens a channel for the signer and pays the relayer", async () => {
    const { escrow, fund } = createTestEscrow();
    await fund(alice.address, 100n);

    const result = await escrow.openChannelByThirdParty(relayer.address, {
      ...openFields,
      signature: await signOpen(),
    });

    const digest = openChannelMessageDigest({
      escrow: custody.address,
      relayer: relayer.address,
      ...openFields,
    });
    expect(result).toEqual({ success: true, channelId: 0n, digest });
    expect(escrow.getChannel(0n)).toEqual({
      nonce: 0n,
      sender: alice.address,
      signer: alice.address,
      recipient: bob.address,
      groupId: GROUP_ID,
      value: 80n,
      expiration: 600n,
    });
    expect(escrow.getBalance(alice.address)).toBe(15n);
    expect(escrow.getBalance(relayer.address)).toBe(5n);
    expect(escrow.isMessageUsed(digest)).toBe(true);
  });

  it("emits ChannelOpenByThirdParty", async () => {
    const { escrow, fund } = createTestEscrow();
    await fund(alice.address, 100n);
    const events: EscrowEvent[] = [];
    escrow.subscribe((event) => {
      events.push(event);
    });

    await escrow.openChannelByThirdParty(relayer.address, {
      ...openFields,
      signature: await signOpen(),
    });

    expect(events).toEqual([
      {
        type: "ChannelOpenByThirdParty",
        channelId: 0n,
        nonce: 0n,
        relayer: relayer.address,
        signer: alice.address,
        recipient: bob.address,
        groupId: GROUP_ID,
        amount: 80n,
        expiration: 600n,
        fee: 5n,
        messageNonce: 1n,
      },
    ]);
  });

  it("consumes each authorization once", async () => {
    const { escrow, fund } = createTestEscrow();
    await fund(alice.address, 200n);
    const params = { ...openFields, signature: await signOpen() };

    expect((await escrow.openChannelByThirdParty(relayer.address, params)).success).toBe(true);
    const replay = await escrow.openChannelByThirdParty(relayer.address, params);

    expect(replay).toMatchObject({ success: false, error: "message_already_used" });
    expect(escrow.getBalance(alice.address)).toBe(115n);
    expect(escrow.getBalance(relayer.address)).toBe(5n);
    expect(escrow.nextChannelId()).toBe(1n);
  });

  it("rejects an authorization addressed to a different relayer", async () => {
    const { escrow, fund } = createTestEscrow();
    await fund(alice.address, 100n);

    const result = await escrow.openChannelByThirdParty(relayer.address, {
      ...openFields,
      signature: await signOpen(carol.address),
    });

    expect(result).toMatchObject({ success: false, error: "invalid_signature" });
    expect(escrow.getBalance(alice.address)).toBe(100n);
  });

  it("requires the signer to cover value plus fee and leaves the message unused", async () => {
    const { escrow, fund } = createTestEscrow();
    await fund(alice.address, 84n);

    const result = await escrow.openChannelByThirdParty(relayer.address, {
      ...openFields,
      signature: await signOpen(),
    });

    expect(result).toMatchObject({ success: false, error: "insufficient_balance" });
    const digest = openChannelMessageDigest({
      escrow: custody.address,
      relayer: relayer.address,
      ...openFields,
    });
    expect(escrow.isMessageUsed(digest)).toBe(false);
    expect(escrow.getBalance(alice.address)).toBe(84n);
  });

  it("rejects the zero signer", async () => {
    const { escrow, fund } = createTestEscrow();
    await fund(alice.address, 100n);

    const result = await escrow.openChannelByThirdParty(relayer.address, {
      ...openFields,
      signer: zeroAddress,
      signature: await signOpen(),
    });

    expect(result).toMatchObject({ success: false, error: "invalid_signer" });
    expect(escrow.nextChannelId()).toBe(0n);
    expect(escrow.getBalance(relayer.address)).toBe(0n);
  });
});

describe("depositByThirdParty", () => {
  it("pulls value plus fee and pays the relayer", async () => {
    const { escrow, tokenLedger, mintAndApprove } = createTestEscrow();
    mintAndApprove(alice.address, 100n);
    const events: EscrowEvent[] = [];
    escrow.subscribe((event) => {
      events.push(event);
    });

    const result = await escrow.depositByThirdParty(relayer.address, {
      ...depositFields,
      signature: await signDeposit(),
    });

    expect(result.success).toBe(true);
    expect(escrow.getBalance(alice.address)).toBe(60n);
    expect(escrow.getBalance(relayer.address)).toBe(4n);
    expect(await tokenLedger.balanceOf(alice.address)).toBe(36n);
    expect(await tokenLedger.balanceOf(custody.address)).toBe(64n);
    expect(events).toEqual([
      { type: "DepositFunds", address: alice.address, amount: 64n },
      { type: "TransferFunds", sender: alice.address, receiver: relayer.address, amount: 4n },
    ]);
  });

  it("consumes each authorization once", async () => {
    const { escrow, mintAndApprove } = createTestEscrow();
    mintAndApprove(alice.address, 200n);
    const params = { ...depositFields, signature: await signDeposit() };

    expect((await escrow.depositByThirdParty(relayer.address, params)).success).toBe(true);
    const replay = await escrow.depositByThirdParty(relayer.address, params);

    expect(replay).toMatchObject({ success: false, error: "message_already_used" });
    expect(escrow.getBalance(alice.address)).toBe(60n);
  });

  it("checks the signer's token balance before pulling", async () => {
    const { escrow, tokenLedger, mintAndApprove } = createTestEscrow();
    mintAndApprove(alice.address, 63n);
    const pull = vi.spyOn(tokenLedger, "transferFrom");
    const signature = await signDeposit();

    const result = await escrow.depositByThirdParty(relayer.address, {
      ...depositFields,
      signature,
    });

    expect(result).toMatchObject({ success: false, error: "insufficient_balance" });
    expect(pull).not.toHaveBeenCalled();
  });

  it("leaves balances and the message untouched when the pull fails", async () => {
    const { escrow, tokenLedger } = createTestEscrow();
    tokenLedger.mint(alice.address, 100n);

    const result = await escrow.depositByThirdParty(relayer.address, {
      ...depositFields,
      signature: await signDeposit(),
    });

    expect(result).toMatchObject({ success: false, error: "external_transfer_failed" });
    expect(escrow.getBalance(alice.address)).toBe(0n);
    expect(escrow.getBalance(relayer.address)).toBe(0n);
    expect(await tokenLedger.balanceOf(alice.address)).toBe(100n);
  });

  it("maps a failing balance lookup to external_transfer_failed", async () => {
    const { escrow, tokenLedger } = createTestEscrow();
    vi.spyOn(tokenLedger, "balanceOf").mockRejectedValue(new Error("rpc down"));

    const result = await escrow.depositByThirdParty(relayer.address, {
      ...depositFields,
      signature: await signDeposit(),
    });

    expect(result).toMatchObject({ success: false, error: "external_transfer_failed" });
  });

  it("rejects the zero signer", async () => {
    const { escrow } = createTestEscrow();

    const result = await escrow.depositByThirdParty(relayer.address, {
      ...depositFields,
      signer: zeroAddress,
      signature: await signDeposit(),
    });

    expect(result).toMatchObject({ success: false, error: "invalid_signer" });
  });
});
