import { describe, it, expect } from "vitest";
import { zeroAddress } from "viem";

import {
  signClaimVoucher,
  signDepositAuthorization,
  signOpenChannelAuthorization,
} from "../../src/escrow/client.js";
import {
  claimMessageDigest,
  depositMessageDigest,
  openChannelMessageDigest,
} from "../../src/escrow/messages.js";
import { recoverAuthorizer, verifyAuthorization } from "../../src/escrow/verification.js";
import { alice, bob, custody, GROUP_ID, relayer } from "../fixtures.js";

const claimFields = { escrow: custody.address, channelId: 0n, nonce: 0n, amount: 40n };

describe("verifyAuthorization", () => {
  it("accepts a personal signature by the expected signer", async () => {
    const digest = claimMessageDigest(claimFields);
    const signature = await alice.signMessage({ message: { raw: digest } });

    expect(await verifyAuthorization(alice.address, digest, signature)).toBe(true);
    expect(await recoverAuthorizer(digest, signature)).toBe(alice.address);
  });

  it("rejects a signature by someone else", async () => {
    const digest = claimMessageDigest(claimFields);
    const signature = await bob.signMessage({ message: { raw: digest } });

    expect(await verifyAuthorization(alice.address, digest, signature)).toBe(false);
  });

  it("rejects a signature over a different digest", async () => {
    const signature = await alice.signMessage({
      message: { raw: claimMessageDigest({ ...claimFields, amount: 41n }) },
    });

    expect(
      await verifyAuthorization(alice.address, claimMessageDigest(claimFields), signature)
    ).toBe(false);
  });

  it("never authorizes the zero address", async () => {
    const digest = claimMessageDigest(claimFields);
    const signature = await alice.signMessage({ message: { raw: digest } });

    expect(await verifyAuthorization(zeroAddress, digest, signature)).toBe(false);
  });

  it("treats malformed tokens as unauthorized", async () => {
    const digest = claimMessageDigest(claimFields);

    expect(await recoverAuthorizer(digest, "0x1234")).toBeUndefined();
    expect(await verifyAuthorization(alice.address, digest, "0x1234")).toBe(false);
  });
});

describe("signing helpers", () => {
  it("signs claim vouchers over the claim digest", async () => {
    const signature = await signClaimVoucher(alice, claimFields);

    expect(
      await verifyAuthorization(alice.address, claimMessageDigest(claimFields), signature)
    ).toBe(true);
  });

  it("defaults the open-channel signer to the signing account", async () => {
    const fields = {
      escrow: custody.address,
      relayer: relayer.address,
      recipient: bob.address,
      groupId: GROUP_ID,
      value: 80n,
      expiration: 600n,
      fee: 5n,
      messageNonce: 1n,
    };
    const signature = await signOpenChannelAuthorization(alice, fields);
    const digest = openChannelMessageDigest({ ...fields, signer: alice.address });

    expect(await verifyAuthorization(alice.address, digest, signature)).toBe(true);
  });

  it("defaults the deposit signer to the signing account", async () => {
    const fields = {
      escrow: custody.address,
      relayer: relayer.address,
      value: 60n,
      fee: 4n,
      messageNonce: 2n,
    };
    const signature = await signDepositAuthorization(alice, fields);
    const digest = depositMessageDigest({ ...fields, signer: alice.address });

    expect(await verifyAuthorization(alice.address, digest, signature)).toBe(true);
  });
});
