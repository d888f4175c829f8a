/**
 * Voucher Flow Example - In-memory escrow walkthrough
 *
 * Runs a complete channel lifecycle against the in-memory token ledger:
 * - Alice deposits and opens a channel toward Bob
 * - Alice signs vouchers off-ledger; Bob claims them
 * - A relayer opens a second channel from Alice's pre-signed authorization
 * - Alice reclaims the second channel after it expires
 *
 * Usage:
 *   npm run example:voucher
 */

import { keccak256, stringToHex } from "viem";
import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";

import {
  createEscrowModule,
  formatEvent,
  InMemoryTokenLedger,
  ManualHeightSource,
  signClaimVoucher,
  signOpenChannelAuthorization,
} from "@escrow-channels/core";

const custody = privateKeyToAccount(generatePrivateKey());
const alice = privateKeyToAccount(generatePrivateKey());
const bob = privateKeyToAccount(generatePrivateKey());
const relayer = privateKeyToAccount(generatePrivateKey());

const tokenLedger = new InMemoryTokenLedger(custody.address);
const heightSource = new ManualHeightSource(500n);

const escrow = createEscrowModule({
  escrowAddress: custody.address,
  tokenLedger,
  heightSource,
  hooks: {
    onEvent: (event) => console.log(`  event ${event.type}`, formatEvent(event)),
  },
});

const groupId = keccak256(stringToHex("voucher-flow-example"));

function check<T extends { success: boolean }>(label: string, result: T): T {
  if (!result.success) {
    console.error(`${label} failed`, result);
    process.exit(1);
  }
  return result;
}

// ----------------------------------------------------------------------------
// Fund Alice and open a channel toward Bob
// ----------------------------------------------------------------------------

tokenLedger.mint(alice.address, 1_000n);
tokenLedger.approveFrom(alice.address, custody.address, 1_000n);

console.log("1. Alice deposits 300 and opens a channel of 100 toward Bob");
check("deposit", await escrow.deposit(alice.address, 300n));
const opened = await escrow.openChannel(alice.address, {
  signer: alice.address,
  recipient: bob.address,
  groupId,
  value: 100n,
  expiration: 1_000n,
});
if (!opened.success) throw new Error(opened.message);
const channelId = opened.channelId;

// ----------------------------------------------------------------------------
// Off-ledger vouchers
// ----------------------------------------------------------------------------

console.log("2. Bob claims a 40 voucher and keeps the channel open");
const first = await signClaimVoucher(alice, {
  escrow: escrow.escrowAddress,
  channelId,
  nonce: 0n,
  amount: 40n,
});
check(
  "claim 40",
  await escrow.channelClaim(bob.address, {
    channelId,
    amount: 40n,
    signature: first,
    isSendback: false,
  })
);

console.log("3. Replaying the same voucher is rejected");
const replay = await escrow.channelClaim(bob.address, {
  channelId,
  amount: 40n,
  signature: first,
  isSendback: false,
});
console.log(`  replay -> ${replay.success ? "accepted" : replay.error}`);

console.log("4. Bob claims 50 of the remaining 60 and sends the rest back");
const second = await signClaimVoucher(alice, {
  escrow: escrow.escrowAddress,
  channelId,
  nonce: 1n,
  amount: 50n,
});
check(
  "claim 50",
  await escrow.channelClaim(bob.address, {
    channelId,
    amount: 50n,
    signature: second,
    isSendback: true,
  })
);

// ----------------------------------------------------------------------------
// Relayed open and timeout reclaim
// ----------------------------------------------------------------------------

console.log("5. A relayer opens a channel for Alice from her signed authorization");
const relayed = {
  signer: alice.address,
  recipient: bob.address,
  groupId,
  value: 80n,
  expiration: 600n,
  fee: 5n,
  messageNonce: 1n,
};
const authorization = await signOpenChannelAuthorization(alice, {
  escrow: escrow.escrowAddress,
  relayer: relayer.address,
  ...relayed,
});
const relayedOpen = await escrow.openChannelByThirdParty(relayer.address, {
  ...relayed,
  signature: authorization,
});
if (!relayedOpen.success) throw new Error(relayedOpen.message);

console.log("6. Alice reclaims the relayed channel once height passes 600");
heightSource.set(600n);
check(
  "timeout",
  await escrow.channelClaimTimeout(alice.address, relayedOpen.channelId)
);

console.log("\nFinal escrow balances:");
console.log(`  alice   ${escrow.getBalance(alice.address)}`);
console.log(`  bob     ${escrow.getBalance(bob.address)}`);
console.log(`  relayer ${escrow.getBalance(relayer.address)}`);
