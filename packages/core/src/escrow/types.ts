/**
 * Escrow Types
 *
 * Shared record and event shapes for the payment-channel escrow.
 */

import type { Address, Hex, Signature } from "viem";

/**
 * A channel is suspended once a sendback or timeout settlement has drained it
 * (value and expiration both zero). Anything else is active.
 */
export type ChannelStatus = "active" | "suspended";

export type PaymentChannel = {
  nonce: bigint;
  sender: Address;
  signer: Address;
  recipient: Address;
  groupId: Hex;
  value: bigint;
  expiration: bigint;
};

/**
 * Opaque signature over a message digest: either the 65-byte serialized form
 * or viem's structured `{ r, s, v | yParity }`.
 */
export type AuthorizationToken = Hex | Signature;

export function channelStatus(channel: PaymentChannel): ChannelStatus {
  return channel.value === 0n && channel.expiration === 0n
    ? "suspended"
    : "active";
}

// ============================================================================
// Events
// ============================================================================

export type ChannelOpenEvent = {
  type: "ChannelOpen";
  channelId: bigint;
  nonce: bigint;
  sender: Address;
  signer: Address;
  recipient: Address;
  groupId: Hex;
  amount: bigint;
  expiration: bigint;
};

export type ChannelOpenByThirdPartyEvent = {
  type: "ChannelOpenByThirdParty";
  channelId: bigint;
  nonce: bigint;
  relayer: Address;
  signer: Address;
  recipient: Address;
  groupId: Hex;
  amount: bigint;
  expiration: bigint;
  fee: bigint;
  messageNonce: bigint;
};

export type ChannelClaimEvent = {
  type: "ChannelClaim";
  channelId: bigint;
  /** Nonce after the claim was applied */
  nonce: bigint;
  recipient: Address;
  claimAmount: bigint;
  sendBackAmount: bigint;
  keepAmount: bigint;
};

export type ChannelSenderClaimEvent = {
  type: "ChannelSenderClaim";
  channelId: bigint;
  nonce: bigint;
  claimAmount: bigint;
};

export type ChannelExtendEvent = {
  type: "ChannelExtend";
  channelId: bigint;
  newExpiration: bigint;
};

export type ChannelAddFundsEvent = {
  type: "ChannelAddFunds";
  channelId: bigint;
  additionalFunds: bigint;
};

export type DepositFundsEvent = {
  type: "DepositFunds";
  address: Address;
  amount: bigint;
};

export type WithdrawFundsEvent = {
  type: "WithdrawFunds";
  address: Address;
  amount: bigint;
};

export type TransferFundsEvent = {
  type: "TransferFunds";
  sender: Address;
  receiver: Address;
  amount: bigint;
};

export type EscrowEvent =
  | ChannelOpenEvent
  | ChannelOpenByThirdPartyEvent
  | ChannelClaimEvent
  | ChannelSenderClaimEvent
  | ChannelExtendEvent
  | ChannelAddFundsEvent
  | DepositFundsEvent
  | WithdrawFundsEvent
  | TransferFundsEvent;

export type EscrowEventType = EscrowEvent["type"];

export type EscrowEventListener = (event: EscrowEvent) => void | Promise<void>;

/**
 * Minimal logging surface. `console` satisfies it.
 */
export type EscrowLogger = Pick<Console, "info" | "warn" | "error">;
