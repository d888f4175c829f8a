/**
 * Channel Registry & Lifecycle
 *
 * Channels are never deleted. A sendback or timeout settlement suspends a
 * channel (value 0, expiration 0); extend + add-funds revives it under the
 * same id with its nonce sequence intact.
 */

import type { Address, Hex } from "viem";

import { depositOnBehalf } from "./balances.js";
import {
  credit,
  debit,
  requireAddress,
  requireChannel,
  requireGroupId,
  requireSigner,
  requireUint,
  type OperationContext,
} from "./context.js";
import { EscrowError } from "./errors.js";
import type { PaymentChannel } from "./types.js";

export interface OpenChannelParams {
  signer: Address;
  recipient: Address;
  groupId: Hex;
  value: bigint;
  expiration: bigint;
}

/**
 * Validated, normalized form of OpenChannelParams.
 */
export function normalizeOpenParams(params: OpenChannelParams): OpenChannelParams {
  return {
    signer: requireSigner(params.signer),
    recipient: requireAddress(params.recipient, "recipient"),
    groupId: requireGroupId(params.groupId),
    value: requireUint(params.value, "value"),
    expiration: requireUint(params.expiration, "expiration"),
  };
}

/**
 * Lock `value` from `sender`'s balance into a new channel and return its id.
 * Emits nothing; callers choose the open event.
 */
export function allocateChannel(
  ctx: OperationContext,
  sender: Address,
  params: OpenChannelParams
): { channelId: bigint; channel: PaymentChannel } {
  debit(ctx.state, sender, params.value);

  const channelId = ctx.state.getNextChannelId();
  const channel: PaymentChannel = {
    nonce: 0n,
    sender,
    signer: params.signer,
    recipient: params.recipient,
    groupId: params.groupId,
    value: params.value,
    expiration: params.expiration,
  };

  ctx.state.setChannel(channelId, channel);
  ctx.state.setNextChannelId(channelId + 1n);

  return { channelId, channel };
}

export function openChannel(
  ctx: OperationContext,
  callerInput: Address,
  paramsInput: OpenChannelParams
): bigint {
  const caller = requireAddress(callerInput, "caller");
  const params = normalizeOpenParams(paramsInput);

  const { channelId, channel } = allocateChannel(ctx, caller, params);
  ctx.emit({
    type: "ChannelOpen",
    channelId,
    nonce: channel.nonce,
    sender: channel.sender,
    signer: channel.signer,
    recipient: channel.recipient,
    groupId: channel.groupId,
    amount: channel.value,
    expiration: channel.expiration,
  });

  return channelId;
}

/**
 * Deposit `value` of the caller's tokens and open a channel with it.
 */
export async function depositAndOpenChannel(
  ctx: OperationContext,
  callerInput: Address,
  paramsInput: OpenChannelParams
): Promise<bigint> {
  const caller = requireAddress(callerInput, "caller");
  // Validate before the token pull: nothing may fail once funds have moved.
  const params = normalizeOpenParams(paramsInput);

  await depositOnBehalf(ctx, caller, params.value);
  return openChannel(ctx, caller, params);
}

export function channelExtend(
  ctx: OperationContext,
  callerInput: Address,
  channelId: bigint,
  newExpirationInput: bigint
): void {
  const caller = requireAddress(callerInput, "caller");
  const newExpiration = requireUint(newExpirationInput, "newExpiration");
  const channel = requireChannel(ctx.state, channelId);

  if (channel.sender !== caller) {
    throw new EscrowError("unauthorized_caller", "only the sender may extend");
  }
  if (newExpiration < channel.expiration) {
    throw new EscrowError(
      "expiration_decreasing",
      `${newExpiration} < ${channel.expiration}`
    );
  }

  ctx.state.setChannel(channelId, { ...channel, expiration: newExpiration });
  ctx.emit({ type: "ChannelExtend", channelId, newExpiration });
}

/**
 * Top up any channel from the caller's balance. Funding is open to anyone;
 * only claims and reclaims are restricted.
 */
export function channelAddFunds(
  ctx: OperationContext,
  callerInput: Address,
  channelId: bigint,
  amountInput: bigint
): void {
  const caller = requireAddress(callerInput, "caller");
  const amount = requireUint(amountInput, "amount");
  const channel = requireChannel(ctx.state, channelId);

  debit(ctx.state, caller, amount);
  ctx.state.setChannel(channelId, { ...channel, value: channel.value + amount });
  ctx.emit({ type: "ChannelAddFunds", channelId, additionalFunds: amount });
}

export function channelExtendAndAddFunds(
  ctx: OperationContext,
  caller: Address,
  channelId: bigint,
  newExpiration: bigint,
  amount: bigint
): void {
  channelExtend(ctx, caller, channelId, newExpiration);
  channelAddFunds(ctx, caller, channelId, amount);
}

/**
 * Return whatever is left in the channel to its sender and suspend it.
 * Returns the amount sent back.
 */
export function sendbackAndSuspend(
  ctx: OperationContext,
  channelId: bigint,
  channel: PaymentChannel
): { sendBackAmount: bigint; channel: PaymentChannel } {
  const sendBackAmount = channel.value;
  credit(ctx.state, channel.sender, sendBackAmount);

  const suspended: PaymentChannel = {
    ...channel,
    value: 0n,
    nonce: channel.nonce + 1n,
    expiration: 0n,
  };
  ctx.state.setChannel(channelId, suspended);

  return { sendBackAmount, channel: suspended };
}

export async function channelClaimTimeout(
  ctx: OperationContext,
  callerInput: Address,
  channelId: bigint
): Promise<bigint> {
  const caller = requireAddress(callerInput, "caller");
  const channel = requireChannel(ctx.state, channelId);

  if (channel.sender !== caller) {
    throw new EscrowError("unauthorized_caller", "only the sender may reclaim");
  }

  const height = await ctx.heightSource.currentHeight();
  if (height < channel.expiration) {
    throw new EscrowError(
      "expiration_not_reached",
      `height ${height} < expiration ${channel.expiration}`
    );
  }

  const { sendBackAmount, channel: suspended } = sendbackAndSuspend(
    ctx,
    channelId,
    channel
  );
  ctx.emit({
    type: "ChannelSenderClaim",
    channelId,
    nonce: suspended.nonce,
    claimAmount: sendBackAmount,
  });

  return sendBackAmount;
}
