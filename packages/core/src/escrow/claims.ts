/**
 * Claim Processor
 *
 * Applies signed vouchers. Every successful claim advances the channel nonce,
 * so a voucher signed for the previous version can never be replayed.
 */

import type { Address } from "viem";

import { sendbackAndSuspend } from "./channels.js";
import {
  credit,
  requireAddress,
  requireChannel,
  requireUint,
  type OperationContext,
} from "./context.js";
import { EscrowError } from "./errors.js";
import { claimMessageDigest } from "./messages.js";
import type { AuthorizationToken } from "./types.js";

export interface ChannelClaimParams {
  channelId: bigint;
  amount: bigint;
  signature: AuthorizationToken;
  /** Return the remainder to the sender and suspend the channel. */
  isSendback: boolean;
}

export interface ClaimOutcome {
  channelId: bigint;
  nonce: bigint;
  claimAmount: bigint;
  sendBackAmount: bigint;
  keepAmount: bigint;
}

export async function channelClaim(
  ctx: OperationContext,
  callerInput: Address,
  params: ChannelClaimParams
): Promise<ClaimOutcome> {
  const caller = requireAddress(callerInput, "caller");
  const amount = requireUint(params.amount, "amount");
  const { channelId } = params;
  const channel = requireChannel(ctx.state, channelId);

  if (channel.recipient !== caller) {
    throw new EscrowError("unauthorized_caller", "only the recipient may claim");
  }
  if (amount > channel.value) {
    throw new EscrowError(
      "amount_exceeds_channel_value",
      `${amount} > ${channel.value}`
    );
  }

  const digest = claimMessageDigest({
    escrow: ctx.escrow,
    channelId,
    nonce: channel.nonce,
    amount,
  });
  if (!(await ctx.verify(channel.signer, digest, params.signature))) {
    throw new EscrowError("invalid_signature", `channel ${channelId} nonce ${channel.nonce}`);
  }

  const claimed = { ...channel, value: channel.value - amount };
  credit(ctx.state, channel.recipient, amount);

  let outcome: ClaimOutcome;
  if (params.isSendback) {
    const { sendBackAmount, channel: suspended } = sendbackAndSuspend(
      ctx,
      channelId,
      claimed
    );
    outcome = {
      channelId,
      nonce: suspended.nonce,
      claimAmount: amount,
      sendBackAmount,
      keepAmount: 0n,
    };
  } else {
    const bumped = { ...claimed, nonce: claimed.nonce + 1n };
    ctx.state.setChannel(channelId, bumped);
    outcome = {
      channelId,
      nonce: bumped.nonce,
      claimAmount: amount,
      sendBackAmount: 0n,
      keepAmount: bumped.value,
    };
  }

  ctx.emit({ type: "ChannelClaim", recipient: channel.recipient, ...outcome });
  return outcome;
}

export interface MultiChannelClaimParams {
  channelIds: bigint[];
  amounts: bigint[];
  isSendbacks: boolean[];
  signatures: AuthorizationToken[];
}

/**
 * Apply claims in order against the same staged state. One failing entry
 * aborts the batch, including entries already applied.
 */
export async function multiChannelClaim(
  ctx: OperationContext,
  caller: Address,
  params: MultiChannelClaimParams
): Promise<ClaimOutcome[]> {
  const { channelIds, amounts, isSendbacks, signatures } = params;
  const length = channelIds.length;
  if (
    amounts.length !== length ||
    isSendbacks.length !== length ||
    signatures.length !== length
  ) {
    throw new EscrowError(
      "array_length_mismatch",
      `${length}/${amounts.length}/${isSendbacks.length}/${signatures.length}`
    );
  }

  const outcomes: ClaimOutcome[] = [];
  for (let i = 0; i < length; i++) {
    outcomes.push(
      await channelClaim(ctx, caller, {
        channelId: channelIds[i],
        amount: amounts[i],
        isSendback: isSendbacks[i],
        signature: signatures[i],
      })
    );
  }
  return outcomes;
}
