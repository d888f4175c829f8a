/**
 * Delegated Operations
 *
 * A relayer submits on a signer's behalf and is paid a fee out of the
 * signer's funds. Each authorization is one-shot: its digest goes into the
 * used-message set and can never be consumed again.
 */

import type { Address, Hex } from "viem";

import { depositOnBehalf } from "./balances.js";
import { allocateChannel, normalizeOpenParams, type OpenChannelParams } from "./channels.js";
import {
  credit,
  debit,
  requireAddress,
  requireSigner,
  requireUint,
  type OperationContext,
} from "./context.js";
import { EscrowError, errorSummary } from "./errors.js";
import { depositMessageDigest, openChannelMessageDigest } from "./messages.js";
import type { AuthorizationToken } from "./types.js";

export interface OpenChannelByThirdPartyParams extends OpenChannelParams {
  fee: bigint;
  messageNonce: bigint;
  signature: AuthorizationToken;
}

export interface DepositByThirdPartyParams {
  signer: Address;
  value: bigint;
  fee: bigint;
  messageNonce: bigint;
  signature: AuthorizationToken;
}

async function consumeAuthorization(
  ctx: OperationContext,
  signer: Address,
  digest: Hex,
  signature: AuthorizationToken
): Promise<void> {
  if (ctx.state.isMessageUsed(digest)) {
    throw new EscrowError("message_already_used", digest);
  }
  if (!(await ctx.verify(signer, digest, signature))) {
    throw new EscrowError("invalid_signature", `expected ${signer}`);
  }
  ctx.state.markMessageUsed(digest);
}

export async function openChannelByThirdParty(
  ctx: OperationContext,
  relayerInput: Address,
  paramsInput: OpenChannelByThirdPartyParams
): Promise<{ channelId: bigint; digest: Hex }> {
  const relayer = requireAddress(relayerInput, "relayer");
  const params = normalizeOpenParams(paramsInput);
  const fee = requireUint(paramsInput.fee, "fee");
  const messageNonce = requireUint(paramsInput.messageNonce, "messageNonce");

  const digest = openChannelMessageDigest({
    escrow: ctx.escrow,
    relayer,
    ...params,
    fee,
    messageNonce,
  });
  await consumeAuthorization(ctx, params.signer, digest, paramsInput.signature);

  const available = ctx.state.getBalance(params.signer);
  if (available < params.value + fee) {
    throw new EscrowError(
      "insufficient_balance",
      `${params.signer} holds ${available}, needs ${params.value + fee}`
    );
  }

  debit(ctx.state, params.signer, fee);
  credit(ctx.state, relayer, fee);
  const { channelId, channel } = allocateChannel(ctx, params.signer, params);

  ctx.emit({
    type: "ChannelOpenByThirdParty",
    channelId,
    nonce: channel.nonce,
    relayer,
    signer: channel.signer,
    recipient: channel.recipient,
    groupId: channel.groupId,
    amount: channel.value,
    expiration: channel.expiration,
    fee,
    messageNonce,
  });

  return { channelId, digest };
}

/**
 * Fund the signer's escrow balance from their own tokens and pay the relayer.
 * No allowance grant is issued here: the Token Ledger pull relies on the
 * allowance the signer gave the escrow.
 */
export async function depositByThirdParty(
  ctx: OperationContext,
  relayerInput: Address,
  paramsInput: DepositByThirdPartyParams
): Promise<{ digest: Hex }> {
  const relayer = requireAddress(relayerInput, "relayer");
  const signer = requireSigner(paramsInput.signer);
  const value = requireUint(paramsInput.value, "value");
  const fee = requireUint(paramsInput.fee, "fee");
  const messageNonce = requireUint(paramsInput.messageNonce, "messageNonce");
  const total = value + fee;

  const digest = depositMessageDigest({
    escrow: ctx.escrow,
    relayer,
    signer,
    value,
    fee,
    messageNonce,
  });
  await consumeAuthorization(ctx, signer, digest, paramsInput.signature);

  let external: bigint;
  try {
    external = await ctx.tokenLedger.balanceOf(signer);
  } catch (error) {
    ctx.logger.error(`[TokenLedger] balanceOf(${signer}) threw:`, errorSummary(error));
    throw new EscrowError("external_transfer_failed", "balanceOf");
  }
  if (external < total) {
    throw new EscrowError(
      "insufficient_balance",
      `${signer} holds ${external} tokens, needs ${total}`
    );
  }

  await depositOnBehalf(ctx, signer, total);
  if (ctx.state.getBalance(signer) < total) {
    throw new EscrowError("insufficient_balance", "deposit was not credited");
  }

  debit(ctx.state, signer, fee);
  credit(ctx.state, relayer, fee);
  ctx.emit({ type: "TransferFunds", sender: signer, receiver: relayer, amount: fee });

  return { digest };
}
