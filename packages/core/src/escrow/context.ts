/**
 * Operation Context
 *
 * What every escrow operation runs against, plus the precondition helpers
 * shared by the balance, channel, claim and delegated operation sets.
 */

import {
  getAddress,
  isAddress,
  isAddressEqual,
  isHex,
  maxUint256,
  size,
  zeroAddress,
  type Address,
  type Hex,
} from "viem";

import { EscrowError, errorSummary } from "./errors.js";
import type { HeightSource } from "./height.js";
import type { EscrowStateStore } from "./store.js";
import { TransferPendingError, type TokenLedger } from "./tokenLedger.js";
import type { EscrowEvent, EscrowLogger, PaymentChannel } from "./types.js";
import type { AuthorizationVerifier } from "./verification.js";

export interface OperationContext {
  /** Staged state; discarded unless the operation succeeds. */
  state: EscrowStateStore;
  /** This escrow's own identity and custody account. */
  escrow: Address;
  tokenLedger: TokenLedger;
  heightSource: HeightSource;
  verify: AuthorizationVerifier;
  logger: EscrowLogger;
  /** Queue an event for delivery after commit. */
  emit(event: EscrowEvent): void;
  /** Record a submitted transfer whose receipt never arrived. */
  unconfirmed(hash: Hex): void;
}

// ============================================================================
// Argument validation
// ============================================================================

export function requireAddress(value: string, field: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new EscrowError("invalid_argument", `${field} is not an address`);
  }
  return getAddress(value);
}

export function requireSigner(value: string): Address {
  const signer = requireAddress(value, "signer");
  if (isAddressEqual(signer, zeroAddress)) {
    throw new EscrowError("invalid_signer");
  }
  return signer;
}

export function requireUint(value: bigint, field: string): bigint {
  if (typeof value !== "bigint" || value < 0n || value > maxUint256) {
    throw new EscrowError("invalid_argument", `${field} must be a uint256`);
  }
  return value;
}

export function requireGroupId(value: string): Hex {
  if (!isHex(value, { strict: true }) || size(value) !== 32) {
    throw new EscrowError("invalid_argument", "groupId must be 32 bytes of hex");
  }
  return value;
}

// ============================================================================
// State helpers
// ============================================================================

export function requireChannel(
  state: EscrowStateStore,
  channelId: bigint
): PaymentChannel {
  requireUint(channelId, "channelId");
  const channel = state.getChannel(channelId);
  if (!channel) {
    throw new EscrowError("channel_not_found", `channel ${channelId}`);
  }
  return channel;
}

export function credit(
  state: EscrowStateStore,
  address: Address,
  amount: bigint
): void {
  state.setBalance(address, state.getBalance(address) + amount);
}

export function debit(
  state: EscrowStateStore,
  address: Address,
  amount: bigint
): void {
  const balance = state.getBalance(address);
  if (balance < amount) {
    throw new EscrowError(
      "insufficient_balance",
      `${address} holds ${balance}, needs ${amount}`
    );
  }
  state.setBalance(address, balance - amount);
}

/**
 * Run a Token Ledger call, mapping a `false` result or a thrown error to
 * `external_transfer_failed`. A pending transfer may already have moved funds,
 * so the operation carries on as if it succeeded.
 */
export async function externalTransfer(
  ctx: OperationContext,
  label: string,
  call: () => Promise<boolean>
): Promise<void> {
  let ok: boolean;
  try {
    ok = await call();
  } catch (error) {
    if (error instanceof TransferPendingError) {
      ctx.logger.error(`[TokenLedger] ${label} unconfirmed, booking as done:`, error.hash);
      ctx.unconfirmed(error.hash);
      return;
    }
    ctx.logger.error(`[TokenLedger] ${label} threw:`, errorSummary(error));
    throw new EscrowError("external_transfer_failed", label);
  }
  if (!ok) {
    ctx.logger.warn(`[TokenLedger] ${label} returned false`);
    throw new EscrowError("external_transfer_failed", label);
  }
}
