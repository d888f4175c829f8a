/**
 * Balance Ledger Operations
 *
 * Funds held by the escrow on behalf of an address but not yet locked into a
 * channel. Deposits pull from the Token Ledger, withdrawals push back out.
 */

import type { Address } from "viem";

import {
  credit,
  debit,
  externalTransfer,
  requireAddress,
  requireUint,
  type OperationContext,
} from "./context.js";

/**
 * Pull `amount` of `depositor`'s tokens into custody and credit their balance.
 * Whoever submits the call, the tokens and the credit are `depositor`'s.
 */
export async function depositOnBehalf(
  ctx: OperationContext,
  depositorInput: Address,
  amountInput: bigint
): Promise<void> {
  const depositor = requireAddress(depositorInput, "depositor");
  const amount = requireUint(amountInput, "amount");

  await externalTransfer(ctx, `transferFrom(${depositor}, ${amount})`, () =>
    ctx.tokenLedger.transferFrom(depositor, ctx.escrow, amount)
  );

  credit(ctx.state, depositor, amount);
  ctx.emit({ type: "DepositFunds", address: depositor, amount });
}

export async function deposit(
  ctx: OperationContext,
  depositor: Address,
  amount: bigint
): Promise<void> {
  await depositOnBehalf(ctx, depositor, amount);
}

export async function withdraw(
  ctx: OperationContext,
  callerInput: Address,
  amountInput: bigint
): Promise<void> {
  const caller = requireAddress(callerInput, "caller");
  const amount = requireUint(amountInput, "amount");

  debit(ctx.state, caller, amount);
  await externalTransfer(ctx, `transfer(${caller}, ${amount})`, () =>
    ctx.tokenLedger.transfer(caller, amount)
  );

  ctx.emit({ type: "WithdrawFunds", address: caller, amount });
}

export function transfer(
  ctx: OperationContext,
  callerInput: Address,
  toInput: Address,
  amountInput: bigint
): void {
  const caller = requireAddress(callerInput, "caller");
  const to = requireAddress(toInput, "to");
  const amount = requireUint(amountInput, "amount");

  debit(ctx.state, caller, amount);
  credit(ctx.state, to, amount);

  ctx.emit({ type: "TransferFunds", sender: caller, receiver: to, amount });
}
