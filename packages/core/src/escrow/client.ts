/**
 * Escrow Client Helpers
 *
 * Signing helpers for the parties that authorize escrow actions off-ledger:
 * channel signers issuing vouchers, and users pre-authorizing a relayer.
 *
 * @example
 * ```typescript
 * import { privateKeyToAccount } from "viem/accounts";
 * import { signClaimVoucher } from "@escrow-channels/core";
 *
 * const account = privateKeyToAccount(process.env.SIGNER_KEY as `0x${string}`);
 * const signature = await signClaimVoucher(account, {
 *   escrow: "0x...",
 *   channelId: 0n,
 *   nonce: 0n,
 *   amount: 40n,
 * });
 * ```
 */

import type { Hex, LocalAccount } from "viem";

import {
  claimMessageDigest,
  depositMessageDigest,
  openChannelMessageDigest,
  type ClaimMessageFields,
  type DepositMessageFields,
  type OpenChannelMessageFields,
} from "./messages.js";

/**
 * Anything able to produce an EIP-191 signature, e.g. a viem local account.
 */
export type EscrowSigningAccount = Pick<LocalAccount, "address" | "signMessage">;

export async function signClaimVoucher(
  account: EscrowSigningAccount,
  fields: ClaimMessageFields
): Promise<Hex> {
  return account.signMessage({ message: { raw: claimMessageDigest(fields) } });
}

export async function signOpenChannelAuthorization(
  account: EscrowSigningAccount,
  fields: Omit<OpenChannelMessageFields, "signer"> & {
    signer?: OpenChannelMessageFields["signer"];
  }
): Promise<Hex> {
  const digest = openChannelMessageDigest({
    ...fields,
    signer: fields.signer ?? account.address,
  });
  return account.signMessage({ message: { raw: digest } });
}

export async function signDepositAuthorization(
  account: EscrowSigningAccount,
  fields: Omit<DepositMessageFields, "signer"> & {
    signer?: DepositMessageFields["signer"];
  }
): Promise<Hex> {
  const digest = depositMessageDigest({
    ...fields,
    signer: fields.signer ?? account.address,
  });
  return account.signMessage({ message: { raw: digest } });
}
