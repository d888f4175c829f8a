/**
 * Escrow Message Digests
 *
 * Canonical byte layout of every signed escrow message. External signers
 * reproduce these digests byte-for-byte, so field order and prefixes are fixed.
 *
 * digest = keccak256(encodePacked(prefix, escrow, ...fields))
 *
 * Signers sign the 32-byte digest as an EIP-191 personal message.
 */

import { encodePacked, keccak256, type Address, type Hex } from "viem";

export const CLAIM_MESSAGE_PREFIX = "__escrow_claim_message";
export const OPEN_CHANNEL_MESSAGE_PREFIX = "__openChannelByThirdParty";
export const DEPOSIT_MESSAGE_PREFIX = "__depositByThirdParty";

export interface ClaimMessageFields {
  escrow: Address;
  channelId: bigint;
  nonce: bigint;
  amount: bigint;
}

export interface OpenChannelMessageFields {
  escrow: Address;
  relayer: Address;
  signer: Address;
  recipient: Address;
  groupId: Hex;
  value: bigint;
  expiration: bigint;
  fee: bigint;
  messageNonce: bigint;
}

export interface DepositMessageFields {
  escrow: Address;
  relayer: Address;
  signer: Address;
  value: bigint;
  fee: bigint;
  messageNonce: bigint;
}

/**
 * Digest a voucher authorizing `amount` against one channel version.
 *
 * @example
 * ```typescript
 * const digest = claimMessageDigest({ escrow, channelId: 0n, nonce: 3n, amount: 40n });
 * const signature = await account.signMessage({ message: { raw: digest } });
 * ```
 */
export function claimMessageDigest(fields: ClaimMessageFields): Hex {
  return keccak256(
    encodePacked(
      ["string", "address", "uint256", "uint256", "uint256"],
      [
        CLAIM_MESSAGE_PREFIX,
        fields.escrow,
        fields.channelId,
        fields.nonce,
        fields.amount,
      ]
    )
  );
}

export function openChannelMessageDigest(fields: OpenChannelMessageFields): Hex {
  return keccak256(
    encodePacked(
      [
        "string",
        "address",
        "address",
        "address",
        "address",
        "bytes32",
        "uint256",
        "uint256",
        "uint256",
        "uint256",
      ],
      [
        OPEN_CHANNEL_MESSAGE_PREFIX,
        fields.escrow,
        fields.relayer,
        fields.signer,
        fields.recipient,
        fields.groupId,
        fields.value,
        fields.expiration,
        fields.fee,
        fields.messageNonce,
      ]
    )
  );
}

export function depositMessageDigest(fields: DepositMessageFields): Hex {
  return keccak256(
    encodePacked(
      ["string", "address", "address", "address", "uint256", "uint256", "uint256"],
      [
        DEPOSIT_MESSAGE_PREFIX,
        fields.escrow,
        fields.relayer,
        fields.signer,
        fields.value,
        fields.fee,
        fields.messageNonce,
      ]
    )
  );
}
