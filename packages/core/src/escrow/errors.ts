/**
 * Escrow Errors
 *
 * Every operation either commits fully or fails with one of these codes and
 * leaves state untouched.
 */

import type { Hash } from "viem";

export type EscrowErrorCode =
  | "insufficient_balance"
  | "invalid_signer"
  | "invalid_signature"
  | "message_already_used"
  | "amount_exceeds_channel_value"
  | "unauthorized_caller"
  | "expiration_not_reached"
  | "expiration_decreasing"
  | "external_transfer_failed"
  | "array_length_mismatch"
  | "channel_not_found"
  | "invalid_argument";

/**
 * Human-readable error messages for escrow errors.
 */
export const ESCROW_ERROR_MESSAGES: Record<EscrowErrorCode, string> = {
  insufficient_balance: "Balance too low for this operation",
  invalid_signer: "Signer must be a non-zero address",
  invalid_signature: "Signature does not recover to the expected signer",
  message_already_used: "Authorization message has already been used",
  amount_exceeds_channel_value: "Claim amount exceeds channel value",
  unauthorized_caller: "Caller is not permitted to act on this channel",
  expiration_not_reached: "Channel has not expired yet",
  expiration_decreasing: "New expiration is earlier than the current one",
  external_transfer_failed: "Token ledger transfer failed",
  array_length_mismatch: "Batch arrays must have equal length",
  channel_not_found: "Channel does not exist",
  invalid_argument: "Malformed argument",
};

export type EscrowErrorStatus = 400 | 401 | 402 | 403 | 404 | 409 | 502;

/**
 * HTTP status codes for escrow errors.
 */
export const ESCROW_ERROR_STATUS: Record<EscrowErrorCode, EscrowErrorStatus> = {
  insufficient_balance: 402,
  invalid_signer: 400,
  invalid_signature: 401,
  message_already_used: 409,
  amount_exceeds_channel_value: 400,
  unauthorized_caller: 403,
  expiration_not_reached: 409,
  expiration_decreasing: 400,
  external_transfer_failed: 502,
  array_length_mismatch: 400,
  channel_not_found: 404,
  invalid_argument: 400,
};

/**
 * Thrown inside an operation to abort it. The module converts it into an
 * `EscrowFailure`; anything else propagates.
 */
export class EscrowError extends Error {
  readonly code: EscrowErrorCode;

  constructor(code: EscrowErrorCode, detail?: string) {
    super(detail ? `${ESCROW_ERROR_MESSAGES[code]}: ${detail}` : ESCROW_ERROR_MESSAGES[code]);
    this.name = "EscrowError";
    this.code = code;
  }
}

export type EscrowFailure = {
  success: false;
  error: EscrowErrorCode;
  message: string;
};

export type EscrowResult<T extends object = Record<never, never>> =
  | ({
      success: true;
      /** Transfers submitted during the operation whose receipt never arrived. */
      unconfirmed?: Hash[];
    } & T)
  | EscrowFailure;

/**
 * Extract a human-readable error message from an unknown error.
 */
export function errorSummary(error: unknown): string {
  if (!error) return "unknown_error";
  if (typeof error === "string") return error;

  if (typeof error === "object") {
    if ("shortMessage" in error && typeof error.shortMessage === "string") {
      return error.shortMessage;
    }
    if ("message" in error && typeof error.message === "string") return error.message;
  }

  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
