/**
 * @escrow-channels/core/escrow - Payment-channel escrow components
 *
 * This module exports the escrow state machine, its stores and the signature
 * protocol that gates fund release.
 *
 * @example
 * ```typescript
 * import {
 *   createEscrowModule,
 *   InMemoryTokenLedger,
 *   ManualHeightSource,
 *   signClaimVoucher,
 * } from "@escrow-channels/core/escrow";
 *
 * const escrow = createEscrowModule({
 *   escrowAddress,
 *   tokenLedger: new InMemoryTokenLedger(escrowAddress),
 *   heightSource: new ManualHeightSource(),
 * });
 *
 * const signature = await signClaimVoucher(signerAccount, {
 *   escrow: escrowAddress,
 *   channelId: 0n,
 *   nonce: 0n,
 *   amount: 40n,
 * });
 * const result = await escrow.channelClaim(recipient, {
 *   channelId: 0n,
 *   amount: 40n,
 *   signature,
 *   isSendback: false,
 * });
 * ```
 */

// Module factory (preferred API)
export {
  createEscrowModule,
  type EscrowModule,
  type EscrowModuleConfig,
  type EscrowHooks,
} from "./module.js";

// Operation parameter types
export type { OpenChannelParams } from "./channels.js";
export type {
  ChannelClaimParams,
  MultiChannelClaimParams,
  ClaimOutcome,
} from "./claims.js";
export type {
  OpenChannelByThirdPartyParams,
  DepositByThirdPartyParams,
} from "./delegated.js";

// Records and events
export {
  channelStatus,
  type PaymentChannel,
  type ChannelStatus,
  type AuthorizationToken,
  type EscrowEvent,
  type EscrowEventType,
  type EscrowEventListener,
  type EscrowLogger,
} from "./types.js";

// Errors
export {
  EscrowError,
  ESCROW_ERROR_MESSAGES,
  ESCROW_ERROR_STATUS,
  errorSummary,
  type EscrowErrorCode,
  type EscrowErrorStatus,
  type EscrowFailure,
  type EscrowResult,
} from "./errors.js";

// State store
export { InMemoryEscrowStateStore, type EscrowStateStore } from "./store.js";
export { StagedEscrowState } from "./transaction.js";

// Signature protocol
export {
  claimMessageDigest,
  openChannelMessageDigest,
  depositMessageDigest,
  CLAIM_MESSAGE_PREFIX,
  OPEN_CHANNEL_MESSAGE_PREFIX,
  DEPOSIT_MESSAGE_PREFIX,
  type ClaimMessageFields,
  type OpenChannelMessageFields,
  type DepositMessageFields,
} from "./messages.js";
export {
  verifyAuthorization,
  recoverAuthorizer,
  type AuthorizationVerifier,
} from "./verification.js";
export {
  signClaimVoucher,
  signOpenChannelAuthorization,
  signDepositAuthorization,
  type EscrowSigningAccount,
} from "./client.js";

// Collaborators
export {
  InMemoryTokenLedger,
  TransferPendingError,
  type TokenLedger,
} from "./tokenLedger.js";
export {
  ManualHeightSource,
  createTimestampHeightSource,
  type HeightSource,
} from "./height.js";

// Formatting
export { formatChannel, formatEvent } from "./format.js";

// Sweeper (automatic timeout reclaims)
export {
  createTimeoutSweeper,
  type TimeoutSweeper,
  type TimeoutSweeperConfig,
} from "./sweeper.js";
