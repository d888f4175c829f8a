/**
 * @escrow-channels/core - Multi-party payment-channel escrow
 *
 * This module exports the escrow module factory, its collaborators and the
 * signing helpers used by channel signers and relayers.
 *
 * @example
 * ```typescript
 * import { createEscrowModule, InMemoryTokenLedger, ManualHeightSource } from "@escrow-channels/core";
 * import { createErc20TokenLedger, createBlockHeightSource } from "@escrow-channels/core/escrow/evm";
 *
 * const escrow = createEscrowModule({
 *   escrowAddress: custody.address,
 *   tokenLedger: createErc20TokenLedger({ token, walletClient, publicClient }),
 *   heightSource: createBlockHeightSource(publicClient),
 * });
 * ```
 */

export * from "./escrow/lib.js";
