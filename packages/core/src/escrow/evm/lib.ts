/**
 * @escrow-channels/core/escrow/evm - viem adapters for the escrow
 *
 * @example
 * ```typescript
 * import { createErc20TokenLedger, createBlockHeightSource } from "@escrow-channels/core/escrow/evm";
 *
 * const tokenLedger = createErc20TokenLedger({ token, walletClient, publicClient });
 * const heightSource = createBlockHeightSource(publicClient);
 * ```
 */

export {
  createErc20TokenLedger,
  type Erc20TokenLedgerConfig,
} from "./tokenLedger.js";
export { createBlockHeightSource } from "./height.js";
export { erc20LedgerAbi } from "./constants.js";
