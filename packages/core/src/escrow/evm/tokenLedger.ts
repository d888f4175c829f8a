/**
 * ERC-20 Token Ledger
 *
 * Token Ledger backed by an on-chain ERC-20 contract. The wallet client's
 * account is the escrow's custody account: it is the spender for pulls and the
 * sender for pushes.
 */

import type {
  Account,
  Address,
  Chain,
  Hash,
  PublicClient,
  Transport,
  WalletClient,
} from "viem";

import { errorSummary } from "../errors.js";
import { TransferPendingError, type TokenLedger } from "../tokenLedger.js";
import type { EscrowLogger } from "../types.js";
import { erc20LedgerAbi } from "./constants.js";

export interface Erc20TokenLedgerConfig {
  /** ERC-20 contract address */
  token: Address;
  walletClient: WalletClient<Transport, Chain, Account>;
  publicClient: Pick<PublicClient, "readContract" | "waitForTransactionReceipt">;
  /**
   * Receipt waits per submitted transaction before it is reported as pending.
   * Defaults to 3.
   */
  receiptAttempts?: number;
  logger?: EscrowLogger;
}

/**
 * Creates a TokenLedger that writes through `walletClient` and waits for each
 * receipt. A write that never got submitted or a reverted receipt resolves to
 * `false`; a submitted write with no receipt throws `TransferPendingError`.
 *
 * @example
 * ```typescript
 * const walletClient = createWalletClient({ account, chain: baseSepolia, transport: http(rpcUrl) });
 * const publicClient = createPublicClient({ chain: baseSepolia, transport: http(rpcUrl) });
 * const tokenLedger = createErc20TokenLedger({ token: usdc, walletClient, publicClient });
 * ```
 */
export function createErc20TokenLedger(config: Erc20TokenLedgerConfig): TokenLedger {
  const { token, walletClient, publicClient } = config;
  const receiptAttempts = Math.max(1, config.receiptAttempts ?? 3);
  const logger = config.logger ?? console;

  const awaitReceipt = async (label: string, hash: Hash) => {
    for (let attempt = 1; attempt <= receiptAttempts; attempt++) {
      try {
        return await publicClient.waitForTransactionReceipt({ hash });
      } catch (error) {
        logger.warn(
          `[TokenLedger] ${label} receipt wait ${attempt}/${receiptAttempts} failed:`,
          errorSummary(error)
        );
      }
    }
    throw new TransferPendingError(hash, label);
  };

  const write = async (label: string, send: () => Promise<Hash>) => {
    let hash: Hash;
    try {
      hash = await send();
    } catch (error) {
      logger.error(`[TokenLedger] ${label} failed:`, errorSummary(error));
      return false;
    }

    const receipt = await awaitReceipt(label, hash);
    if (receipt.status !== "success") {
      logger.warn(`[TokenLedger] ${label} reverted in ${hash}`);
      return false;
    }
    return true;
  };

  return {
    transferFrom: (from, to, amount) =>
      write(`transferFrom(${from}, ${to}, ${amount})`, () =>
        walletClient.writeContract({
          address: token,
          abi: erc20LedgerAbi,
          functionName: "transferFrom",
          args: [from, to, amount],
        })
      ),

    transfer: (to, amount) =>
      write(`transfer(${to}, ${amount})`, () =>
        walletClient.writeContract({
          address: token,
          abi: erc20LedgerAbi,
          functionName: "transfer",
          args: [to, amount],
        })
      ),

    approve: (spender, amount) =>
      write(`approve(${spender}, ${amount})`, () =>
        walletClient.writeContract({
          address: token,
          abi: erc20LedgerAbi,
          functionName: "approve",
          args: [spender, amount],
        })
      ),

    balanceOf: (address) =>
      publicClient.readContract({
        address: token,
        abi: erc20LedgerAbi,
        functionName: "balanceOf",
        args: [address],
      }),
  };
}
