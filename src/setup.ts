import { createPublicClient, createWalletClient, http } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import {
  createEscrowModule,
  createTimeoutSweeper,
  createTimestampHeightSource,
  formatEvent,
  InMemoryTokenLedger,
  type HeightSource,
  type TimeoutSweeper,
  type TokenLedger,
} from "@escrow-channels/core";
import {
  createBlockHeightSource,
  createErc20TokenLedger,
} from "@escrow-channels/core/escrow/evm";

import {
  CHAIN,
  NETWORK,
  RELAYER_PRIVATE_KEY,
  RPC_URL,
  SWEEP_INTERVAL_MS,
  SWEEP_SENDERS,
  TOKEN_ADDRESS,
  USE_ERC20,
} from "./config.js";

// ============================================================================
// Accounts
// ============================================================================

/** Custody account of the escrow and the relayer that earns delegated fees. */
export const relayerAccount = privateKeyToAccount(RELAYER_PRIVATE_KEY);

// ============================================================================
// Collaborators
// ============================================================================

function createCollaborators(): {
  tokenLedger: TokenLedger;
  heightSource: HeightSource;
} {
  if (USE_ERC20 && RPC_URL && TOKEN_ADDRESS) {
    const transport = http(RPC_URL);
    const publicClient = createPublicClient({ chain: CHAIN, transport });
    const walletClient = createWalletClient({
      account: relayerAccount,
      chain: CHAIN,
      transport,
    });

    console.log(`[Setup] ERC-20 mode: token ${TOKEN_ADDRESS} on ${NETWORK}`);
    return {
      tokenLedger: createErc20TokenLedger({
        token: TOKEN_ADDRESS,
        walletClient,
        publicClient,
      }),
      heightSource: createBlockHeightSource(publicClient),
    };
  }

  console.log("[Setup] In-memory mode: token ledger and balances reset on restart");
  return {
    tokenLedger: new InMemoryTokenLedger(relayerAccount.address),
    heightSource: createTimestampHeightSource(),
  };
}

// ============================================================================
// Escrow
// ============================================================================

const { tokenLedger, heightSource } = createCollaborators();

export const escrow = createEscrowModule({
  escrowAddress: relayerAccount.address,
  tokenLedger,
  heightSource,
  hooks: {
    onEvent: (event) => console.log(`[Escrow] ${event.type}`, formatEvent(event)),
    onFailure: (operation, failure) =>
      console.warn(`[Escrow] ${operation} failed: ${failure.error} (${failure.message})`),
  },
});

export const sweeper: TimeoutSweeper | undefined =
  SWEEP_SENDERS.length > 0
    ? createTimeoutSweeper({
        escrow,
        senders: SWEEP_SENDERS,
        intervalMs: SWEEP_INTERVAL_MS,
      })
    : undefined;
