import { expect, vi } from "vitest";
import { keccak256, stringToHex, type Address } from "viem";
import { privateKeyToAccount } from "viem/accounts";

import type { OpenChannelParams } from "../src/escrow/channels.js";
import { ManualHeightSource } from "../src/escrow/height.js";
import { createEscrowModule, type EscrowModuleConfig } from "../src/escrow/module.js";
import { InMemoryTokenLedger } from "../src/escrow/tokenLedger.js";
import type { PaymentChannel } from "../src/escrow/types.js";

// Placeholder keys for tests only.
export const custody = privateKeyToAccount(
  "0x9999999999999999999999999999999999999999999999999999999999999999"
);
export const alice = privateKeyToAccount(
  "0x1111111111111111111111111111111111111111111111111111111111111111"
);
export const bob = privateKeyToAccount(
  "0x2222222222222222222222222222222222222222222222222222222222222222"
);
export const carol = privateKeyToAccount(
  "0x3333333333333333333333333333333333333333333333333333333333333333"
);
export const relayer = privateKeyToAccount(
  "0x4444444444444444444444444444444444444444444444444444444444444444"
);

export const GROUP_ID = keccak256(stringToHex("test-group"));

export const createLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const createChannel = (
  overrides: Partial<PaymentChannel> = {}
): PaymentChannel => ({
  nonce: 0n,
  sender: alice.address,
  signer: alice.address,
  recipient: bob.address,
  groupId: GROUP_ID,
  value: 100n,
  expiration: 1000n,
  ...overrides,
});

type TestEscrowOverrides = Pick<EscrowModuleConfig, "store" | "verifier" | "hooks">;

/**
 * Escrow over an in-memory token ledger whose custodian is `custody`, with a
 * manual height starting at 0.
 */
export function createTestEscrow(overrides: TestEscrowOverrides = {}) {
  const tokenLedger = new InMemoryTokenLedger(custody.address);
  const heightSource = new ManualHeightSource();
  const logger = createLogger();
  const escrow = createEscrowModule({
    escrowAddress: custody.address,
    tokenLedger,
    heightSource,
    logger,
    ...overrides,
  });

  /** Give `address` tokens, an allowance for them, and nothing else. */
  const mintAndApprove = (address: Address, amount: bigint) => {
    tokenLedger.mint(address, amount);
    tokenLedger.approveFrom(address, custody.address, amount);
  };

  /** Put `amount` into `address`'s escrow balance. */
  const fund = async (address: Address, amount: bigint) => {
    mintAndApprove(address, amount);
    const result = await escrow.deposit(address, amount);
    expect(result.success).toBe(true);
  };

  /** Fund `sender` with exactly `value` and open a channel with it. */
  const openFunded = async (
    sender: Address,
    params: Partial<OpenChannelParams> = {}
  ): Promise<bigint> => {
    const full: OpenChannelParams = {
      signer: sender,
      recipient: bob.address,
      groupId: GROUP_ID,
      value: 100n,
      expiration: 1000n,
      ...params,
    };
    await fund(sender, full.value);
    const result = await escrow.openChannel(sender, full);
    if (!result.success) throw new Error(result.message);
    return result.channelId;
  };

  return { escrow, tokenLedger, heightSource, logger, mintAndApprove, fund, openFunded };
}
