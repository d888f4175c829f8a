import dotenv from "dotenv";
import { getAddress, isAddress, isHex, size, type Address, type Hex } from "viem";
import { base, baseSepolia, mainnet, sepolia, type Chain } from "viem/chains";

dotenv.config();

function fail(message: string): never {
  console.error(`❌ ${message}`);
  process.exit(1);
}

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    fail(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readAddress(name: string, raw: string): Address {
  if (!isAddress(raw, { strict: false })) fail(`${name} contains an invalid address: "${raw}"`);
  return getAddress(raw);
}

const CHAINS: Record<string, Chain> = {
  base,
  "base-sepolia": baseSepolia,
  mainnet,
  sepolia,
};

export const PORT = readInt("PORT", 8090);

const relayerKey = process.env.RELAYER_PRIVATE_KEY;
if (!relayerKey) {
  fail("RELAYER_PRIVATE_KEY environment variable is required");
}
if (!isHex(relayerKey, { strict: true }) || size(relayerKey) !== 32) {
  fail("RELAYER_PRIVATE_KEY must be a 32-byte 0x-prefixed hex key");
}
export const RELAYER_PRIVATE_KEY: Hex = relayerKey;

const networkName = process.env.NETWORK || "base-sepolia";
const chain = CHAINS[networkName];
if (!chain) {
  fail(`NETWORK must be one of ${Object.keys(CHAINS).join(", ")}, got "${networkName}"`);
}
export const NETWORK = networkName;
export const CHAIN: Chain = chain;

export const RPC_URL = process.env.RPC_URL || undefined;

export const TOKEN_ADDRESS = process.env.TOKEN_ADDRESS
  ? readAddress("TOKEN_ADDRESS", process.env.TOKEN_ADDRESS)
  : undefined;

/** On-chain mode needs both an RPC endpoint and a token contract. */
export const USE_ERC20 = Boolean(RPC_URL && TOKEN_ADDRESS);

export const SWEEP_SENDERS: Address[] = (process.env.SWEEP_SENDERS ?? "")
  .split(",")
  .map((entry) => entry.trim())
  .filter((entry) => entry.length > 0)
  .map((entry) => readAddress("SWEEP_SENDERS", entry));

export const SWEEP_INTERVAL_MS = readInt("SWEEP_INTERVAL_MS", 30_000);
