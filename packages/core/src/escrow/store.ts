import type { Address, Hex } from "viem";
import type { PaymentChannel } from "./types.js";

/**
 * Backing storage for the escrow: channels keyed by a dense id, balances by
 * address, and the set of consumed authorization digests.
 *
 * Implementations only persist; every precondition lives in the module.
 */
export interface EscrowStateStore {
  getChannel(channelId: bigint): PaymentChannel | undefined;
  setChannel(channelId: bigint, channel: PaymentChannel): void;
  channels(): IterableIterator<[bigint, PaymentChannel]>;

  /** Id the next opened channel will receive. */
  getNextChannelId(): bigint;
  setNextChannelId(next: bigint): void;

  /** Unknown addresses read as zero. */
  getBalance(address: Address): bigint;
  setBalance(address: Address, amount: bigint): void;

  isMessageUsed(digest: Hex): boolean;
  markMessageUsed(digest: Hex): void;
}

export class InMemoryEscrowStateStore implements EscrowStateStore {
  private readonly channelMap = new Map<bigint, PaymentChannel>();
  private readonly balanceMap = new Map<Address, bigint>();
  private readonly usedMessages = new Set<string>();
  private nextChannelId = 0n;

  getChannel(channelId: bigint): PaymentChannel | undefined {
    return this.channelMap.get(channelId);
  }

  setChannel(channelId: bigint, channel: PaymentChannel): void {
    this.channelMap.set(channelId, channel);
  }

  channels(): IterableIterator<[bigint, PaymentChannel]> {
    return this.channelMap.entries();
  }

  getNextChannelId(): bigint {
    return this.nextChannelId;
  }

  setNextChannelId(next: bigint): void {
    this.nextChannelId = next;
  }

  getBalance(address: Address): bigint {
    return this.balanceMap.get(address) ?? 0n;
  }

  setBalance(address: Address, amount: bigint): void {
    this.balanceMap.set(address, amount);
  }

  isMessageUsed(digest: Hex): boolean {
    return this.usedMessages.has(digest.toLowerCase());
  }

  markMessageUsed(digest: Hex): void {
    this.usedMessages.add(digest.toLowerCase());
  }
}
