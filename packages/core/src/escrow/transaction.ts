/**
 * Staged Escrow State
 *
 * Write-buffering overlay over an EscrowStateStore. Operations read and write
 * through the overlay; nothing reaches the base store until `commit()`.
 * Dropping the overlay discards every staged change.
 */

import type { Address, Hex } from "viem";
import type { EscrowStateStore } from "./store.js";
import type { PaymentChannel } from "./types.js";

export class StagedEscrowState implements EscrowStateStore {
  private readonly stagedChannels = new Map<bigint, PaymentChannel>();
  private readonly stagedBalances = new Map<Address, bigint>();
  private readonly stagedMessages = new Map<string, Hex>();
  private stagedNextChannelId: bigint | undefined;
  private committed = false;

  constructor(private readonly base: EscrowStateStore) {}

  getChannel(channelId: bigint): PaymentChannel | undefined {
    const channel =
      this.stagedChannels.get(channelId) ?? this.base.getChannel(channelId);
    return channel ? { ...channel } : undefined;
  }

  setChannel(channelId: bigint, channel: PaymentChannel): void {
    this.stagedChannels.set(channelId, { ...channel });
  }

  *channels(): IterableIterator<[bigint, PaymentChannel]> {
    for (const [id, channel] of this.base.channels()) {
      yield [id, { ...(this.stagedChannels.get(id) ?? channel) }];
    }
    for (const [id, channel] of this.stagedChannels) {
      if (!this.base.getChannel(id)) yield [id, { ...channel }];
    }
  }

  getNextChannelId(): bigint {
    return this.stagedNextChannelId ?? this.base.getNextChannelId();
  }

  setNextChannelId(next: bigint): void {
    this.stagedNextChannelId = next;
  }

  getBalance(address: Address): bigint {
    return this.stagedBalances.get(address) ?? this.base.getBalance(address);
  }

  setBalance(address: Address, amount: bigint): void {
    this.stagedBalances.set(address, amount);
  }

  isMessageUsed(digest: Hex): boolean {
    return (
      this.stagedMessages.has(digest.toLowerCase()) ||
      this.base.isMessageUsed(digest)
    );
  }

  markMessageUsed(digest: Hex): void {
    this.stagedMessages.set(digest.toLowerCase(), digest);
  }

  /**
   * Apply all staged writes to the base store. A staged state commits once.
   */
  commit(): void {
    if (this.committed) {
      throw new Error("Staged escrow state already committed");
    }
    this.committed = true;

    for (const [id, channel] of this.stagedChannels) {
      this.base.setChannel(id, channel);
    }
    for (const [address, amount] of this.stagedBalances) {
      this.base.setBalance(address, amount);
    }
    for (const digest of this.stagedMessages.values()) {
      this.base.markMessageUsed(digest);
    }
    if (this.stagedNextChannelId !== undefined) {
      this.base.setNextChannelId(this.stagedNextChannelId);
    }
  }
}
