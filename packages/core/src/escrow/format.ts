import { channelStatus, type EscrowEvent, type PaymentChannel } from "./types.js";

/**
 * Format a channel for API responses.
 * Converts BigInt values to strings for JSON serialization.
 */
export function formatChannel(channelId: bigint, channel: PaymentChannel) {
  return {
    channelId: channelId.toString(),
    status: channelStatus(channel),
    nonce: channel.nonce.toString(),
    sender: channel.sender,
    signer: channel.signer,
    recipient: channel.recipient,
    groupId: channel.groupId,
    value: channel.value.toString(),
    expiration: channel.expiration.toString(),
  };
}

/**
 * Format an event for logs and indexers: every bigint field becomes a string.
 */
export function formatEvent(event: EscrowEvent): Record<string, string> {
  const formatted: Record<string, string> = {};
  for (const [key, value] of Object.entries(event)) {
    formatted[key] = typeof value === "bigint" ? value.toString() : String(value);
  }
  return formatted;
}
