import { getAddress, type Address } from "viem";

import { errorSummary } from "./errors.js";
import type { EscrowModule } from "./module.js";
import type { EscrowLogger } from "./types.js";

export interface TimeoutSweeperConfig {
  escrow: EscrowModule;
  /** Senders whose expired channels are reclaimed automatically. */
  senders: Address[];
  intervalMs?: number;
  logger?: EscrowLogger;
}

export interface TimeoutSweeper {
  /** Reclaim every expired, funded channel of the configured senders. */
  sweep(): Promise<bigint[]>;
  start(): void;
  stop(): void;
}

export function createTimeoutSweeper(config: TimeoutSweeperConfig): TimeoutSweeper {
  const intervalMs = config.intervalMs ?? 30 * 1000;
  const logger = config.logger ?? console;
  const senders = new Set(config.senders.map((sender) => getAddress(sender)));

  let interval: NodeJS.Timeout | undefined;
  let sweeping = false;

  const sweep = async (): Promise<bigint[]> => {
    if (sweeping) return [];
    sweeping = true;

    const reclaimed: bigint[] = [];
    try {
      const height = await config.escrow.currentHeight();

      for (const [id, channel] of config.escrow.channels()) {
        if (!senders.has(channel.sender)) continue;
        if (channel.value === 0n || channel.expiration > height) continue;

        const result = await config.escrow.channelClaimTimeout(channel.sender, id);
        if (result.success) {
          reclaimed.push(id);
          logger.info(
            `[Sweeper] Reclaimed ${result.claimAmount} from channel ${id} for ${channel.sender}`
          );
        } else {
          logger.warn(`[Sweeper] Channel ${id} not reclaimed: ${result.error}`);
        }
      }
    } finally {
      sweeping = false;
    }

    return reclaimed;
  };

  return {
    sweep,
    start() {
      if (interval) return;
      interval = setInterval(() => {
        sweep().catch((error: unknown) =>
          logger.error("[Sweeper] Sweep failed:", errorSummary(error))
        );
      }, intervalMs);
    },
    stop() {
      if (interval) clearInterval(interval);
      interval = undefined;
    },
  };
}
