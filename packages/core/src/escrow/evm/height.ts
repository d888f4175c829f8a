import type { PublicClient } from "viem";

import type { HeightSource } from "../height.js";

/**
 * Current block number as height.
 */
export function createBlockHeightSource(
  publicClient: Pick<PublicClient, "getBlockNumber">
): HeightSource {
  return {
    currentHeight: () => publicClient.getBlockNumber(),
  };
}
