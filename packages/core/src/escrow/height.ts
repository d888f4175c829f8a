/**
 * Height Sources
 *
 * Channel expirations are compared against a monotonic counter supplied by the
 * host: a block number on-chain, or wall-clock seconds in development.
 */

export interface HeightSource {
  currentHeight(): Promise<bigint>;
}

/**
 * Height advanced by hand. Used in tests and simulations.
 */
export class ManualHeightSource implements HeightSource {
  private height: bigint;

  constructor(initial = 0n) {
    this.height = initial;
  }

  async currentHeight(): Promise<bigint> {
    return this.height;
  }

  set(height: bigint): void {
    this.height = height;
  }

  advance(by = 1n): bigint {
    this.height += by;
    return this.height;
  }
}

/**
 * Unix seconds as height.
 */
export function createTimestampHeightSource(
  now: () => number = Date.now
): HeightSource {
  return {
    currentHeight: async () => BigInt(Math.floor(now() / 1000)),
  };
}
