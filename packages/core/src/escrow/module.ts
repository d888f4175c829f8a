/**
 * Escrow Module Factory
 *
 * Creates an escrow with an injectable state store, Token Ledger and height
 * source. Every operation runs alone (one global queue) against a staged copy
 * of the state and commits only if it succeeds; events are delivered after the
 * commit.
 *
 * @example
 * ```typescript
 * import { createEscrowModule, InMemoryTokenLedger, ManualHeightSource } from "@escrow-channels/core";
 *
 * const tokenLedger = new InMemoryTokenLedger(escrowAddress);
 * const escrow = createEscrowModule({
 *   escrowAddress,
 *   tokenLedger,
 *   heightSource: new ManualHeightSource(),
 *   hooks: { onEvent: (event) => indexer.push(event) },
 * });
 *
 * await escrow.deposit(alice, 100n);
 * const opened = await escrow.openChannel(alice, { signer: alice, recipient: bob, groupId, value: 100n, expiration: 1000n });
 * ```
 */

import { getAddress, type Address, type Hex } from "viem";

import * as balances from "./balances.js";
import * as channels from "./channels.js";
import * as claims from "./claims.js";
import type { OperationContext } from "./context.js";
import * as delegated from "./delegated.js";
import {
  EscrowError,
  errorSummary,
  type EscrowFailure,
  type EscrowResult,
} from "./errors.js";
import type { HeightSource } from "./height.js";
import { SerialQueue } from "./queue.js";
import { InMemoryEscrowStateStore, type EscrowStateStore } from "./store.js";
import type { TokenLedger } from "./tokenLedger.js";
import { StagedEscrowState } from "./transaction.js";
import type {
  EscrowEvent,
  EscrowEventListener,
  EscrowLogger,
  PaymentChannel,
} from "./types.js";
import { verifyAuthorization, type AuthorizationVerifier } from "./verification.js";

export interface EscrowHooks {
  /** Called for every committed event, in emission order. */
  onEvent?: EscrowEventListener;
  /** Called when an operation is rejected. */
  onFailure?: (operation: string, failure: EscrowFailure) => void;
}

export interface EscrowModuleConfig {
  /** This escrow's identity and custody account; part of every signed message. */
  escrowAddress: Address;

  tokenLedger: TokenLedger;

  heightSource: HeightSource;

  /**
   * State store implementation.
   * Defaults to InMemoryEscrowStateStore if not provided.
   */
  store?: EscrowStateStore;

  /** Signature check. Defaults to EIP-191 recovery. */
  verifier?: AuthorizationVerifier;

  hooks?: EscrowHooks;

  /** Defaults to console. */
  logger?: EscrowLogger;
}

export interface EscrowModule {
  readonly escrowAddress: Address;

  // Queries ----------------------------------------------------------------
  getChannel(channelId: bigint): PaymentChannel | undefined;
  getBalance(address: Address): bigint;
  isMessageUsed(digest: Hex): boolean;
  nextChannelId(): bigint;
  channels(): Array<[bigint, PaymentChannel]>;
  currentHeight(): Promise<bigint>;

  // Balance ledger ---------------------------------------------------------
  deposit(depositor: Address, amount: bigint): Promise<EscrowResult>;
  depositOnBehalf(depositor: Address, amount: bigint): Promise<EscrowResult>;
  withdraw(caller: Address, amount: bigint): Promise<EscrowResult>;
  transfer(caller: Address, to: Address, amount: bigint): Promise<EscrowResult>;

  // Channel lifecycle ------------------------------------------------------
  openChannel(
    caller: Address,
    params: channels.OpenChannelParams
  ): Promise<EscrowResult<{ channelId: bigint }>>;
  depositAndOpenChannel(
    caller: Address,
    params: channels.OpenChannelParams
  ): Promise<EscrowResult<{ channelId: bigint }>>;
  channelExtend(
    caller: Address,
    channelId: bigint,
    newExpiration: bigint
  ): Promise<EscrowResult>;
  channelAddFunds(
    caller: Address,
    channelId: bigint,
    amount: bigint
  ): Promise<EscrowResult>;
  channelExtendAndAddFunds(
    caller: Address,
    channelId: bigint,
    newExpiration: bigint,
    amount: bigint
  ): Promise<EscrowResult>;
  channelClaimTimeout(
    caller: Address,
    channelId: bigint
  ): Promise<EscrowResult<{ claimAmount: bigint }>>;

  // Claims -----------------------------------------------------------------
  channelClaim(
    caller: Address,
    params: claims.ChannelClaimParams
  ): Promise<EscrowResult<{ claim: claims.ClaimOutcome }>>;
  multiChannelClaim(
    caller: Address,
    params: claims.MultiChannelClaimParams
  ): Promise<EscrowResult<{ claims: claims.ClaimOutcome[] }>>;

  // Delegated --------------------------------------------------------------
  openChannelByThirdParty(
    relayer: Address,
    params: delegated.OpenChannelByThirdPartyParams
  ): Promise<EscrowResult<{ channelId: bigint; digest: Hex }>>;
  depositByThirdParty(
    relayer: Address,
    params: delegated.DepositByThirdPartyParams
  ): Promise<EscrowResult<{ digest: Hex }>>;

  /** Register an event listener; returns its unsubscribe function. */
  subscribe(listener: EscrowEventListener): () => void;
}

/**
 * Creates an escrow module with injectable dependencies.
 */
export function createEscrowModule(config: EscrowModuleConfig): EscrowModule {
  const escrowAddress = getAddress(config.escrowAddress);
  const store = config.store ?? new InMemoryEscrowStateStore();
  const verify = config.verifier ?? verifyAuthorization;
  const logger = config.logger ?? console;
  const queue = new SerialQueue();
  const listeners = new Set<EscrowEventListener>();
  if (config.hooks?.onEvent) listeners.add(config.hooks.onEvent);

  const deliver = (event: EscrowEvent) => {
    for (const listener of listeners) {
      try {
        const pending = listener(event);
        if (pending instanceof Promise) {
          pending.catch((error: unknown) =>
            logger.error(`[Escrow] ${event.type} listener rejected:`, errorSummary(error))
          );
        }
      } catch (error) {
        logger.error(`[Escrow] ${event.type} listener threw:`, errorSummary(error));
      }
    }
  };

  const reportFailure = (operation: string, failure: EscrowFailure) => {
    try {
      config.hooks?.onFailure?.(operation, failure);
    } catch (error) {
      logger.error(`[Escrow] ${operation} onFailure hook threw:`, errorSummary(error));
    }
  };

  const execute = <T extends object>(
    operation: string,
    body: (ctx: OperationContext) => T | Promise<T>
  ): Promise<EscrowResult<T>> =>
    queue.run(async (): Promise<EscrowResult<T>> => {
      const staged = new StagedEscrowState(store);
      const events: EscrowEvent[] = [];
      const unconfirmed: Hex[] = [];
      const ctx: OperationContext = {
        state: staged,
        escrow: escrowAddress,
        tokenLedger: config.tokenLedger,
        heightSource: config.heightSource,
        verify,
        logger,
        emit: (event) => events.push(event),
        unconfirmed: (hash) => unconfirmed.push(hash),
      };

      let output: T;
      try {
        output = await body(ctx);
      } catch (error) {
        if (!(error instanceof EscrowError)) throw error;
        const failure: EscrowFailure = {
          success: false,
          error: error.code,
          message: error.message,
        };
        reportFailure(operation, failure);
        return failure;
      }

      staged.commit();
      for (const event of events) deliver(event);
      return unconfirmed.length > 0
        ? { success: true, unconfirmed, ...output }
        : { success: true, ...output };
    });

  const copy = (channel: PaymentChannel | undefined) =>
    channel ? { ...channel } : undefined;

  return {
    escrowAddress,

    getChannel: (channelId) => copy(store.getChannel(channelId)),
    getBalance: (address) => store.getBalance(getAddress(address)),
    isMessageUsed: (digest) => store.isMessageUsed(digest),
    nextChannelId: () => store.getNextChannelId(),
    channels: () =>
      Array.from(store.channels(), ([id, channel]): [bigint, PaymentChannel] => [
        id,
        { ...channel },
      ]),
    currentHeight: () => config.heightSource.currentHeight(),

    deposit: (depositor, amount) =>
      execute("deposit", async (ctx) => {
        await balances.deposit(ctx, depositor, amount);
        return {};
      }),
    depositOnBehalf: (depositor, amount) =>
      execute("depositOnBehalf", async (ctx) => {
        await balances.depositOnBehalf(ctx, depositor, amount);
        return {};
      }),
    withdraw: (caller, amount) =>
      execute("withdraw", async (ctx) => {
        await balances.withdraw(ctx, caller, amount);
        return {};
      }),
    transfer: (caller, to, amount) =>
      execute("transfer", (ctx) => {
        balances.transfer(ctx, caller, to, amount);
        return {};
      }),

    openChannel: (caller, params) =>
      execute("openChannel", (ctx) => ({
        channelId: channels.openChannel(ctx, caller, params),
      })),
    depositAndOpenChannel: (caller, params) =>
      execute("depositAndOpenChannel", async (ctx) => ({
        channelId: await channels.depositAndOpenChannel(ctx, caller, params),
      })),
    channelExtend: (caller, channelId, newExpiration) =>
      execute("channelExtend", (ctx) => {
        channels.channelExtend(ctx, caller, channelId, newExpiration);
        return {};
      }),
    channelAddFunds: (caller, channelId, amount) =>
      execute("channelAddFunds", (ctx) => {
        channels.channelAddFunds(ctx, caller, channelId, amount);
        return {};
      }),
    channelExtendAndAddFunds: (caller, channelId, newExpiration, amount) =>
      execute("channelExtendAndAddFunds", (ctx) => {
        channels.channelExtendAndAddFunds(ctx, caller, channelId, newExpiration, amount);
        return {};
      }),
    channelClaimTimeout: (caller, channelId) =>
      execute("channelClaimTimeout", async (ctx) => ({
        claimAmount: await channels.channelClaimTimeout(ctx, caller, channelId),
      })),

    channelClaim: (caller, params) =>
      execute("channelClaim", async (ctx) => ({
        claim: await claims.channelClaim(ctx, caller, params),
      })),
    multiChannelClaim: (caller, params) =>
      execute("multiChannelClaim", async (ctx) => ({
        claims: await claims.multiChannelClaim(ctx, caller, params),
      })),

    openChannelByThirdParty: (relayer, params) =>
      execute("openChannelByThirdParty", (ctx) =>
        delegated.openChannelByThirdParty(ctx, relayer, params)
      ),
    depositByThirdParty: (relayer, params) =>
      execute("depositByThirdParty", (ctx) =>
        delegated.depositByThirdParty(ctx, relayer, params)
      ),

    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
