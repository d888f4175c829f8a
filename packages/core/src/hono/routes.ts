/**
 * Escrow HTTP Routes
 *
 * Read-only views of escrow state plus the relay endpoints through which a
 * relayer submits pre-signed delegated operations.
 *
 * @example
 * ```typescript
 * import { Hono } from "hono";
 * import { createEscrowRoutes } from "@escrow-channels/core/hono";
 *
 * const app = new Hono();
 * app.route("/escrow", createEscrowRoutes({ escrow, relayer: relayerAccount.address }));
 * ```
 */

import { Hono, type Context } from "hono";
import { getAddress, isAddress, isHex, type Address, type Hex } from "viem";

import {
  ESCROW_ERROR_MESSAGES,
  ESCROW_ERROR_STATUS,
  EscrowError,
  type EscrowErrorCode,
  type EscrowFailure,
} from "../escrow/errors.js";
import { formatChannel } from "../escrow/format.js";
import type { DepositByThirdPartyParams, OpenChannelByThirdPartyParams } from "../escrow/delegated.js";
import type { EscrowModule } from "../escrow/module.js";

export interface EscrowRoutesConfig {
  escrow: EscrowModule;
  /** Account credited with relay fees and recorded as the caller. */
  relayer: Address;
}

// ============================================================================
// Body parsing
// ============================================================================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(detail: string): EscrowError {
  return new EscrowError("invalid_argument", detail);
}

function readUint(body: JsonRecord, field: string): bigint {
  const value = body[field];
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  throw invalid(`${field} must be a non-negative integer`);
}

function readAddress(body: JsonRecord, field: string): Address {
  const value = body[field];
  if (typeof value === "string" && isAddress(value, { strict: false })) return value;
  throw invalid(`${field} must be an address`);
}

function readHex(body: JsonRecord, field: string): Hex {
  const value = body[field];
  if (typeof value === "string" && isHex(value, { strict: true })) return value;
  throw invalid(`${field} must be 0x-prefixed hex`);
}

export function parseOpenChannelRequest(body: unknown): OpenChannelByThirdPartyParams {
  if (!isRecord(body)) throw invalid("body must be a JSON object");
  return {
    signer: readAddress(body, "signer"),
    recipient: readAddress(body, "recipient"),
    groupId: readHex(body, "groupId"),
    value: readUint(body, "value"),
    expiration: readUint(body, "expiration"),
    fee: readUint(body, "fee"),
    messageNonce: readUint(body, "messageNonce"),
    signature: readHex(body, "signature"),
  };
}

export function parseDepositRequest(body: unknown): DepositByThirdPartyParams {
  if (!isRecord(body)) throw invalid("body must be a JSON object");
  return {
    signer: readAddress(body, "signer"),
    value: readUint(body, "value"),
    fee: readUint(body, "fee"),
    messageNonce: readUint(body, "messageNonce"),
    signature: readHex(body, "signature"),
  };
}

// ============================================================================
// Responses
// ============================================================================

function fail(c: Context, code: EscrowErrorCode, message?: string) {
  return c.json(
    { error: code, message: message ?? ESCROW_ERROR_MESSAGES[code] },
    ESCROW_ERROR_STATUS[code]
  );
}

function failWith(c: Context, failure: EscrowFailure) {
  return fail(c, failure.error, failure.message);
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw invalid("body is not valid JSON");
  }
}

// ============================================================================
// Routes
// ============================================================================

export function createEscrowRoutes(config: EscrowRoutesConfig): Hono {
  const { escrow, relayer } = config;
  const app = new Hono();

  app.onError((error, c) => {
    if (error instanceof EscrowError) return fail(c, error.code, error.message);
    console.error("[Routes] Unhandled error:", error);
    return c.json({ error: "internal_error", message: "Internal server error" }, 500);
  });

  app.get("/channels/:id", (c) => {
    const id = c.req.param("id");
    if (!/^\d+$/.test(id)) return fail(c, "invalid_argument", "channel id must be an integer");

    const channelId = BigInt(id);
    const channel = escrow.getChannel(channelId);
    if (!channel) return fail(c, "channel_not_found");

    return c.json(formatChannel(channelId, channel));
  });

  app.get("/balances/:address", (c) => {
    const address = c.req.param("address");
    if (!isAddress(address, { strict: false })) {
      return fail(c, "invalid_argument", "address is malformed");
    }
    return c.json({
      address: getAddress(address),
      balance: escrow.getBalance(address).toString(),
    });
  });

  app.get("/messages/:digest", (c) => {
    const digest = c.req.param("digest");
    if (!isHex(digest, { strict: true })) {
      return fail(c, "invalid_argument", "digest must be 0x-prefixed hex");
    }
    return c.json({ digest, used: escrow.isMessageUsed(digest) });
  });

  app.get("/next-channel-id", (c) =>
    c.json({ nextChannelId: escrow.nextChannelId().toString() })
  );

  app.post("/relay/open-channel", async (c) => {
    const params = parseOpenChannelRequest(await readJson(c));
    console.log(
      `[Relay] openChannelByThirdParty signer=${params.signer} value=${params.value} fee=${params.fee}`
    );

    const result = await escrow.openChannelByThirdParty(relayer, params);
    if (!result.success) {
      console.warn(`[Relay] openChannelByThirdParty rejected: ${result.error}`);
      return failWith(c, result);
    }

    return c.json({ channelId: result.channelId.toString(), digest: result.digest });
  });

  app.post("/relay/deposit", async (c) => {
    const params = parseDepositRequest(await readJson(c));
    console.log(
      `[Relay] depositByThirdParty signer=${params.signer} value=${params.value} fee=${params.fee}`
    );

    const result = await escrow.depositByThirdParty(relayer, params);
    if (!result.success) {
      console.warn(`[Relay] depositByThirdParty rejected: ${result.error}`);
      return failWith(c, result);
    }

    if (result.unconfirmed) {
      console.warn(`[Relay] depositByThirdParty unconfirmed: ${result.unconfirmed.join(", ")}`);
    }
    return c.json({
      digest: result.digest,
      ...(result.unconfirmed && { unconfirmed: result.unconfirmed }),
    });
  });

  return app;
}
