/**
 * @escrow-channels/core/hono - Hono routes for the escrow
 *
 * Exposes escrow state and the relay endpoints for delegated operations as a
 * mountable Hono app.
 *
 * @example
 * ```typescript
 * import { Hono } from "hono";
 * import { createEscrowRoutes } from "@escrow-channels/core/hono";
 *
 * const app = new Hono();
 * app.route("/", createEscrowRoutes({ escrow, relayer }));
 *
 * // GET  /channels/0
 * // POST /relay/open-channel
 * ```
 */

export {
  createEscrowRoutes,
  parseOpenChannelRequest,
  parseDepositRequest,
  type EscrowRoutesConfig,
} from "./routes.js";
