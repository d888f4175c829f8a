#!/usr/bin/env node
/**
 * Escrow Relayer Server
 *
 * Run with: npm start
 *
 * Environment variables:
 * - PORT: Server port (default: 8090)
 * - RELAYER_PRIVATE_KEY: Custody and relayer key (required)
 * - RPC_URL, TOKEN_ADDRESS: Enable on-chain ERC-20 mode
 * - NETWORK: viem chain name (default: base-sepolia)
 * - SWEEP_SENDERS, SWEEP_INTERVAL_MS: Automatic timeout reclaims
 */

import { serve } from "@hono/node-server";

import { app } from "./app.js";
import { PORT } from "./config.js";
import { escrow, sweeper } from "./setup.js";

const server = serve({ fetch: app.fetch, port: PORT }, (info) => {
  console.log(`Escrow relayer listening on http://localhost:${info.port}`);
  console.log(`Escrow address: ${escrow.escrowAddress}`);
});

sweeper?.start();

const shutdown = () => {
  sweeper?.stop();
  server.close();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
