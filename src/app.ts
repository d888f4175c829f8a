import { Hono } from "hono";
import { logger } from "hono/logger";
import { createEscrowRoutes } from "@escrow-channels/core/hono";

import { escrow, relayerAccount } from "./setup.js";

export const app = new Hono();

app.use(logger());

app.get("/health", (c) =>
  c.json({
    status: "ok",
    escrow: escrow.escrowAddress,
    nextChannelId: escrow.nextChannelId().toString(),
  })
);

app.route("/", createEscrowRoutes({ escrow, relayer: relayerAccount.address }));
