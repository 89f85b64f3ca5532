import express, { type Express } from "express";
import type { Server } from "http";
import type { DispatchMode } from "../config";
import type { InboundDeps } from "../relay/listen/inbound";
import type { Dispatcher } from "../relay/watchers/dispatcher";
import { createRunOffersRouter } from "./routes/runOffers";
import { createTelegramWebhookRouter } from "./routes/telegramWebhook";

export interface ApiDeps {
    inbound: InboundDeps;
    webhookSecret: string;
    dispatcher: Dispatcher;
    dispatchMode: DispatchMode;
}

/**
 * Build the Express app. Kept separate from `listen` so tests can drive it in-process.
 */
export function createApp(deps: ApiDeps): Express {
    const app = express();

    // ── Health check ───────────────────────────────────────────────────────
    app.get("/health", (_req, res) => {
        res.json({ status: "ok" });
    });

    // ── Telegram webhook (secret in the path) ──────────────────────────────
    app.use("/telegram/webhook", createTelegramWebhookRouter({ ...deps.inbound, secret: deps.webhookSecret }));

    // ── Dispatch trigger ───────────────────────────────────────────────────
    app.use("/run-offers", createRunOffersRouter(deps.dispatcher, deps.dispatchMode));

    // ── 404 handler ────────────────────────────────────────────────────────
    app.use((_req, res) => {
        res.status(404).json({ error: "Not found" });
    });

    return app;
}

export function startApiServer(app: Express, port: number): Server {
    const host = "0.0.0.0";
    return app.listen(port, host, () => {
        console.log(`🌐 HTTP API listening on ${host}:${port}`);
    });
}
