/**
 * Promo Link Relay — Main Entrypoint
 * Boots: Config validation → Stores → Telegram sender → Dispatcher → HTTP API → optional scheduler
 */

import { createApp, startApiServer } from "./api/server";
import { ConfigError, loadConfig, type AppConfig } from "./config";
import { LinkQueueStore } from "./db/linkQueue";
import { SentOfferStore } from "./db/sentOffers";
import { TelegramSender } from "./relay/connect/telegram";
import { MercadoLivreClient } from "./relay/wire/mercadoLivre";
import { startDispatchScheduler } from "./relay/watchers/dispatchScheduler";
import { Dispatcher } from "./relay/watchers/dispatcher";
import { OfferCollector } from "./relay/watchers/offerCollector";

function readConfig(): AppConfig {
    try {
        return loadConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error("❌ Config validation failed:");
            err.issues.forEach((issue) => console.error(`  • ${issue}`));
            process.exit(1);
        }
        throw err;
    }
}

async function main(): Promise<void> {
    console.log("🛒 Starting promo link relay...");
    const config = readConfig();

    if (!config.telegram.botToken) {
        console.warn("[config] TELEGRAM_BOT_TOKEN is not set, sends will fail until it is");
    }
    if (config.telegram.webhookSecret === "changeme") {
        console.warn("[config] TELEGRAM_WEBHOOK_SECRET still has its default value");
    }

    // ── 1. Stores ────────────────────────────────────────────────────────────
    const queue = new LinkQueueStore(config.storage.linksQueueFile);
    const sentOffers = new SentOfferStore(config.storage.sentIdsFile);

    // ── 2. Outbound clients ──────────────────────────────────────────────────
    const sender = TelegramSender.fromToken(config.telegram.botToken, config.http.timeoutMs);
    const marketplace = new MercadoLivreClient({
        siteId: config.search.siteId,
        limit: config.search.limit,
        timeoutMs: config.http.timeoutMs,
        accessToken: config.search.accessToken,
    });

    // ── 3. Dispatcher (shared by /run-offers and the scheduler) ─────────────
    const collector = new OfferCollector(marketplace, {
        keywords: config.search.keywords,
        minDiscountPercent: config.search.minDiscountPercent,
    });
    const dispatcher = new Dispatcher(
        { queue, sentOffers, collector, sender },
        {
            channelId: config.telegram.channelId,
            batchSize: config.dispatch.batchSize,
            delayMs: config.dispatch.delayMs,
            affiliate: config.affiliate,
        }
    );

    // ── 4. HTTP API ──────────────────────────────────────────────────────────
    const app = createApp({
        inbound: {
            queue,
            sender,
            affiliate: config.affiliate,
            allowedUserId: config.telegram.allowedUserId,
        },
        webhookSecret: config.telegram.webhookSecret,
        dispatcher,
        dispatchMode: config.dispatch.mode,
    });
    const server = startApiServer(app, config.http.port);

    // ── 5. Optional in-process trigger ───────────────────────────────────────
    const task = config.dispatch.cron
        ? startDispatchScheduler(dispatcher, config.dispatch.cron, config.dispatch.mode)
        : null;

    const shutdown = (signal: string) => {
        console.log(`[server] ${signal} received — shutting down`);
        task?.stop();
        server.close(() => process.exit(0));
    };
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
    console.error("💥 Fatal startup error:", err);
    process.exit(1);
});
