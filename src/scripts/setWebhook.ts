/**
 * Telegram Webhook — One-Time Setup Script
 *
 * Points the bot at this service's webhook route after a deploy.
 *
 * Usage:
 *   PUBLIC_URL=https://relay.example.com npm run webhook:set
 *
 * Registers `${PUBLIC_URL}/telegram/webhook/${TELEGRAM_WEBHOOK_SECRET}` and
 * limits delivery to new and edited messages.
 */

import { Api } from "grammy";
import { ConfigError, loadConfig } from "../config";

function webhookUrl(publicUrl: string, secret: string): string {
    return `${publicUrl.replace(/\/+$/, "")}/telegram/webhook/${encodeURIComponent(secret)}`;
}

async function main(): Promise<void> {
    const config = loadConfig();
    const { botToken, webhookSecret } = config.telegram;
    const publicUrl = config.http.publicUrl;

    if (!botToken || !publicUrl) {
        console.error("❌ Set TELEGRAM_BOT_TOKEN and PUBLIC_URL before registering the webhook.");
        process.exit(1);
    }

    const api = new Api(botToken);
    const url = webhookUrl(publicUrl, webhookSecret);
    await api.setWebhook(url, { allowed_updates: ["message", "edited_message"] });

    const info = await api.getWebhookInfo();
    console.log(`✅ Webhook set: ${publicUrl}/telegram/webhook/<secret>`);
    console.log(`   Pending updates: ${info.pending_update_count}`);
    if (info.last_error_message) {
        console.warn(`   Last delivery error: ${info.last_error_message}`);
    }
}

main().catch((err) => {
    if (err instanceof ConfigError) {
        console.error("❌ Config validation failed:");
        err.issues.forEach((issue) => console.error(`  • ${issue}`));
    } else {
        console.error("💥 Webhook setup failed:", err);
    }
    process.exit(1);
});
