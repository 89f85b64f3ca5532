import { Api, GrammyError } from "grammy";

/** Outbound side of the relay. Resolves false when Telegram rejects the message. */
export interface MessageSender {
    send(chatId: number | string, html: string): Promise<boolean>;
}

export class MissingBotTokenError extends Error {
    constructor() {
        super("TELEGRAM_BOT_TOKEN não definido");
        this.name = "MissingBotTokenError";
    }
}

/**
 * Sends HTML messages through the Bot API.
 *
 * An error response from Telegram (bad chat id, malformed HTML, flood limits)
 * is logged and reported as `false`. Network failures and timeouts are thrown
 * so the caller can abort its run.
 */
export class TelegramSender implements MessageSender {
    constructor(private readonly api: Api | null) {}

    static fromToken(botToken: string | undefined, timeoutMs: number): TelegramSender {
        if (!botToken) return new TelegramSender(null);
        return new TelegramSender(
            new Api(botToken, { timeoutSeconds: Math.max(1, Math.ceil(timeoutMs / 1000)) })
        );
    }

    async send(chatId: number | string, html: string): Promise<boolean> {
        if (!this.api) throw new MissingBotTokenError();

        try {
            await this.api.sendMessage(chatId, html, {
                parse_mode: "HTML",
                link_preview_options: { is_disabled: false },
            });
            return true;
        } catch (err) {
            if (err instanceof GrammyError) {
                console.error(`[telegram] sendMessage to ${chatId} failed: ${err.error_code} ${err.description}`);
                return false;
            }
            throw err;
        }
    }
}
