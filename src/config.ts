import "dotenv/config";
import cron from "node-cron";
import { z } from "zod";
import type { AffiliateTags } from "./relay/listen/affiliate";

export const DEFAULT_SEARCH_KEYWORDS = [
    "fone bluetooth",
    "smartwatch",
    "caixa de som bluetooth",
    "carregador turbo",
    "power bank",
    "mouse gamer",
    "teclado mecanico",
    "ssd",
    "smart tv",
];

/** Empty env values count as unset. */
const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

const schema = z.object({
    // Telegram
    // A missing token only fails at send time.
    TELEGRAM_BOT_TOKEN: optionalString,
    TELEGRAM_CHANNEL_ID: z.string().trim().min(1).default("@PromoTechBrasil"),
    TELEGRAM_WEBHOOK_SECRET: z.string().trim().min(1).default("changeme"),
    ALLOWED_TELEGRAM_USER_ID: optionalString,

    // Dispatch
    DISPATCH_MODE: z.enum(["queue", "search"]).default("queue"),
    OFFERS_PER_RUN: z.coerce.number().int().positive().default(10),
    SEND_DELAY_MS: z.coerce.number().int().min(0).default(2000),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    DISPATCH_CRON: optionalString.refine(
        (expr) => expr === undefined || cron.validate(expr),
        "DISPATCH_CRON is not a valid cron expression"
    ),

    // Storage
    LINKS_QUEUE_FILE: z.string().trim().min(1).default("links_queue.json"),
    SENT_IDS_FILE: z.string().trim().min(1).default("sent_offers.json"),

    // Affiliate tags
    AMAZON_ASSOC_TAG: optionalString,
    SHOPEE_AFFILIATE_PARAM: optionalString,
    SHOPEE_AFFILIATE_VALUE: optionalString,
    ML_AFFILIATE_TAG: optionalString,

    // Mercado Livre search
    ML_SITE_ID: z.string().trim().min(1).default("MLB"),
    ML_ACCESS_TOKEN: optionalString,
    ML_SEARCH_LIMIT: z.coerce.number().int().min(1).max(50).default(50),
    SEARCH_KEYWORDS: optionalString.transform((raw) => {
        const keywords = (raw ?? "")
            .split(",")
            .map((k) => k.trim())
            .filter(Boolean);
        return keywords.length > 0 ? keywords : DEFAULT_SEARCH_KEYWORDS;
    }),
    MIN_DISCOUNT_PERCENT: z.coerce.number().min(0).max(100).default(15),

    // HTTP
    PORT: z.coerce.number().int().positive().default(8000),
    PUBLIC_URL: optionalString.pipe(z.string().url().optional()),
});

export type DispatchMode = z.infer<typeof schema>["DISPATCH_MODE"];

export interface AppConfig {
    telegram: {
        botToken?: string;
        channelId: string;
        webhookSecret: string;
        allowedUserId?: string;
    };
    dispatch: {
        mode: DispatchMode;
        batchSize: number;
        delayMs: number;
        cron?: string;
    };
    storage: {
        linksQueueFile: string;
        sentIdsFile: string;
    };
    affiliate: AffiliateTags;
    search: {
        siteId: string;
        accessToken?: string;
        limit: number;
        keywords: string[];
        minDiscountPercent: number;
    };
    http: {
        port: number;
        timeoutMs: number;
        publicUrl?: string;
    };
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
    }
}

/**
 * Validate the environment and build the config object handed to every component.
 * Throws a {@link ConfigError} listing each invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = schema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        );
    }
    const e = result.data;

    return {
        telegram: {
            botToken: e.TELEGRAM_BOT_TOKEN,
            channelId: e.TELEGRAM_CHANNEL_ID,
            webhookSecret: e.TELEGRAM_WEBHOOK_SECRET,
            allowedUserId: e.ALLOWED_TELEGRAM_USER_ID,
        },
        dispatch: {
            mode: e.DISPATCH_MODE,
            batchSize: e.OFFERS_PER_RUN,
            delayMs: e.SEND_DELAY_MS,
            cron: e.DISPATCH_CRON,
        },
        storage: {
            linksQueueFile: e.LINKS_QUEUE_FILE,
            sentIdsFile: e.SENT_IDS_FILE,
        },
        affiliate: {
            amazonTag: e.AMAZON_ASSOC_TAG,
            shopeeParam: e.SHOPEE_AFFILIATE_PARAM,
            shopeeValue: e.SHOPEE_AFFILIATE_VALUE,
            mercadoLivreTag: e.ML_AFFILIATE_TAG,
        },
        search: {
            siteId: e.ML_SITE_ID,
            accessToken: e.ML_ACCESS_TOKEN,
            limit: e.ML_SEARCH_LIMIT,
            keywords: e.SEARCH_KEYWORDS,
            minDiscountPercent: e.MIN_DISCOUNT_PERCENT,
        },
        http: {
            port: e.PORT,
            timeoutMs: e.HTTP_TIMEOUT_MS,
            publicUrl: e.PUBLIC_URL,
        },
    };
}
