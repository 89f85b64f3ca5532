import type { TelegramMessage, TelegramMessageEntity } from "./update";

/** Domain fragments a link must contain to be relayed. Matched as plain substrings. */
export const SUPPORTED_DOMAINS = [
    "mercadolivre.com",
    "mercadolibre.com",
    "amazon.com.br",
    "amzn.to",
    "shopee.com.br",
    "shopee.com",
] as const;

const URL_RE = /https?:\/\/\S+/g;
const TRAILING_PUNCTUATION_RE = /[ ,;)]+$/;

export function isSupportedLink(url: string): boolean {
    return SUPPORTED_DOMAINS.some((domain) => url.includes(domain));
}

/**
 * Pull every supported store link out of free-form text, in order of appearance.
 * Duplicates are kept; the queue takes care of them.
 */
export function extractLinks(text: string | null | undefined): string[] {
    if (!text) return [];

    const links: string[] = [];
    for (const match of text.match(URL_RE) ?? []) {
        const clean = match.replace(TRAILING_PUNCTUATION_RE, "");
        if (isSupportedLink(clean)) links.push(clean);
    }
    return links;
}

/** URLs hidden behind rich-text links. Not filtered by domain. */
export function extractEntityLinks(entities: TelegramMessageEntity[] | null | undefined): string[] {
    if (!entities) return [];
    return entities
        .filter((e) => e.type === "text_link" && Boolean(e.url))
        .map((e) => e.url ?? "");
}

/**
 * Links of a Telegram message: plain-text matches first, falling back to
 * `text_link` entities when the text has none.
 */
export function extractMessageLinks(message: TelegramMessage): string[] {
    const text = message.text || message.caption || "";
    const links = extractLinks(text);
    if (links.length > 0) return links;

    const entities = message.entities?.length ? message.entities : message.caption_entities;
    return extractEntityLinks(entities);
}
