export interface AffiliateTags {
    /** Amazon Associates tag, sent as `tag=`. */
    amazonTag?: string;
    /** Shopee affiliate parameter name and value; both are needed. */
    shopeeParam?: string;
    shopeeValue?: string;
    /** Mercado Livre affiliate tag, sent as `aff_tag=`. Links pass through untouched when unset. */
    mercadoLivreTag?: string;
}

export type Store = "amazon" | "shopee" | "mercadolivre";

const STORE_DOMAINS: Array<[Store, string[]]> = [
    ["amazon", ["amazon.com.br", "amzn.to"]],
    ["shopee", ["shopee.com.br", "shopee.com"]],
    ["mercadolivre", ["mercadolivre.com", "mercadolibre.com"]],
];

function matchStore(value: string): Store | null {
    for (const [store, domains] of STORE_DOMAINS) {
        if (domains.some((d) => value.includes(d))) return store;
    }
    return null;
}

function hostnameOf(url: string): string | null {
    try {
        return new URL(url).hostname.toLowerCase();
    } catch {
        return null;
    }
}

/**
 * The store a link belongs to. The hostname decides when it names a store, so a
 * store domain that only appears in the path or query does not override it.
 */
export function detectStore(url: string): Store | null {
    const host = hostnameOf(url);
    return (host && matchStore(host)) || matchStore(url);
}

function splitFragment(url: string): [string, string] {
    const hashIndex = url.indexOf("#");
    return hashIndex === -1 ? [url, ""] : [url.slice(0, hashIndex), url.slice(hashIndex)];
}

export function hasQueryParam(url: string, name: string): boolean {
    const [base] = splitFragment(url);
    const queryStart = base.indexOf("?");
    if (queryStart === -1) return false;
    return base
        .slice(queryStart + 1)
        .split("&")
        .some((pair) => pair.split("=")[0] === name);
}

/**
 * Append `name=value` with `&` when the URL already has a query string, `?` otherwise.
 * A `#fragment` stays at the end.
 */
export function appendQueryParam(url: string, name: string, value: string): string {
    const [base, fragment] = splitFragment(url);
    let separator = base.includes("?") ? "&" : "?";
    if (base.endsWith("?") || base.endsWith("&")) separator = "";
    return `${base}${separator}${name}=${encodeURIComponent(value)}${fragment}`;
}

function withParam(url: string, name: string | undefined, value: string | undefined): string {
    if (!name || !value || hasQueryParam(url, name)) return url;
    return appendQueryParam(url, name, value);
}

/**
 * Tag a store link with the configured affiliate parameter for its store.
 * Already-tagged links come back unchanged, so normalizing twice is a no-op.
 */
export function normalizeLink(url: string, tags: AffiliateTags): string {
    const clean = url.trim();
    switch (detectStore(clean)) {
        case "amazon":
            return withParam(clean, "tag", tags.amazonTag);
        case "shopee":
            return withParam(clean, tags.shopeeParam, tags.shopeeValue);
        case "mercadolivre":
            return withParam(clean, "aff_tag", tags.mercadoLivreTag);
        default:
            return clean;
    }
}
