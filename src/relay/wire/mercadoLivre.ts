import { z } from "zod";

const DEFAULT_BASE_URL = "https://api.mercadolibre.com";

const searchItemSchema = z
    .object({
        id: z.string(),
        title: z.string(),
        price: z.number().nullable(),
        original_price: z.number().nullish(),
        sold_quantity: z.number().nullish(),
        permalink: z.string(),
        thumbnail: z.string().nullish(),
    })
    .passthrough();

const searchResponseSchema = z
    .object({
        results: z.array(z.unknown()),
    })
    .passthrough();

export type MarketplaceItem = z.infer<typeof searchItemSchema>;

export class MarketplaceError extends Error {
    constructor(message: string, readonly status?: number) {
        super(message);
        this.name = "MarketplaceError";
    }
}

export interface MarketplaceSearch {
    search(keyword: string): Promise<MarketplaceItem[]>;
}

/**
 * Mercado Livre public search (`/sites/{site}/search`), new items only.
 * One request per call, no retries.
 */
export class MercadoLivreClient implements MarketplaceSearch {
    private readonly siteId: string;
    private readonly limit: number;
    private readonly timeoutMs: number;
    private readonly accessToken?: string;
    private readonly baseUrl: string;

    constructor(args: { siteId: string; limit: number; timeoutMs: number; accessToken?: string; baseUrl?: string }) {
        this.siteId = args.siteId;
        this.limit = args.limit;
        this.timeoutMs = args.timeoutMs;
        this.accessToken = args.accessToken;
        this.baseUrl = (args.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    }

    async search(keyword: string): Promise<MarketplaceItem[]> {
        const params = new URLSearchParams({
            q: keyword,
            condition: "new",
            limit: String(this.limit),
        });
        const url = `${this.baseUrl}/sites/${encodeURIComponent(this.siteId)}/search?${params}`;

        const headers: Record<string, string> = { Accept: "application/json" };
        if (this.accessToken) headers.Authorization = `Bearer ${this.accessToken}`;

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
        let res: Response;
        try {
            res = await fetch(url, { headers, signal: controller.signal });
        } finally {
            clearTimeout(timeout);
        }

        if (!res.ok) {
            throw new MarketplaceError(`Search "${keyword}" failed: HTTP ${res.status}`, res.status);
        }

        const parsed = searchResponseSchema.safeParse(await res.json());
        if (!parsed.success) {
            throw new MarketplaceError(`Search "${keyword}" returned an unexpected payload`);
        }

        // A malformed listing is dropped on its own; the rest of the page is kept.
        const items: MarketplaceItem[] = [];
        for (const raw of parsed.data.results) {
            const item = searchItemSchema.safeParse(raw);
            if (item.success) {
                items.push(item.data);
            } else {
                console.warn(`[marketplace] Skipping malformed result for "${keyword}": ${item.error.issues[0]?.message}`);
            }
        }
        return items;
    }
}
