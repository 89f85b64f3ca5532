import type { MarketplaceItem, MarketplaceSearch } from "../wire/mercadoLivre";

export interface Offer {
    id: string;
    title: string;
    price: number;
    originalPrice: number | null;
    discountPercent: number;
    soldQuantity: number;
    permalink: string;
    thumbnail: string | null;
}

/** Percent off the original price, rounded to 2 decimals. 0 without a real markdown. */
export function discountPercent(price: number, originalPrice: number | null | undefined): number {
    if (!originalPrice || originalPrice <= price) return 0;
    const pct = ((originalPrice - price) / originalPrice) * 100;
    return Math.round(pct * 100) / 100;
}

export function toOffer(item: MarketplaceItem): Offer | null {
    if (item.price === null) return null;
    const originalPrice = item.original_price ?? null;
    return {
        id: item.id,
        title: item.title,
        price: item.price,
        originalPrice,
        discountPercent: discountPercent(item.price, originalPrice),
        soldQuantity: item.sold_quantity ?? 0,
        permalink: item.permalink,
        thumbnail: item.thumbnail ?? null,
    };
}

/** Keep offers at or above the threshold, biggest discount first, best sellers breaking ties. */
export function rankOffers(offers: Offer[], minDiscountPercent: number): Offer[] {
    return offers
        .filter((o) => o.discountPercent >= minDiscountPercent)
        .sort((a, b) => b.discountPercent - a.discountPercent || b.soldQuantity - a.soldQuantity);
}

export class OfferCollector {
    constructor(
        private readonly marketplace: MarketplaceSearch,
        private readonly options: { keywords: string[]; minDiscountPercent: number }
    ) {}

    /**
     * Search every keyword and merge the results by item id (first hit wins).
     * A failing keyword is logged and skipped.
     */
    async collect(): Promise<Offer[]> {
        const byId = new Map<string, Offer>();

        for (const keyword of this.options.keywords) {
            let items: MarketplaceItem[];
            try {
                items = await this.marketplace.search(keyword);
            } catch (err) {
                console.error(`[offers] Search failed for "${keyword}":`, err);
                continue;
            }

            let fresh = 0;
            for (const item of items) {
                if (byId.has(item.id)) continue;
                const offer = toOffer(item);
                if (!offer) continue;
                byId.set(offer.id, offer);
                fresh++;
            }
            console.log(`[offers] "${keyword}": ${items.length} result(s), ${fresh} new`);
        }

        const ranked = rankOffers([...byId.values()], this.options.minDiscountPercent);
        console.log(
            `[offers] ${ranked.length} of ${byId.size} offer(s) at or above ${this.options.minDiscountPercent}% off`
        );
        return ranked;
    }
}
