import type { MarketplaceItem, MarketplaceSearch } from "../../wire/mercadoLivre";

export function item(
    id: string,
    title: string,
    price: number | null,
    originalPrice: number | null,
    soldQuantity = 0
): MarketplaceItem {
    return {
        id,
        title,
        price,
        original_price: originalPrice,
        sold_quantity: soldQuantity,
        permalink: `https://produto.mercadolivre.com.br/${id}`,
        thumbnail: `https://http2.mlstatic.com/${id}.jpg`,
    };
}

/** In-memory marketplace: results per keyword, or an Error to throw for it. */
export function fakeMarketplace(results: Record<string, MarketplaceItem[] | Error>): MarketplaceSearch & { calls: string[] } {
    const calls: string[] = [];
    return {
        calls,
        async search(keyword: string) {
            calls.push(keyword);
            const result = results[keyword] ?? [];
            if (result instanceof Error) throw result;
            return result;
        },
    };
}
