import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { discountPercent, OfferCollector, rankOffers, toOffer, type Offer } from "../offerCollector";
import { fakeMarketplace, item } from "./fixtures";

function offer(id: string, discount: number, sold: number): Offer {
    return {
        id,
        title: id,
        price: 100 - discount,
        originalPrice: 100,
        discountPercent: discount,
        soldQuantity: sold,
        permalink: `https://produto.mercadolivre.com.br/${id}`,
        thumbnail: null,
    };
}

describe("discountPercent", () => {
    it("computes the markdown from the original price", () => {
        expect(discountPercent(80, 100)).toBe(20);
        expect(discountPercent(99.9, 149.9)).toBe(33.36);
    });

    it("is zero without a real original price", () => {
        expect(discountPercent(80, null)).toBe(0);
        expect(discountPercent(80, undefined)).toBe(0);
        expect(discountPercent(80, 80)).toBe(0);
        expect(discountPercent(80, 70)).toBe(0);
    });
});

describe("toOffer", () => {
    it("maps a search result", () => {
        expect(toOffer(item("MLB1", "Fone", 80, 100, 7))).toEqual({
            id: "MLB1",
            title: "Fone",
            price: 80,
            originalPrice: 100,
            discountPercent: 20,
            soldQuantity: 7,
            permalink: "https://produto.mercadolivre.com.br/MLB1",
            thumbnail: "https://http2.mlstatic.com/MLB1.jpg",
        });
    });

    it("skips results without a price", () => {
        expect(toOffer(item("MLB1", "Fone", null, 100))).toBeNull();
    });
});

describe("rankOffers", () => {
    it("sorts by discount, then by sold quantity, both descending", () => {
        const ranked = rankOffers([offer("a", 20, 5), offer("b", 20, 50), offer("c", 30, 1)], 15);
        expect(ranked.map((o) => [o.discountPercent, o.soldQuantity])).toEqual([
            [30, 1],
            [20, 50],
            [20, 5],
        ]);
    });

    it("drops offers below the threshold and keeps the ones at it", () => {
        const ranked = rankOffers([offer("a", 14.99, 100), offer("b", 15, 0), offer("c", 0, 9)], 15);
        expect(ranked.map((o) => o.id)).toEqual(["b"]);
    });
});

describe("OfferCollector", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("merges keywords by id, skips failing keywords and ranks the result", async () => {
        const marketplace = fakeMarketplace({
            fone: [
                item("MLB-A", "Fone A", 80, 100, 5),
                item("MLB-B", "Fone B", 50, 100, 1),
                item("MLB-C", "Fone C", 90, null, 300),
            ],
            relogio: new Error("HTTP 503"),
            tv: [
                item("MLB-A", "Fone A repetido", 10, 100, 999),
                item("MLB-D", "TV D", 70, 100, 3),
                item("MLB-E", "TV E", null, 100, 3),
            ],
        });
        const collector = new OfferCollector(marketplace, { keywords: ["fone", "relogio", "tv"], minDiscountPercent: 15 });

        const offers = await collector.collect();

        expect(marketplace.calls).toEqual(["fone", "relogio", "tv"]);
        expect(offers.map((o) => o.id)).toEqual(["MLB-B", "MLB-D", "MLB-A"]);
        expect(offers[2].title).toBe("Fone A");
        expect(offers[2].discountPercent).toBe(20);
        expect(console.error).toHaveBeenCalledTimes(1);
    });

    it("returns nothing when every keyword fails", async () => {
        const marketplace = fakeMarketplace({ fone: new Error("timeout") });
        const collector = new OfferCollector(marketplace, { keywords: ["fone"], minDiscountPercent: 15 });

        expect(await collector.collect()).toEqual([]);
    });
});
