import { describe, expect, it } from "vitest";
import { appendQueryParam, detectStore, hasQueryParam, normalizeLink, type AffiliateTags } from "../affiliate";

const tags: AffiliateTags = {
    amazonTag: "promo-20",
    shopeeParam: "af_id",
    shopeeValue: "abc123",
    mercadoLivreTag: "promotech",
};

describe("detectStore", () => {
    it("maps each domain family to its store", () => {
        expect(detectStore("https://www.amazon.com.br/dp/B0TEST")).toBe("amazon");
        expect(detectStore("https://amzn.to/3abc")).toBe("amazon");
        expect(detectStore("https://s.shopee.com.br/abc")).toBe("shopee");
        expect(detectStore("https://shopee.com/abc")).toBe("shopee");
        expect(detectStore("https://produto.mercadolivre.com.br/MLB-1")).toBe("mercadolivre");
        expect(detectStore("https://articulo.mercadolibre.com.ar/MLA-1")).toBe("mercadolivre");
        expect(detectStore("https://example.com")).toBeNull();
    });

    it("goes by the hostname when another store is named in the query", () => {
        expect(detectStore("https://www.mercadolivre.com.br/p/MLB1?ref=amazon.com.br")).toBe("mercadolivre");
        expect(detectStore("https://amzn.to/abc?from=shopee.com.br")).toBe("amazon");
    });

    it("falls back to the whole URL when the hostname names no store", () => {
        expect(detectStore("https://redirect.example.com/?to=https://amzn.to/abc")).toBe("amazon");
    });
});

describe("query helpers", () => {
    it("detects parameters by exact name", () => {
        expect(hasQueryParam("https://amzn.to/a?tag=x", "tag")).toBe(true);
        expect(hasQueryParam("https://amzn.to/a?mytag=x", "tag")).toBe(false);
        expect(hasQueryParam("https://amzn.to/a#tag=x", "tag")).toBe(false);
    });

    it("picks the separator from the existing query string", () => {
        expect(appendQueryParam("https://a.com/p", "k", "v")).toBe("https://a.com/p?k=v");
        expect(appendQueryParam("https://a.com/p?x=1", "k", "v")).toBe("https://a.com/p?x=1&k=v");
        expect(appendQueryParam("https://a.com/p?", "k", "v")).toBe("https://a.com/p?k=v");
    });
});

describe("normalizeLink", () => {
    it("adds the Amazon associate tag", () => {
        expect(normalizeLink("https://www.amazon.com.br/dp/B0TEST", tags)).toBe(
            "https://www.amazon.com.br/dp/B0TEST?tag=promo-20"
        );
        expect(normalizeLink("https://www.amazon.com.br/dp/B0TEST?th=1", tags)).toBe(
            "https://www.amazon.com.br/dp/B0TEST?th=1&tag=promo-20"
        );
    });

    it("leaves an existing Amazon tag alone", () => {
        expect(normalizeLink("https://amzn.to/abc?tag=other-20", tags)).toBe("https://amzn.to/abc?tag=other-20");
    });

    it("does not mistake a similarly named parameter for the tag", () => {
        expect(normalizeLink("https://amzn.to/abc?mytag=x", tags)).toBe("https://amzn.to/abc?mytag=x&tag=promo-20");
    });

    it("keeps the fragment at the end", () => {
        expect(normalizeLink("https://www.amazon.com.br/dp/B0TEST#reviews", tags)).toBe(
            "https://www.amazon.com.br/dp/B0TEST?tag=promo-20#reviews"
        );
    });

    it("adds the Shopee parameter only when name and value are configured", () => {
        expect(normalizeLink("https://shopee.com.br/produto-i.1.2", tags)).toBe(
            "https://shopee.com.br/produto-i.1.2?af_id=abc123"
        );
        expect(normalizeLink("https://shopee.com.br/produto-i.1.2", { shopeeParam: "af_id" })).toBe(
            "https://shopee.com.br/produto-i.1.2"
        );
    });

    it("tags Mercado Livre links only when a tag is configured", () => {
        expect(normalizeLink("https://produto.mercadolivre.com.br/MLB-123", tags)).toBe(
            "https://produto.mercadolivre.com.br/MLB-123?aff_tag=promotech"
        );
        expect(normalizeLink("https://produto.mercadolivre.com.br/MLB-123", {})).toBe(
            "https://produto.mercadolivre.com.br/MLB-123"
        );
    });

    it("tags a Mercado Livre link that mentions Amazon in its query as Mercado Livre", () => {
        expect(normalizeLink("https://www.mercadolivre.com.br/p/MLB1?ref=amazon.com.br", tags)).toBe(
            "https://www.mercadolivre.com.br/p/MLB1?ref=amazon.com.br&aff_tag=promotech"
        );
    });

    it("percent-encodes configured values", () => {
        expect(normalizeLink("https://amzn.to/abc", { amazonTag: "promo&x=1" })).toBe(
            "https://amzn.to/abc?tag=promo%26x%3D1"
        );
        expect(normalizeLink("https://amzn.to/abc", { amazonTag: "promo-20" })).toBe("https://amzn.to/abc?tag=promo-20");
    });

    it("passes through links without a configured tag or store", () => {
        expect(normalizeLink("https://amzn.to/abc", {})).toBe("https://amzn.to/abc");
        expect(normalizeLink("  https://example.com/x  ", tags)).toBe("https://example.com/x");
    });

    it("is idempotent", () => {
        const urls = [
            "https://www.amazon.com.br/dp/B0TEST?th=1",
            "https://amzn.to/abc#top",
            "https://shopee.com.br/produto-i.1.2?sp=1",
            "https://produto.mercadolivre.com.br/MLB-123",
            "https://example.com/x",
        ];
        for (const url of urls) {
            const once = normalizeLink(url, tags);
            expect(normalizeLink(once, tags)).toBe(once);
        }
    });
});
