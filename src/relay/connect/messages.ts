import type { Offer } from "../watchers/offerCollector";

export function escapeHtml(s: string): string {
    return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeAttr(s: string): string {
    return escapeHtml(s).replace(/"/g, "&quot;");
}

/** `1234.5` → `R$ 1.234,50` */
export function formatBrl(value: number): string {
    const [int, cents] = value.toFixed(2).split(".");
    return `R$ ${int.replace(/\B(?=(\d{3})+(?!\d))/g, ".")},${cents}`;
}

export function buildLinkMessage(index: number, link: string): string {
    return `🔥 Oferta #${index}:\n${escapeHtml(link)}`;
}

export function buildOfferMessage(offer: Offer, link: string): string {
    const priceLine =
        offer.originalPrice !== null && offer.discountPercent > 0
            ? `💰 De <s>${formatBrl(offer.originalPrice)}</s> por <b>${formatBrl(offer.price)}</b> (-${Math.round(offer.discountPercent)}%)`
            : `💰 <b>${formatBrl(offer.price)}</b>`;

    const lines = [`🔥 <b>${escapeHtml(offer.title)}</b>`, ``, priceLine];
    if (offer.soldQuantity > 0) lines.push(`📦 ${offer.soldQuantity} vendidos`);
    lines.push(``, `🛒 <a href="${escapeAttr(link)}">Ver oferta no Mercado Livre</a>`);
    return lines.join("\n");
}

export function buildReceivedReply(added: number): string {
    return added > 0
        ? `✅ Recebi ${added} link(s). Eles serão enviados gradualmente para o canal.`
        : "Não encontrei nenhum link de loja suportada na mensagem (ou já estavam na fila).";
}
