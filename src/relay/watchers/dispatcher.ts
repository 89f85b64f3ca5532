import type { DispatchMode } from "../../config";
import type { LinkQueueStore } from "../../db/linkQueue";
import { SerialLock } from "../../db/lock";
import type { SentOfferStore } from "../../db/sentOffers";
import { buildLinkMessage, buildOfferMessage } from "../connect/messages";
import type { MessageSender } from "../connect/telegram";
import { normalizeLink, type AffiliateTags } from "../listen/affiliate";
import type { OfferCollector } from "./offerCollector";

export type QueueDispatchResult =
    | { sent: number; failed: number; remaining: number }
    | { sent: 0; message: string };

export interface OfferDispatchResult {
    sent: number;
    failed: number;
    /** Offers that passed the discount filter and were never posted before. */
    candidates: number;
    titles: string[];
}

export type DispatchResult = QueueDispatchResult | OfferDispatchResult;

export interface DispatcherDeps {
    queue: LinkQueueStore;
    sentOffers: SentOfferStore;
    collector: OfferCollector;
    sender: MessageSender;
}

export interface DispatcherOptions {
    channelId: number | string;
    batchSize: number;
    delayMs: number;
    affiliate: AffiliateTags;
    sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Posts a bounded batch to the channel, one message at a time with a fixed
 * pause in between. Runs never overlap: a trigger arriving mid-run waits.
 *
 * Items that were handed to Telegram are persisted as done even when a later
 * send throws; the error then propagates to the trigger.
 */
export class Dispatcher {
    private readonly lock = new SerialLock();
    private readonly pause: (ms: number) => Promise<void>;

    constructor(
        private readonly deps: DispatcherDeps,
        private readonly options: DispatcherOptions
    ) {
        this.pause = options.sleep ?? sleep;
    }

    run(mode: DispatchMode): Promise<DispatchResult> {
        return mode === "search" ? this.dispatchOffers() : this.dispatchQueue();
    }

    dispatchQueue(): Promise<QueueDispatchResult> {
        return this.lock.run(() => this.sendQueuedLinks());
    }

    dispatchOffers(): Promise<OfferDispatchResult> {
        return this.lock.run(() => this.sendCollectedOffers());
    }

    private async sendQueuedLinks(): Promise<QueueDispatchResult> {
        console.log("[dispatch] Consuming link queue...");
        const queue = await this.deps.queue.load();
        if (queue.length === 0) {
            console.log("[dispatch] Queue empty, nothing to send.");
            return { sent: 0, message: "Fila vazia." };
        }

        const batch = queue.slice(0, this.options.batchSize);
        const attempted: string[] = [];
        let failed = 0;

        try {
            for (const [i, link] of batch.entries()) {
                if (i > 0) await this.pause(this.options.delayMs);
                const ok = await this.deps.sender.send(this.options.channelId, buildLinkMessage(i + 1, link));
                attempted.push(link);
                if (ok) {
                    console.log(`[dispatch] Link sent: ${link}`);
                } else {
                    failed++;
                }
            }
        } finally {
            if (attempted.length > 0) await this.deps.queue.remove(attempted);
        }

        const remaining = (await this.deps.queue.load()).length;
        const sent = attempted.length - failed;
        console.log(`[dispatch] Run finished: ${sent} sent, ${failed} failed, ${remaining} remaining`);
        return { sent, failed, remaining };
    }

    private async sendCollectedOffers(): Promise<OfferDispatchResult> {
        console.log("[dispatch] Collecting offers...");
        const offers = await this.deps.collector.collect();
        const alreadySent = await this.deps.sentOffers.load();
        const fresh = offers.filter((o) => !alreadySent.has(o.id));
        const batch = fresh.slice(0, this.options.batchSize);

        const attemptedIds: string[] = [];
        const titles: string[] = [];
        let failed = 0;

        try {
            for (const [i, offer] of batch.entries()) {
                if (i > 0) await this.pause(this.options.delayMs);
                const link = normalizeLink(offer.permalink, this.options.affiliate);
                const ok = await this.deps.sender.send(this.options.channelId, buildOfferMessage(offer, link));
                attemptedIds.push(offer.id);
                if (ok) {
                    titles.push(offer.title);
                    console.log(`[dispatch] Offer sent: ${offer.id} (${offer.discountPercent}% off)`);
                } else {
                    failed++;
                }
            }
        } finally {
            await this.deps.sentOffers.markSent(attemptedIds);
        }

        console.log(`[dispatch] Run finished: ${titles.length} offer(s) sent out of ${fresh.length} candidate(s)`);
        return { sent: titles.length, failed, candidates: fresh.length, titles };
    }
}
