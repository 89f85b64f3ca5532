import type { LinkQueueStore } from "../../db/linkQueue";
import { buildReceivedReply } from "../connect/messages";
import type { MessageSender } from "../connect/telegram";
import { normalizeLink, type AffiliateTags } from "./affiliate";
import { extractMessageLinks } from "./linkMatcher";
import type { TelegramUpdate } from "./update";

export interface InboundDeps {
    queue: LinkQueueStore;
    sender: MessageSender;
    affiliate: AffiliateTags;
    /** When set, updates from any other sender are acknowledged and ignored. */
    allowedUserId?: string;
}

export type InboundResult = { ok: true } | { ok: true; added: number };

/**
 * Queue the store links of an incoming message and tell the sender how many
 * were accepted.
 */
export async function handleUpdate(update: TelegramUpdate, deps: InboundDeps): Promise<InboundResult> {
    const message = update.message ?? update.edited_message;
    if (!message) return { ok: true };

    const userId = message.from?.id;
    if (deps.allowedUserId && String(userId) !== deps.allowedUserId) {
        console.log(`[webhook] Ignoring message from user_id ${userId ?? "unknown"}`);
        return { ok: true };
    }

    const links = extractMessageLinks(message).map((link) => normalizeLink(link, deps.affiliate));
    const added = await deps.queue.enqueue(links);

    const chatId = message.chat?.id;
    if (chatId !== undefined) {
        try {
            await deps.sender.send(chatId, buildReceivedReply(added));
        } catch (err) {
            console.error(`[webhook] Could not reply to chat ${chatId}:`, err);
        }
    }

    return { ok: true, added };
}
