import { z } from "zod";
import { readJsonFile, writeJsonFile } from "./jsonFile";
import { SerialLock } from "./lock";

const queueFileSchema = z.object({
    links: z.array(z.unknown()),
});

/**
 * Pending links, persisted as `{"links": [...]}`.
 * Every read goes to disk and every save rewrites the whole file.
 * Read-modify-write cycles (`enqueue`, `remove`) are serialized per store.
 */
export class LinkQueueStore {
    private readonly lock = new SerialLock();

    constructor(readonly filePath: string) {}

    /** Current queue, or an empty one when the file is missing or malformed. Never throws. */
    async load(): Promise<string[]> {
        const data = await readJsonFile(this.filePath);
        if (data === null) return [];

        const parsed = queueFileSchema.safeParse(data);
        if (!parsed.success) {
            console.warn(`[queue] Ignoring ${this.filePath}: expected {"links": [...]}`);
            return [];
        }
        return parsed.data.links.filter((link): link is string => typeof link === "string");
    }

    /** Best-effort: a failed write is logged, not thrown. */
    async save(links: string[]): Promise<void> {
        try {
            await writeJsonFile(this.filePath, { links });
        } catch (err) {
            console.error(`[queue] Failed to save ${this.filePath}:`, err);
        }
    }

    /**
     * Append links that are not queued yet, keeping first-seen order.
     * Returns how many were added.
     */
    enqueue(newLinks: string[]): Promise<number> {
        if (newLinks.length === 0) return Promise.resolve(0);

        return this.lock.run(async () => {
            const queue = await this.load();
            const existing = new Set(queue);
            let added = 0;

            for (const link of newLinks) {
                if (existing.has(link)) continue;
                queue.push(link);
                existing.add(link);
                added++;
            }

            await this.save(queue);
            if (added > 0) console.log(`[queue] Added ${added} link(s), ${queue.length} pending`);
            return added;
        });
    }

    /** Drop the given links from the queue. Returns how many remain. */
    remove(links: string[]): Promise<number> {
        return this.lock.run(async () => {
            const queue = await this.load();
            const drop = new Set(links);
            const remaining = queue.filter((link) => !drop.has(link));

            await this.save(remaining);
            return remaining.length;
        });
    }
}
