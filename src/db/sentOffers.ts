import { z } from "zod";
import { readJsonFile, writeJsonFile } from "./jsonFile";
import { SerialLock } from "./lock";

const sentFileSchema = z.object({
    ids: z.array(z.unknown()),
});

/**
 * Ids of offers already posted, persisted as `{"ids": [...]}`.
 * The set only grows; nothing is ever evicted.
 */
export class SentOfferStore {
    private readonly lock = new SerialLock();

    constructor(readonly filePath: string) {}

    async load(): Promise<Set<string>> {
        const data = await readJsonFile(this.filePath);
        if (data === null) return new Set();

        const parsed = sentFileSchema.safeParse(data);
        if (!parsed.success) {
            console.warn(`[sent-offers] Ignoring ${this.filePath}: expected {"ids": [...]}`);
            return new Set();
        }
        return new Set(parsed.data.ids.filter((id): id is string => typeof id === "string"));
    }

    markSent(ids: string[]): Promise<void> {
        if (ids.length === 0) return Promise.resolve();

        return this.lock.run(async () => {
            const sent = await this.load();
            for (const id of ids) sent.add(id);
            try {
                await writeJsonFile(this.filePath, { ids: [...sent] });
            } catch (err) {
                console.error(`[sent-offers] Failed to save ${this.filePath}:`, err);
            }
        });
    }
}
