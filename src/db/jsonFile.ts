import fs from "fs/promises";
import path from "path";

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read and parse a JSON file.
 * Returns null when the file is absent, unreadable or not valid JSON.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
    let raw: string;
    try {
        raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
        if (!isMissingFile(err)) console.warn(`[store] Could not read ${filePath}:`, err);
        return null;
    }

    try {
        return JSON.parse(raw);
    } catch (err) {
        console.warn(`[store] Malformed JSON in ${filePath}:`, err);
        return null;
    }
}

/**
 * Replace a JSON file atomically: the data goes to a temp file next to the
 * target and is renamed over it, so readers never see a half-written file.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
    const dir = path.dirname(filePath);
    const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
        await fs.writeFile(tmpPath, JSON.stringify(data), "utf-8");
        await fs.rename(tmpPath, filePath);
    } catch (err) {
        await fs.rm(tmpPath, { force: true });
        throw err;
    }
}
