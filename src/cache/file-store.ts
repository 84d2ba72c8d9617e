import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { CachedCoordinates, GeocodeEntries, GeocodeStore } from './geocode-cache';

const FORMAT_VERSION = 1;

const cacheFileSchema = z.object({
    version: z.literal(FORMAT_VERSION),
    entries: z.record(
        z.string(),
        z.object({ lat: z.number(), lon: z.number() }).nullable(),
    ),
});

// fs errors may come from another realm, so match on shape rather than instanceof Error
function isMissingFile(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * JSON-file geocode store. Each write replaces the file atomically:
 * the snapshot goes to a temp sibling first and is renamed over the target,
 * so a crash mid-write leaves the previous file intact.
 */
export class FileGeocodeStore implements GeocodeStore {
    readonly kind = 'file';
    private writeSeq = 0;

    constructor(private readonly filePath: string) { }

    async load(): Promise<Map<string, CachedCoordinates>> {
        let content: string;
        try {
            content = await fs.readFile(this.filePath, 'utf-8');
        } catch (err) {
            if (isMissingFile(err)) return new Map();
            throw err;
        }

        let json: unknown;
        try {
            json = JSON.parse(content);
        } catch (err) {
            console.warn(`[cache] Ignoring unreadable geocode cache ${this.filePath}:`, err instanceof Error ? err.message : err);
            return new Map();
        }
        const parsed = cacheFileSchema.safeParse(json);
        if (!parsed.success) {
            console.warn(`[cache] Ignoring geocode cache ${this.filePath} with unexpected structure`);
            return new Map();
        }
        return new Map(Object.entries(parsed.data.entries));
    }

    async write(snapshot: GeocodeEntries): Promise<void> {
        const document = {
            version: FORMAT_VERSION,
            entries: Object.fromEntries(snapshot),
        };
        const tempPath = `${this.filePath}.${process.pid}.${++this.writeSeq}.tmp`;

        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        try {
            await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
            await fs.rename(tempPath, this.filePath);
        } catch (err) {
            await fs.rm(tempPath, { force: true });
            throw err;
        }
    }
}
