import { Coordinates } from '../domain/models';

// null = known "not found" address
export type CachedCoordinates = Coordinates | null;
export type GeocodeEntries = ReadonlyMap<string, CachedCoordinates>;

export interface GeocodeStore {
    readonly kind: string;
    load(): Promise<Map<string, CachedCoordinates>>;
    /** Called once per insertion with the full cache snapshot and the entry that changed. */
    write(snapshot: GeocodeEntries, address: string, value: CachedCoordinates): Promise<void>;
}

export function normalizeAddress(address: string): string {
    return address.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Process-wide address -> coordinate cache. Reads hit memory only; every
 * insertion is persisted through a single promise chain so store writes
 * never interleave. Concurrent misses for the same address may both call
 * the geocoder; the later write wins.
 */
export class GeocodeCache {
    private entries = new Map<string, CachedCoordinates>();
    private writeChain: Promise<void> = Promise.resolve();
    private store: GeocodeStore;

    constructor(store: GeocodeStore) {
        this.store = store;
    }

    static async open(store: GeocodeStore): Promise<GeocodeCache> {
        const cache = new GeocodeCache(store);
        await cache.reload();
        return cache;
    }

    async reload(): Promise<void> {
        const loaded = await this.store.load();
        this.entries = new Map();
        for (const [address, value] of loaded) {
            this.entries.set(normalizeAddress(address), value);
        }
        console.log(`[cache] Loaded ${this.entries.size} cached coordinates from ${this.store.kind} store`);
    }

    /** undefined = never looked up (miss); null = cached "not found". */
    get(address: string): CachedCoordinates | undefined {
        return this.entries.get(normalizeAddress(address));
    }

    has(address: string): boolean {
        return this.entries.has(normalizeAddress(address));
    }

    get size(): number {
        return this.entries.size;
    }

    async set(address: string, coordinates: Coordinates): Promise<void> {
        const key = normalizeAddress(address);
        this.entries.set(key, coordinates);

        const snapshot: GeocodeEntries = new Map(this.entries);
        const write = this.writeChain.then(() => this.store.write(snapshot, key, coordinates));
        // keep the chain alive after a failed write
        this.writeChain = write.catch(() => undefined);

        try {
            await write;
        } catch (err) {
            console.error(
                `[cache] Failed to persist geocode cache to ${this.store.kind} store:`,
                err instanceof Error ? err.message : err,
            );
        }
    }

    /** Resolves once every write queued so far has settled. */
    flush(): Promise<void> {
        return this.writeChain;
    }
}
