import { promises as fs } from 'fs';
import { Pool } from 'pg';
import { AppConfig } from './config';
import { GeocodeCache, GeocodeStore } from './cache/geocode-cache';
import { FileGeocodeStore } from './cache/file-store';
import { PgGeocodeStore } from './db/geocode-repository';
import { closePool, createPool } from './db/pool';
import { NominatimGeocoder } from './geo/nominatim';
import { OsrmRouter } from './geo/osrm';
import { parseReferenceData, ReferenceDataStore } from './reference/store';
import { DistanceResolver } from './services/distance-resolver';
import { QuoteService } from './services/quote.service';

export interface Engine {
    quotes: QuoteService;
    reference: ReferenceDataStore;
    cache: GeocodeCache;
    close(): Promise<void>;
}

export async function loadReferenceData(filePath: string): Promise<ReferenceDataStore> {
    const content = await fs.readFile(filePath, 'utf-8');
    return parseReferenceData(JSON.parse(content));
}

/** Wires the real geocoder, router and cache store from config. */
export async function createEngine(config: AppConfig): Promise<Engine> {
    const reference = await loadReferenceData(config.referenceDataPath);

    let pool: Pool | undefined;
    let store: GeocodeStore;
    if (config.db) {
        pool = createPool(config.db);
        store = new PgGeocodeStore(pool);
    } else {
        store = new FileGeocodeStore(config.geocodeCachePath);
    }
    const cache = await GeocodeCache.open(store);

    const distances = new DistanceResolver({
        geocoder: new NominatimGeocoder(config.geocoder),
        router: new OsrmRouter(config.router),
        cache,
        reference,
        retryPolicy: config.retry,
    });

    return {
        quotes: new QuoteService({ reference, distances }),
        reference,
        cache,
        async close() {
            await cache.flush();
            if (pool) await closePool(pool);
        },
    };
}
