import { Pool } from 'pg';
import { CachedCoordinates, GeocodeStore } from '../cache/geocode-cache';

interface GeocodeRow {
    address: string;
    latitude: number | null;
    longitude: number | null;
    found: boolean;
}

// Expects the geocode_cache table from src/db/migrate.ts. Upserts are atomic per row.
export class PgGeocodeStore implements GeocodeStore {
    readonly kind = 'postgres';

    constructor(private pool: Pool) { }

    async load(): Promise<Map<string, CachedCoordinates>> {
        const result = await this.pool.query<GeocodeRow>(
            `SELECT address, latitude, longitude, found FROM geocode_cache`,
        );

        const entries = new Map<string, CachedCoordinates>();
        for (const row of result.rows) {
            if (!row.found) {
                entries.set(row.address, null);
            } else if (row.latitude !== null && row.longitude !== null) {
                entries.set(row.address, { lat: Number(row.latitude), lon: Number(row.longitude) });
            }
        }
        return entries;
    }

    async write(_snapshot: ReadonlyMap<string, CachedCoordinates>, address: string, value: CachedCoordinates): Promise<void> {
        await this.pool.query(
            `INSERT INTO geocode_cache (address, latitude, longitude, found, updated_at)
       VALUES ($1, $2, $3, $4, NOW())
       ON CONFLICT (address) DO UPDATE
         SET latitude = EXCLUDED.latitude,
             longitude = EXCLUDED.longitude,
             found = EXCLUDED.found,
             updated_at = NOW()`,
            [address, value?.lat ?? null, value?.lon ?? null, value !== null],
        );
    }
}
