import { z } from 'zod';
import { Coordinates } from '../domain/models';
import { ParseError } from '../domain/errors';
import { HttpClient } from '../http/client';
import { AttemptOutcome, classifyError } from '../http/retry';
import { GeocoderConfig } from '../config';
import { GeocodingProvider } from './types';

const SEARCH_PATH = '/search';

const searchResultSchema = z.array(z.object({
    lat: z.coerce.number(),      // Nominatim returns coordinates as strings
    lon: z.coerce.number(),
    display_name: z.string().optional(),
}));

export class NominatimGeocoder implements GeocodingProvider {
    readonly name = 'nominatim';

    private httpClient: HttpClient;

    constructor(config: GeocoderConfig, httpClient?: HttpClient) {
        this.httpClient = httpClient ?? new HttpClient(this.name, {
            baseURL: config.baseUrl,
            timeoutMs: config.timeoutMs,
            defaultHeaders: { 'User-Agent': config.userAgent },
        });
    }

    async geocode(address: string): Promise<AttemptOutcome<Coordinates>> {
        let raw: unknown;
        try {
            const response = await this.httpClient.get<unknown>(SEARCH_PATH, {
                params: { q: address, format: 'jsonv2', limit: 1 },
            });
            raw = response.data;
        } catch (err) {
            return classifyError(err);
        }

        const parsed = searchResultSchema.safeParse(raw);
        if (!parsed.success) {
            return {
                kind: 'terminal',
                reason: 'unexpected search response structure',
                error: new ParseError(this.name, `Unexpected search response for "${address}"`, parsed.error),
            };
        }
        const best = parsed.data[0];
        if (!best || !Number.isFinite(best.lat) || !Number.isFinite(best.lon)) {
            return { kind: 'terminal', reason: `address not found: ${address}` };
        }
        return { kind: 'success', value: { lat: best.lat, lon: best.lon } };
    }
}
