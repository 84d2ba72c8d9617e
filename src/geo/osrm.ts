import { z } from 'zod';
import { Coordinates } from '../domain/models';
import { ParseError } from '../domain/errors';
import { HttpClient } from '../http/client';
import { AttemptOutcome, classifyError } from '../http/retry';
import { RouterConfig } from '../config';
import { RoutingProvider } from './types';

const routeResponseSchema = z.object({
    code: z.string(),
    routes: z.array(z.object({
        distance: z.number(),    // metres
        duration: z.number().optional(),
    })).optional(),
    message: z.string().optional(),
});

export function buildRoutePath(from: Coordinates, to: Coordinates): string {
    // OSRM wants lon,lat pairs
    return `/route/v1/driving/${from.lon},${from.lat};${to.lon},${to.lat}`;
}

export class OsrmRouter implements RoutingProvider {
    readonly name = 'osrm';

    private httpClient: HttpClient;

    constructor(config: RouterConfig, httpClient?: HttpClient) {
        this.httpClient = httpClient ?? new HttpClient(this.name, {
            baseURL: config.baseUrl,
            timeoutMs: config.timeoutMs,
        });
    }

    async roadDistanceKm(from: Coordinates, to: Coordinates): Promise<AttemptOutcome<number>> {
        let raw: unknown;
        try {
            const response = await this.httpClient.get<unknown>(buildRoutePath(from, to), {
                params: { overview: 'false' },
            });
            raw = response.data;
        } catch (err) {
            return classifyError(err);
        }

        const parsed = routeResponseSchema.safeParse(raw);
        if (!parsed.success) {
            return {
                kind: 'terminal',
                reason: 'unexpected route response structure',
                error: new ParseError(this.name, 'Unexpected route response structure', parsed.error),
            };
        }
        const route = parsed.data.routes?.[0];
        if (parsed.data.code !== 'Ok' || !route) {
            return { kind: 'terminal', reason: `no route found (${parsed.data.code})` };
        }
        return { kind: 'success', value: route.distance / 1000 };
    }
}
