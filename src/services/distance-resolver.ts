import { Coordinates, DistanceEstimate, Location } from '../domain/models';
import { GeocodeCache } from '../cache/geocode-cache';
import { GeocodingProvider, RoutingProvider } from '../geo/types';
import { haversine } from '../geo/haversine';
import { DEFAULT_RETRY_POLICY, RetryPolicy, retryWithBackoff, Sleep, sleep } from '../http/retry';
import { ReferenceDataStore } from '../reference/store';
import { firstAvailable, positiveFinite } from '../lib/fallback';
import { round1 } from '../lib/round';
import { DEFAULT_DISTANCE_KM, ROAD_INFLATION_FACTOR } from '../pricing/constants';

export interface DistanceResolverDeps {
    geocoder: GeocodingProvider;
    router: RoutingProvider;
    cache: GeocodeCache;
    reference: ReferenceDataStore;
    retryPolicy?: RetryPolicy;
    sleep?: Sleep;
}

/** "10115, Berlin, DE"; empty parts are left out. */
export function composeAddress(location: Location): string {
    return [location.postalCode, location.placeName, location.countryCode]
        .map(part => part.trim())
        .filter(part => part.length > 0)
        .join(', ');
}

/**
 * Road distance between two resolved locations. Never throws for missing
 * data: geocoding and routing failures fall through to the region matrix,
 * then to great-circle between region centres, then to a fixed default.
 */
export class DistanceResolver {
    private geocoder: GeocodingProvider;
    private router: RoutingProvider;
    private cache: GeocodeCache;
    private reference: ReferenceDataStore;
    private retryPolicy: RetryPolicy;
    private wait: Sleep;

    constructor(deps: DistanceResolverDeps) {
        this.geocoder = deps.geocoder;
        this.router = deps.router;
        this.cache = deps.cache;
        this.reference = deps.reference;
        this.retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
        this.wait = deps.sleep ?? sleep;
    }

    async resolveDistance(from: Location, to: Location): Promise<DistanceEstimate> {
        const fromCoords = await this.coordinatesFor(from);
        const toCoords = await this.coordinatesFor(to);

        if (fromCoords && toCoords) {
            const roadKm = await this.roadDistance(fromCoords, toCoords);
            if (roadKm !== undefined) {
                return { distanceKm: roadKm, source: 'road' };
            }
        }

        const estimate = this.matrixDistance(from.region, to.region);
        console.warn(`[distance] Using ${estimate.source} distance ${estimate.distanceKm} km for ${from.region} -> ${to.region}`);
        return estimate;
    }

    async coordinatesFor(location: Location): Promise<Coordinates | undefined> {
        if (location.coordinates) return location.coordinates;

        const address = composeAddress(location);
        const cached = this.cache.get(address);
        if (cached !== undefined) {
            return cached ?? undefined;
        }

        const result = await retryWithBackoff(
            'geocode',
            () => this.geocoder.geocode(address),
            this.retryPolicy,
            this.wait,
        );
        if (!result.ok) {
            // failures are not cached; the next request tries again
            console.warn(`[geocode] No coordinates for "${address}" after ${result.attempts} attempt(s): ${result.reason}`);
            return undefined;
        }

        await this.cache.set(address, result.value);
        return result.value;
    }

    private async roadDistance(from: Coordinates, to: Coordinates): Promise<number | undefined> {
        const result = await retryWithBackoff(
            'routing',
            () => this.router.roadDistanceKm(from, to),
            this.retryPolicy,
            this.wait,
        );
        if (!result.ok) {
            console.warn(`[routing] Road distance unavailable after ${result.attempts} attempt(s): ${result.reason}`);
            return undefined;
        }
        return positiveFinite(result.value);
    }

    matrixDistance(fromRegion: string, toRegion: string): DistanceEstimate {
        const estimate = firstAvailable<DistanceEstimate>(
            () => this.storedDistance(fromRegion, toRegion, 'matrix'),
            () => this.storedDistance(toRegion, fromRegion, 'matrix-reverse'),
            () => this.greatCircleDistance(fromRegion, toRegion),
        );
        return estimate ?? { distanceKm: DEFAULT_DISTANCE_KM, source: 'default' };
    }

    private storedDistance(
        fromRegion: string,
        toRegion: string,
        source: 'matrix' | 'matrix-reverse',
    ): DistanceEstimate | undefined {
        const distanceKm = positiveFinite(this.reference.getRouteRate(fromRegion, toRegion)?.distanceKm);
        return distanceKm === undefined ? undefined : { distanceKm, source };
    }

    private greatCircleDistance(fromRegion: string, toRegion: string): DistanceEstimate | undefined {
        const fromCenter = this.reference.getRegionCenter(fromRegion);
        const toCenter = this.reference.getRegionCenter(toRegion);
        if (!fromCenter || !toCenter) return undefined;

        const distanceKm = positiveFinite(round1(haversine(fromCenter, toCenter) * ROAD_INFLATION_FACTOR));
        return distanceKm === undefined ? undefined : { distanceKm, source: 'great-circle' };
    }
}
