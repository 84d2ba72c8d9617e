import { Coordinates } from '../src/domain/models';
import { CachedCoordinates, GeocodeCache, GeocodeEntries, GeocodeStore } from '../src/cache/geocode-cache';
import { GeocodingProvider, RoutingProvider } from '../src/geo/types';
import { AttemptOutcome, RetryPolicy } from '../src/http/retry';
import { parseReferenceData, ReferenceDataStore } from '../src/reference/store';
import { DistanceResolver } from '../src/services/distance-resolver';
import referenceFixture from './fixtures/reference-data.json';

export const BERLIN: Coordinates = { lat: 52.532, lon: 13.3849 };
export const DUSSELDORF: Coordinates = { lat: 51.2254, lon: 6.7763 };

export const TEST_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    initialDelayMs: 2000,
    backoffFactor: 2,
};

export function buildReference(): ReferenceDataStore {
    return parseReferenceData(referenceFixture);
}

/** GeocodeStore kept in memory; records every write for assertions. */
export class InMemoryGeocodeStore implements GeocodeStore {
    readonly kind = 'memory';
    readonly writes: Array<{ address: string; value: CachedCoordinates; size: number }> = [];

    constructor(private initial: Record<string, CachedCoordinates> = {}) { }

    async load(): Promise<Map<string, CachedCoordinates>> {
        return new Map(Object.entries(this.initial));
    }

    async write(snapshot: GeocodeEntries, address: string, value: CachedCoordinates): Promise<void> {
        this.writes.push({ address, value, size: snapshot.size });
    }
}

export function createStubGeocoder(outcome: AttemptOutcome<Coordinates> = { kind: 'success', value: BERLIN }) {
    const geocode = jest.fn<Promise<AttemptOutcome<Coordinates>>, [string]>().mockResolvedValue(outcome);
    const geocoder: GeocodingProvider = { name: 'stub-geocoder', geocode };
    return { geocoder, geocode };
}

export function createStubRouter(outcome: AttemptOutcome<number> = { kind: 'success', value: 480 }) {
    const roadDistanceKm = jest.fn<Promise<AttemptOutcome<number>>, [Coordinates, Coordinates]>().mockResolvedValue(outcome);
    const router: RoutingProvider = { name: 'stub-router', roadDistanceKm };
    return { router, roadDistanceKm };
}

export async function createDistanceResolver(options: {
    geocoder?: GeocodingProvider;
    router?: RoutingProvider;
    store?: GeocodeStore;
    reference?: ReferenceDataStore;
} = {}) {
    const reference = options.reference ?? buildReference();
    const store = options.store ?? new InMemoryGeocodeStore();
    const cache = await GeocodeCache.open(store);
    const { geocoder, geocode } = createStubGeocoder();
    const { router, roadDistanceKm } = createStubRouter();
    const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);

    const resolver = new DistanceResolver({
        geocoder: options.geocoder ?? geocoder,
        router: options.router ?? router,
        cache,
        reference,
        retryPolicy: TEST_RETRY_POLICY,
        sleep,
    });
    return { resolver, cache, reference, sleep, geocode, roadDistanceKm };
}
