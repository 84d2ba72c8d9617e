import { Location } from '../../src/domain/models';
import { composeAddress } from '../../src/services/distance-resolver';
import { BERLIN, createDistanceResolver, createStubGeocoder, createStubRouter, InMemoryGeocodeStore } from '../helpers';

const DUSSELDORF_LOCATION: Location = { countryCode: 'DE', postalCode: '40210', region: 'DE_WEST', placeName: 'Düsseldorf' };
const BERLIN_LOCATION: Location = { countryCode: 'DE', postalCode: '10115', region: 'DE_EAST', placeName: 'Berlin' };
const LILLE_LOCATION: Location = { countryCode: 'FR', postalCode: '59000', region: 'FR_NORTH', placeName: 'Lille' };
const MILANO_LOCATION: Location = { countryCode: 'IT', postalCode: '20121', region: 'IT_NORTH', placeName: 'Milano' };
const ROTTERDAM_LOCATION: Location = { countryCode: 'NL', postalCode: '3011', region: 'NL_WEST', placeName: 'Rotterdam' };

describe('composeAddress', () => {
    it('should join postal code, place and country', () => {
        expect(composeAddress(DUSSELDORF_LOCATION)).toBe('40210, Düsseldorf, DE');
    });

    it('should leave out an empty postal code', () => {
        expect(composeAddress({ countryCode: 'KZ', postalCode: '', region: 'KZ_ALMATY', placeName: 'Almaty' }))
            .toBe('Almaty, KZ');
    });
});

describe('DistanceResolver', () => {
    it('should return the road distance when both endpoints geocode', async () => {
        const { resolver, geocode, roadDistanceKm } = await createDistanceResolver();

        const estimate = await resolver.resolveDistance(DUSSELDORF_LOCATION, LILLE_LOCATION);

        expect(estimate).toEqual({ distanceKm: 480, source: 'road' });
        expect(geocode.mock.calls).toEqual([['40210, Düsseldorf, DE'], ['59000, Lille, FR']]);
        expect(roadDistanceKm).toHaveBeenCalledTimes(1);
    });

    it('should not call the geocoder again for a cached address', async () => {
        const { resolver, geocode } = await createDistanceResolver();

        await resolver.resolveDistance(DUSSELDORF_LOCATION, LILLE_LOCATION);
        await resolver.resolveDistance(DUSSELDORF_LOCATION, LILLE_LOCATION);

        expect(geocode).toHaveBeenCalledTimes(2);
    });

    it('should persist newly geocoded addresses', async () => {
        const store = new InMemoryGeocodeStore();
        const { resolver } = await createDistanceResolver({ store });

        await resolver.coordinatesFor(DUSSELDORF_LOCATION);

        expect(store.writes).toEqual([{ address: '40210, düsseldorf, de', value: BERLIN, size: 1 }]);
    });

    it('should use known coordinates without geocoding', async () => {
        const { resolver, geocode } = await createDistanceResolver();
        const paris: Location = { ...LILLE_LOCATION, coordinates: { lat: 48.8606, lon: 2.3376 } };

        expect(await resolver.coordinatesFor(paris)).toEqual({ lat: 48.8606, lon: 2.3376 });
        expect(geocode).not.toHaveBeenCalled();
    });

    it('should treat a cached not-found entry as a miss without calling the geocoder', async () => {
        const store = new InMemoryGeocodeStore({ '40210, Düsseldorf, DE': null });
        const { resolver, geocode, roadDistanceKm } = await createDistanceResolver({ store });

        const estimate = await resolver.resolveDistance(DUSSELDORF_LOCATION, LILLE_LOCATION);

        expect(geocode.mock.calls).toEqual([['59000, Lille, FR']]);
        expect(roadDistanceKm).not.toHaveBeenCalled();
        expect(estimate).toEqual({ distanceKm: 500, source: 'matrix' });
    });

    it('should retry geocoding three times and not cache the failure', async () => {
        const { geocoder, geocode } = createStubGeocoder({ kind: 'retryable', reason: 'timeout' });
        const store = new InMemoryGeocodeStore();
        const { resolver, sleep, cache } = await createDistanceResolver({ geocoder, store });

        expect(await resolver.coordinatesFor(DUSSELDORF_LOCATION)).toBeUndefined();
        expect(geocode).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls).toEqual([[2000], [4000]]);
        expect(cache.has('40210, Düsseldorf, DE')).toBe(false);
        expect(store.writes).toEqual([]);

        await resolver.coordinatesFor(DUSSELDORF_LOCATION);
        expect(geocode).toHaveBeenCalledTimes(6);
    });

    it('should fall back to the matrix, not the default, when routing fails', async () => {
        const { router, roadDistanceKm } = createStubRouter({ kind: 'retryable', reason: 'HTTP 503' });
        const { resolver, sleep } = await createDistanceResolver({ router });

        const estimate = await resolver.resolveDistance(DUSSELDORF_LOCATION, LILLE_LOCATION);

        expect(roadDistanceKm).toHaveBeenCalledTimes(3);
        expect(sleep).toHaveBeenCalledTimes(2);
        expect(estimate).toEqual({ distanceKm: 500, source: 'matrix' });
    });

    it('should fall back when the router returns a non-positive distance', async () => {
        const { router } = createStubRouter({ kind: 'success', value: 0 });
        const { resolver } = await createDistanceResolver({ router });

        const estimate = await resolver.resolveDistance(DUSSELDORF_LOCATION, LILLE_LOCATION);

        expect(estimate.source).toBe('matrix');
    });

    describe('matrixDistance', () => {
        it('should use the reverse pair when the direct pair is missing', async () => {
            const { resolver } = await createDistanceResolver();
            expect(resolver.matrixDistance(BERLIN_LOCATION.region, LILLE_LOCATION.region))
                .toEqual({ distanceKm: 1050, source: 'matrix-reverse' });
        });

        it('should inflate the great-circle distance between region centres', async () => {
            const { resolver } = await createDistanceResolver();
            expect(resolver.matrixDistance(DUSSELDORF_LOCATION.region, MILANO_LOCATION.region))
                .toEqual({ distanceKm: 864.7, source: 'great-circle' });
        });

        it('should return the default distance when no centre is known', async () => {
            const { resolver } = await createDistanceResolver();
            expect(resolver.matrixDistance(ROTTERDAM_LOCATION.region, MILANO_LOCATION.region))
                .toEqual({ distanceKm: 1000, source: 'default' });
        });
    });
});
