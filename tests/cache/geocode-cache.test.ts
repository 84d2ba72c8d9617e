import { GeocodeCache, normalizeAddress } from '../../src/cache/geocode-cache';
import { BERLIN, InMemoryGeocodeStore } from '../helpers';

describe('normalizeAddress', () => {
    it('should trim, collapse whitespace and lower-case', () => {
        expect(normalizeAddress('  10115,   Berlin, DE ')).toBe('10115, berlin, de');
    });
});

describe('GeocodeCache', () => {
    it('should load entries from the store under normalised keys', async () => {
        const store = new InMemoryGeocodeStore({
            '10115, Berlin, DE': BERLIN,
            '00000, Nowhere, DE': null,
        });

        const cache = await GeocodeCache.open(store);

        expect(cache.size).toBe(2);
        expect(cache.get('10115, berlin, de')).toEqual(BERLIN);
        expect(cache.get('00000, Nowhere, DE')).toBeNull();
        expect(cache.get('75001, Paris, FR')).toBeUndefined();
        expect(console.log).toHaveBeenCalledWith('[cache] Loaded 2 cached coordinates from memory store');
    });

    it('should persist every insertion with the full snapshot', async () => {
        const store = new InMemoryGeocodeStore();
        const cache = await GeocodeCache.open(store);

        await cache.set('10115, Berlin, DE', BERLIN);
        await cache.set('75001, Paris, FR', { lat: 48.8606, lon: 2.3376 });

        expect(cache.has('75001, PARIS, FR')).toBe(true);
        expect(store.writes).toEqual([
            { address: '10115, berlin, de', value: BERLIN, size: 1 },
            { address: '75001, paris, fr', value: { lat: 48.8606, lon: 2.3376 }, size: 2 },
        ]);
    });

    it('should serialise concurrent writes in insertion order', async () => {
        const order: string[] = [];
        const store = new InMemoryGeocodeStore();
        const write = jest.spyOn(store, 'write').mockImplementation(async (_snapshot, address) => {
            order.push(`start:${address}`);
            await new Promise(resolve => setImmediate(resolve));
            order.push(`end:${address}`);
        });
        const cache = await GeocodeCache.open(store);

        await Promise.all([
            cache.set('a', BERLIN),
            cache.set('b', BERLIN),
        ]);

        expect(write).toHaveBeenCalledTimes(2);
        expect(order).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
    });

    it('should keep the entry in memory and log when persisting fails', async () => {
        const store = new InMemoryGeocodeStore();
        jest.spyOn(store, 'write').mockRejectedValueOnce(new Error('disk full'));
        const cache = await GeocodeCache.open(store);

        await cache.set('10115, Berlin, DE', BERLIN);
        await cache.set('75001, Paris, FR', BERLIN);

        expect(cache.get('10115, Berlin, DE')).toEqual(BERLIN);
        expect(console.error).toHaveBeenCalledWith(
            '[cache] Failed to persist geocode cache to memory store:',
            'disk full',
        );
        await expect(cache.flush()).resolves.toBeUndefined();
    });
});
