import { NotFoundError } from '../domain/errors';
import { Location, RegionEntry } from '../domain/models';
import { ReferenceDataStore, regionKey } from '../reference/store';

// Row coordinates only describe the row's own postal code, so prefix matches drop them.
function toLocation(entry: RegionEntry, countryCode: string, postalCode: string, exact: boolean): Location {
    return {
        countryCode,
        postalCode,
        region: entry.region,
        placeName: entry.placeName,
        ...(exact && entry.coordinates ? { coordinates: { ...entry.coordinates } } : {}),
    };
}

/**
 * Maps (country, postal code) to a region. An exact key wins; otherwise the
 * postal code is shortened one character at a time and the region table is
 * scanned in table order for a key starting with `CC_prefix`. The longest
 * prefix with any match wins; among equal prefixes, the first row does.
 */
export class LocationResolver {
    constructor(private readonly reference: ReferenceDataStore) { }

    find(countryCode: string, postalCode: string): Location | undefined {
        const exact = this.reference.findRegion(countryCode, postalCode);
        if (exact) return toLocation(exact, countryCode, postalCode, true);

        for (let length = postalCode.length - 1; length > 0; length--) {
            const wanted = regionKey(countryCode, postalCode.slice(0, length));
            for (const [key, entry] of this.reference.regionEntries()) {
                if (key.startsWith(wanted)) {
                    return toLocation(entry, countryCode, postalCode, false);
                }
            }
        }
        return undefined;
    }

    resolve(countryCode: string, postalCode: string): Location {
        const location = this.find(countryCode, postalCode);
        if (!location) {
            throw new NotFoundError(`Country code or postal code not found: ${countryCode}, ${postalCode}`, {
                countryCode,
                postalCode,
            });
        }
        return location;
    }
}
