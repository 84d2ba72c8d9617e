import { BucketBand, BucketTable } from '../domain/models';

const RANGE_KEY = /^(\d+(?:\.\d+)?)-(\d+(?:\.\d+)?)$/;
const OPEN_KEY = /^(\d+(?:\.\d+)?)\+$/;

/** "500-1000" -> { lower: 500, upper: 1000 }, "2000+" -> { lower: 2000 } */
export function parseBucketKey(key: string): Pick<BucketBand, 'lower' | 'upper'> | undefined {
    const range = RANGE_KEY.exec(key.trim());
    if (range) {
        const lower = parseFloat(range[1]);
        const upper = parseFloat(range[2]);
        return upper > lower ? { lower, upper } : undefined;
    }
    const open = OPEN_KEY.exec(key.trim());
    if (open) {
        return { lower: parseFloat(open[1]) };
    }
    return undefined;
}

export function buildBucketTable(
    factors: Record<string, number>,
    upperBound: BucketTable['upperBound'],
): BucketTable {
    const bands: BucketBand[] = [];
    for (const [key, factor] of Object.entries(factors)) {
        const bounds = parseBucketKey(key);
        if (!bounds) {
            throw new Error(`Invalid correction bucket key "${key}"`);
        }
        bands.push({ ...bounds, factor });
    }
    bands.sort((a, b) => a.lower - b.lower);
    return { bands, upperBound };
}

/**
 * Bands are checked from the lowest up; the first band whose upper bound
 * admits the value wins, so the first band also covers anything below it.
 */
export function lookupBucket(table: BucketTable, value: number): number | undefined {
    for (const band of table.bands) {
        if (band.upper === undefined) return band.factor;
        const fits = table.upperBound === 'exclusive' ? value < band.upper : value <= band.upper;
        if (fits) return band.factor;
    }
    return undefined;
}
