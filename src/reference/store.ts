import { ZodError } from 'zod';
import {
    BackhaulParams,
    CongestionCharge,
    ContainerRate,
    Coordinates,
    CorrectionFactors,
    CrisisWindow,
    FreightIndex,
    FuelSurcharge,
    HubDestination,
    LaneRate,
    Port,
    Quarter,
    RegionEntry,
    RouteRate,
} from '../domain/models';
import { buildBucketTable } from './buckets';
import { ReferenceData, referenceDataSchema } from './schemas';

const pairKey = (...parts: string[]): string => parts.join('::');

export function regionKey(countryCode: string, postalCode: string): string {
    return `${countryCode}_${postalCode}`;
}

export class ReferenceDataError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'ReferenceDataError';
    }
}

/**
 * Read-only lookup tables for the whole process. Built once from parsed rows;
 * every lookup returns undefined when the table has no entry.
 */
export class ReferenceDataStore {
    private regions = new Map<string, RegionEntry>();
    private regionCenters = new Map<string, Coordinates>();
    private routeRates = new Map<string, RouteRate>();
    private ports = new Map<string, Port>();
    private containerRates = new Map<string, ContainerRate>();
    private fuelSurcharges = new Map<string, FuelSurcharge>();
    private ecologicalCharges = new Map<string, number>();
    private quarterlySeasonal = new Map<string, number>();
    // portId -> level -> containerType; levels keep first-seen order
    private congestion = new Map<string, Map<string, Map<string, CongestionCharge>>>();
    private crisisWindows = new Map<string, CrisisWindow[]>();
    private indices = new Map<string, FreightIndex>();
    private routeIndexWeights = new Map<string, Map<string, number>>();
    private laneRates = new Map<string, LaneRate>();
    private backhaul = new Map<string, BackhaulParams>();
    private hubDestinations = new Map<string, HubDestination>();

    readonly correctionFactors: CorrectionFactors;

    constructor(data: ReferenceData) {
        for (const row of data.regions) {
            const entry: RegionEntry = {
                countryCode: row.countryCode,
                postalCode: row.postalCode,
                region: row.region,
                placeName: row.placeName,
                ...(row.latitude !== undefined && row.longitude !== undefined
                    ? { coordinates: { lat: row.latitude, lon: row.longitude } }
                    : {}),
            };
            this.regions.set(regionKey(row.countryCode, row.postalCode), entry);
        }
        for (const [region, details] of Object.entries(data.regionDetails)) {
            if (details.centerLat !== undefined && details.centerLon !== undefined) {
                this.regionCenters.set(region, { lat: details.centerLat, lon: details.centerLon });
            }
        }
        for (const row of data.routeRates) {
            this.routeRates.set(pairKey(row.fromRegion, row.toRegion), { ...row });
        }

        const cf = data.correctionFactors;
        this.correctionFactors = {
            distance: buildBucketTable(cf.distanceFactors, 'exclusive'),
            ldm: buildBucketTable(cf.ldmFactors, 'inclusive'),
            weight: buildBucketTable(cf.weightFactors, 'inclusive'),
            baseRateLdmCorrection: cf.baseRateLdmCorrection,
            baseRateKmCorrection: cf.baseRateKmCorrection,
            generalCorrection: cf.generalCorrection,
        };

        for (const row of data.ports) {
            this.ports.set(row.id, { ...row });
        }
        for (const row of data.containerRates) {
            this.containerRates.set(
                pairKey(row.originRegion, row.destinationRegion, row.containerType),
                { avgRate: row.avgRate, carriers: row.carriers, notes: row.notes },
            );
        }
        for (const row of data.fuelSurcharges) {
            this.fuelSurcharges.set(
                pairKey(row.originRegion, row.destinationRegion),
                { minPercent: row.minPercent, maxPercent: row.maxPercent },
            );
        }
        for (const row of data.ecologicalCharges) {
            this.ecologicalCharges.set(pairKey(row.region, row.chargeType, row.containerType), row.amount);
        }
        for (const row of data.quarterlySeasonalFactors) {
            this.quarterlySeasonal.set(pairKey(row.originRegion, row.destinationRegion, row.quarter), row.factor);
        }
        for (const row of data.portCongestion) {
            let levels = this.congestion.get(row.portId);
            if (!levels) {
                levels = new Map();
                this.congestion.set(row.portId, levels);
            }
            let byContainer = levels.get(row.congestionLevel);
            if (!byContainer) {
                byContainer = new Map();
                levels.set(row.congestionLevel, byContainer);
            }
            byContainer.set(row.containerType, {
                level: row.congestionLevel,
                containerType: row.containerType,
                amount: row.amount,
                currency: row.currency,
            });
        }
        for (const row of data.crisisCoefficients) {
            const regions = row.regionPair.split('-');
            if (regions.length !== 2) continue;    // malformed pair, skipped like any other bad row
            const [originRegion, destinationRegion] = regions;
            const key = pairKey(originRegion, destinationRegion);
            const windows = this.crisisWindows.get(key) ?? [];
            windows.push({
                originRegion,
                destinationRegion,
                startDate: row.startDate,
                endDate: row.endDate,
                multiplier: row.multiplier,
                description: row.description,
            });
            this.crisisWindows.set(key, windows);
        }
        for (const row of data.freightIndices) {
            this.indices.set(row.name, { ...row });
        }
        for (const row of data.routeIndexWeights) {
            const weights = this.routeIndexWeights.get(row.route) ?? new Map<string, number>();
            weights.set(row.indexName, row.weight);
            this.routeIndexWeights.set(row.route, weights);
        }
        for (const row of data.laneRates) {
            this.laneRates.set(row.countryCode, { ...row });
        }
        for (const row of data.backhaul) {
            this.backhaul.set(row.countryCode, {
                backhaulProbability: row.backhaulProbability,
                maxDiscount: row.maxDiscount,
            });
        }
        for (const row of data.hubDestinations) {
            this.hubDestinations.set(pairKey(row.countryCode, row.city.toLowerCase()), {
                countryCode: row.countryCode,
                city: row.city,
                ratePerKm: row.ratePerKm,
                baseDistanceKm: row.baseDistanceKm,
                customsPerLdm: row.customsPerLdm,
                region: row.region ?? `${row.countryCode}_${row.city.toUpperCase().replace(/\s+/g, '_')}`,
                ...(row.latitude !== undefined && row.longitude !== undefined
                    ? { coordinates: { lat: row.latitude, lon: row.longitude } }
                    : {}),
            });
        }
    }

    get regionCount(): number {
        return this.regions.size;
    }

    get routeRateCount(): number {
        return this.routeRates.size;
    }

    findRegion(countryCode: string, postalCode: string): RegionEntry | undefined {
        return this.regions.get(regionKey(countryCode, postalCode));
    }

    /** Region rows in table order, with their lookup keys. */
    regionEntries(): Iterable<[string, RegionEntry]> {
        return this.regions.entries();
    }

    getRegionCenter(region: string): Coordinates | undefined {
        return this.regionCenters.get(region);
    }

    getRouteRate(fromRegion: string, toRegion: string): RouteRate | undefined {
        return this.routeRates.get(pairKey(fromRegion, toRegion));
    }

    getPort(portId: string): Port | undefined {
        return this.ports.get(portId);
    }

    /** Copies; callers may sort or edit them freely. */
    listPorts(): Port[] {
        return Array.from(this.ports.values(), port => ({ ...port }));
    }

    getContainerRate(originRegion: string, destinationRegion: string, containerType: string): ContainerRate | undefined {
        return this.containerRates.get(pairKey(originRegion, destinationRegion, containerType));
    }

    getFuelSurcharge(originRegion: string, destinationRegion: string): FuelSurcharge | undefined {
        return this.fuelSurcharges.get(pairKey(originRegion, destinationRegion));
    }

    getEcologicalCharge(region: string, chargeType: string, containerType: string): number | undefined {
        return this.ecologicalCharges.get(pairKey(region, chargeType, containerType));
    }

    getQuarterlySeasonalFactor(originRegion: string, destinationRegion: string, quarter: Quarter): number | undefined {
        return this.quarterlySeasonal.get(pairKey(originRegion, destinationRegion, quarter));
    }

    /** First congestion level (in table order) that prices this container type at the port. */
    getCongestionCharge(portId: string, containerType: string): CongestionCharge | undefined {
        const levels = this.congestion.get(portId);
        if (!levels) return undefined;
        for (const byContainer of levels.values()) {
            const charge = byContainer.get(containerType);
            if (charge) return charge;
        }
        return undefined;
    }

    getCrisisWindows(originRegion: string, destinationRegion: string): CrisisWindow[] {
        return this.crisisWindows.get(pairKey(originRegion, destinationRegion)) ?? [];
    }

    listIndices(): FreightIndex[] {
        return Array.from(this.indices.values(), index => ({ ...index }));
    }

    hasRouteIndexWeights(route: string): boolean {
        return this.routeIndexWeights.has(route);
    }

    getRouteIndexWeights(route: string): ReadonlyMap<string, number> | undefined {
        return this.routeIndexWeights.get(route);
    }

    listRouteIndexWeights(): Record<string, Record<string, number>> {
        const result: Record<string, Record<string, number>> = {};
        for (const [route, weights] of this.routeIndexWeights) {
            result[route] = Object.fromEntries(weights);
        }
        return result;
    }

    getLaneRate(countryCode: string): LaneRate | undefined {
        return this.laneRates.get(countryCode);
    }

    getBackhaul(countryCode: string): BackhaulParams | undefined {
        return this.backhaul.get(countryCode);
    }

    getHubDestination(countryCode: string, city: string): HubDestination | undefined {
        return this.hubDestinations.get(pairKey(countryCode, city.trim().toLowerCase()));
    }
}

export function parseReferenceData(raw: unknown): ReferenceDataStore {
    let data: ReferenceData;
    try {
        data = referenceDataSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ReferenceDataError(
                'Invalid reference data',
                err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
            );
        }
        throw err;
    }
    const store = new ReferenceDataStore(data);
    console.log(`[reference] Loaded ${store.regionCount} postal codes and ${store.routeRateCount} route rates`);
    return store;
}
