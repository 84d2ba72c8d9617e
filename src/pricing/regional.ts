import { CalculationError } from '../domain/errors';
import { CorrectionFactors, RegionalPriceBreakdown, RouteRate } from '../domain/models';
import { lookupBucket } from '../reference/buckets';
import { ReferenceDataStore } from '../reference/store';
import { round2 } from '../lib/round';
import {
    CO2_RATE_PER_TONNE,
    DEFAULT_MONTHLY_SEASONAL_FACTORS,
    DEFAULT_RATE_PER_KM,
    DEFAULT_RATE_PER_LDM,
    DENSITY_FACTOR,
    DISTANCE_EXPONENT,
    INSURANCE_RATE,
    LOAD_EXPONENT,
} from './constants';

export interface RegionalPriceInput {
    distanceKm: number;
    loadUnits: number;
    weightKg: number;
    originRegion: string;
    destinationRegion: string;
    month?: number;      // 1-12; no seasonal adjustment when absent
}

export function chargeableLoad(loadUnits: number, weightKg: number): number {
    return Math.max(loadUnits, weightKg / DENSITY_FACTOR);
}

function requireFinite(name: string, value: number, predicate: (v: number) => boolean, expected: string): void {
    if (!Number.isFinite(value) || !predicate(value)) {
        throw new CalculationError(`${name} must be ${expected}`, { field: name, value });
    }
}

function seasonalFactorFor(rate: RouteRate | undefined, month: number | undefined): number {
    if (month === undefined) return 1;
    const table = rate ? rate.seasonalFactors : DEFAULT_MONTHLY_SEASONAL_FACTORS;
    return table[month] ?? 1;
}

/**
 * Regional road pricing. Missing rate data degrades to defaults; only a
 * missing or non-finite mandatory input fails the calculation.
 */
export class RegionalPricer {
    constructor(private readonly reference: ReferenceDataStore) { }

    price(input: RegionalPriceInput): RegionalPriceBreakdown {
        requireFinite('distanceKm', input.distanceKm, v => v > 0, 'a positive number');
        requireFinite('loadUnits', input.loadUnits, v => v > 0, 'a positive number');
        requireFinite('weightKg', input.weightKg, v => v >= 0, 'a non-negative number');
        if (!input.originRegion || !input.destinationRegion) {
            throw new CalculationError('Origin and destination regions are required', {
                originRegion: input.originRegion,
                destinationRegion: input.destinationRegion,
            });
        }
        if (input.month !== undefined && !(Number.isInteger(input.month) && input.month >= 1 && input.month <= 12)) {
            throw new CalculationError('month must be an integer between 1 and 12', { field: 'month', value: input.month });
        }

        const factors: CorrectionFactors = this.reference.correctionFactors;
        const load = chargeableLoad(input.loadUnits, input.weightKg);

        const rate = this.reference.getRouteRate(input.originRegion, input.destinationRegion);
        const baseRatePerLdm = (rate?.baseRatePerLdm ?? DEFAULT_RATE_PER_LDM) * factors.baseRateLdmCorrection;
        const baseRatePerKm = (rate?.baseRatePerKm ?? DEFAULT_RATE_PER_KM) * factors.baseRateKmCorrection;

        const distanceFactor = lookupBucket(factors.distance, input.distanceKm) ?? 1;
        // LDM band goes by what was declared, not the chargeable load
        const ldmCorrection = lookupBucket(factors.ldm, input.loadUnits) ?? 1;
        const weightCorrection = lookupBucket(factors.weight, input.weightKg) ?? 1;
        const volumeCorrection = Math.min(ldmCorrection, weightCorrection);

        const scaledLoad = Math.pow(load, LOAD_EXPONENT);
        const byLdm = baseRatePerLdm * scaledLoad;
        const byKm = baseRatePerKm * Math.pow(input.distanceKm, DISTANCE_EXPONENT) * scaledLoad;
        const baseCost = Math.max(byLdm, byKm) * distanceFactor * volumeCorrection;

        const seasonalFactor = seasonalFactorFor(rate, input.month);
        const adjustedCost = baseCost * factors.generalCorrection * seasonalFactor;

        const insurance = adjustedCost * INSURANCE_RATE;
        const co2 = input.weightKg * CO2_RATE_PER_TONNE / 1000;
        const total = round2(adjustedCost + insurance + co2);

        return {
            chargeableLdm: load,
            rateSource: rate ? 'route' : 'default',
            baseRatePerLdm,
            baseRatePerKm,
            distanceFactor,
            ldmCorrection,
            weightCorrection,
            volumeCorrection,
            baseCost,
            generalCorrection: factors.generalCorrection,
            seasonalFactor,
            adjustedCost,
            surcharges: [
                { name: 'insurance', amount: round2(insurance) },
                { name: 'co2', amount: round2(co2) },
            ],
            total,
        };
    }
}
