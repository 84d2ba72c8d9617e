import { CalculationError } from '../domain/errors';
import { ContainerType, MultimodalQuote, Port, Quarter, Surcharge } from '../domain/models';
import { EARTH_RADIUS_NM, haversine } from '../geo/haversine';
import { ReferenceDataStore } from '../reference/store';
import { round2 } from '../lib/round';
import {
    CO2_RATE_PER_TONNE,
    CONTAINER_RATE_MULTIPLIERS,
    DEFAULT_CONGESTION_LEVEL,
    ECOLOGICAL_CHARGE_TYPES,
    FALLBACK_RATE_PER_NM,
    INSURANCE_RATE,
    MIN_FALLBACK_CONTAINER_RATE,
    VOLATILITY_EXPONENT,
} from './constants';

export type IndexedPrice = Omit<MultimodalQuote, 'quoteId' | 'quotedAt'>;

export interface IndexedPriceInput {
    origin: Port;
    destination: Port;
    containerType: ContainerType;
    weightKg: number;
    date: string;        // YYYY-MM-DD
}

const GENERALISED_REGIONS: Readonly<Record<string, string>> = {
    'North America East': 'North America',
    'North America West': 'North America',
};

export function quarterOf(date: string): Quarter {
    const month = parseInt(date.slice(5, 7), 10);
    if (!(month >= 1 && month <= 12)) {
        throw new CalculationError(`Invalid calendar date "${date}"`, { field: 'date', value: date });
    }
    const quarters: Quarter[] = ['Q1', 'Q2', 'Q3', 'Q4'];
    return quarters[Math.floor((month - 1) / 3)];
}

/**
 * Route key under which index weights are stored, trying progressively
 * looser spellings of the pair. Direction matters; callers try the reverse
 * pair themselves.
 */
export function resolveRouteKey(
    origin: string,
    destination: string,
    isKnown: (route: string) => boolean,
): string | undefined {
    const candidates: string[] = [`${origin}-${destination}`];

    const generalOrigin = GENERALISED_REGIONS[origin];
    if (generalOrigin) candidates.push(`${generalOrigin}-${destination}`);
    const generalDestination = GENERALISED_REGIONS[destination];
    if (generalDestination) candidates.push(`${origin}-${generalDestination}`);

    if (origin === destination) candidates.push(`Intra-${origin}`);

    if (origin.includes(' ')) candidates.push(`${origin.replace(/ /g, '')}-${destination}`);
    if (destination.includes(' ')) candidates.push(`${origin}-${destination.replace(/ /g, '')}`);

    return candidates.find(isKnown);
}

/** Inclusive on both ends; ISO dates compare correctly as strings. */
function isActiveOn(date: string, startDate: string, endDate: string): boolean {
    return startDate <= date && date <= endDate;
}

export class IndexedPricer {
    constructor(private readonly reference: ReferenceDataStore) { }

    /** Route key and weights used for the index blend, forward pair first. */
    routeWeights(originRegion: string, destinationRegion: string): { routeKey: string; weights: ReadonlyMap<string, number> } | undefined {
        const isKnown = (route: string) => this.reference.hasRouteIndexWeights(route);
        const routeKey = resolveRouteKey(originRegion, destinationRegion, isKnown)
            ?? resolveRouteKey(destinationRegion, originRegion, isKnown);
        if (!routeKey) return undefined;
        const weights = this.reference.getRouteIndexWeights(routeKey);
        return weights ? { routeKey, weights } : undefined;
    }

    weightedIndexChange(originRegion: string, destinationRegion: string): number {
        const route = this.routeWeights(originRegion, destinationRegion);
        let weightedChange = 0;
        let totalWeight = 0;

        for (const index of this.reference.listIndices()) {
            const weight = route ? route.weights.get(index.name) : index.weight;
            if (weight === undefined) continue;
            const changePercent = (index.currentValue - index.baseValue) / index.baseValue * 100;
            weightedChange += changePercent * weight;
            totalWeight += weight;
        }
        return totalWeight > 0 ? weightedChange / totalWeight : 0;
    }

    crisisMultiplier(originRegion: string, destinationRegion: string, date: string): number {
        const active = this.reference.getCrisisWindows(originRegion, destinationRegion)
            .filter(w => isActiveOn(date, w.startDate, w.endDate));
        return active.length > 0 ? Math.max(...active.map(w => w.multiplier)) : 1;
    }

    price(input: IndexedPriceInput): IndexedPrice {
        const { origin, destination, containerType, weightKg, date } = input;
        if (!Number.isFinite(weightKg) || weightKg <= 0) {
            throw new CalculationError('weightKg must be a positive number', { field: 'weightKg', value: weightKg });
        }

        const distanceNm = haversine(
            { lat: origin.latitude, lon: origin.longitude },
            { lat: destination.latitude, lon: destination.longitude },
            EARTH_RADIUS_NM,
        );

        const contract = this.reference.getContainerRate(origin.region, destination.region, containerType);
        const baseRate = contract
            ? contract.avgRate
            : Math.max(distanceNm * FALLBACK_RATE_PER_NM * CONTAINER_RATE_MULTIPLIERS[containerType], MIN_FALLBACK_CONTAINER_RATE);

        const weightedIndexChange = this.weightedIndexChange(origin.region, destination.region);
        const volatilityFactor = Math.pow(1 + weightedIndexChange / 100, VOLATILITY_EXPONENT);
        if (!Number.isFinite(volatilityFactor)) {
            throw new CalculationError('Index change produced a non-finite volatility factor', { weightedIndexChange });
        }
        const crisisMultiplier = this.crisisMultiplier(origin.region, destination.region, date);
        const quarter = quarterOf(date);
        const seasonalFactor = this.reference.getQuarterlySeasonalFactor(origin.region, destination.region, quarter) ?? 1;

        const adjustedRate = baseRate * volatilityFactor * crisisMultiplier * seasonalFactor;

        const fuel = this.reference.getFuelSurcharge(origin.region, destination.region);
        const fuelSurchargePercent = fuel ? (fuel.minPercent + fuel.maxPercent) / 2 : 0;
        const fuelSurcharge = adjustedRate * fuelSurchargePercent / 100;

        const ecoCharge = (region: string) => ECOLOGICAL_CHARGE_TYPES.reduce(
            (sum, chargeType) => sum + (this.reference.getEcologicalCharge(region, chargeType, containerType) ?? 0),
            0,
        );
        const ecoOrigin = ecoCharge(origin.region);
        const ecoDestination = ecoCharge(destination.region);

        const originCongestion = this.reference.getCongestionCharge(origin.id, containerType);
        const destinationCongestion = this.reference.getCongestionCharge(destination.id, containerType);

        const costBeforeInsurance = adjustedRate + fuelSurcharge + ecoOrigin + ecoDestination
            + (originCongestion?.amount ?? 0) + (destinationCongestion?.amount ?? 0);
        const insurance = costBeforeInsurance * INSURANCE_RATE;
        const co2 = weightKg * CO2_RATE_PER_TONNE / 1000;

        const surcharges: Surcharge[] = [
            { name: 'fuel', amount: round2(fuelSurcharge) },
            { name: 'eco-origin', amount: round2(ecoOrigin) },
            { name: 'eco-destination', amount: round2(ecoDestination) },
            { name: 'congestion-origin', amount: round2(originCongestion?.amount ?? 0) },
            { name: 'congestion-destination', amount: round2(destinationCongestion?.amount ?? 0) },
            { name: 'insurance', amount: round2(insurance) },
            { name: 'co2', amount: round2(co2) },
        ];

        const route = this.routeWeights(origin.region, destination.region);

        return {
            origin: { id: origin.id, name: origin.name, country: origin.country, region: origin.region },
            destination: { id: destination.id, name: destination.name, country: destination.country, region: destination.region },
            containerType,
            weightKg,
            distanceNm: round2(distanceNm),
            baseRate: round2(baseRate),
            rateSource: contract ? 'container-rate' : 'distance-fallback',
            carriers: contract?.carriers ?? 'Estimated rate',
            notes: contract?.notes ?? 'Calculated from sea distance',
            weightedIndexChange: round2(weightedIndexChange),
            volatilityFactor,
            crisisMultiplier,
            quarter,
            seasonalFactor,
            adjustedRate: round2(adjustedRate),
            fuelSurchargePercent,
            originCongestionLevel: originCongestion?.level ?? DEFAULT_CONGESTION_LEVEL,
            destinationCongestionLevel: destinationCongestion?.level ?? DEFAULT_CONGESTION_LEVEL,
            surcharges,
            ...(route ? { routeKey: route.routeKey, indexWeights: Object.fromEntries(route.weights) } : {}),
            total: round2(costBeforeInsurance + insurance + co2),
        };
    }
}
