import { BackhaulParams, HubDestination, LaneRate } from '../domain/models';
import {
    DEFAULT_BACKHAUL_MAX_DISCOUNT,
    DEFAULT_BACKHAUL_PROBABILITY,
    HUB_CO2_RATE_PER_KG,
    HUB_INSURANCE_RATE,
    TERMINAL_FEE_PER_TONNE,
} from './constants';

const DEFAULT_BACKHAUL: BackhaulParams = {
    backhaulProbability: DEFAULT_BACKHAUL_PROBABILITY,
    maxDiscount: DEFAULT_BACKHAUL_MAX_DISCOUNT,
};

/**
 * Feeder leg into the hub, priced on the origin country's lane rate.
 * The expected backhaul discount is probability * maxDiscount.
 */
export function priceFeederLeg(
    lane: LaneRate,
    backhaul: BackhaulParams | undefined,
    distanceKm: number,
    ldm: number,
    weightKg: number,
): number {
    const baseCost = Math.max(
        lane.baseRatePerLoadingMeter * ldm,
        lane.baseRatePerKm * distanceKm * ldm,
    ) * lane.coefficient;
    const { backhaulProbability, maxDiscount } = backhaul ?? DEFAULT_BACKHAUL;
    const discounted = baseCost * (1 - backhaulProbability * maxDiscount);
    const insurance = discounted * HUB_INSURANCE_RATE;
    const co2 = weightKg * HUB_CO2_RATE_PER_KG;
    return discounted + insurance + co2;
}

/** Onward leg from the hub: flat per-km tariff over the lane's base distance plus customs. */
export function priceOnwardLeg(destination: HubDestination, chargeableLdm: number): number {
    const transport = destination.ratePerKm * destination.baseDistanceKm * chargeableLdm;
    const customs = destination.customsPerLdm * chargeableLdm;
    return transport + customs;
}

export function terminalFee(weightKg: number): number {
    return Math.ceil(weightKg / 1000) * TERMINAL_FEE_PER_TONNE;
}
