import { ContainerType } from '../domain/models';

// kg per loading metre
export const DENSITY_FACTOR = 1850;

export const DEFAULT_RATE_PER_LDM = 350;
export const DEFAULT_RATE_PER_KM = 0.45;

export const DEFAULT_MONTHLY_SEASONAL_FACTORS: Readonly<Record<number, number>> = {
    1: 0.9, 2: 0.9, 3: 0.95, 4: 1.0, 5: 1.0, 6: 1.05,
    7: 0.9, 8: 0.85, 9: 1.1, 10: 1.15, 11: 1.1, 12: 1.0,
};

export const LOAD_EXPONENT = 0.9;
export const DISTANCE_EXPONENT = 0.95;

export const INSURANCE_RATE = 0.035;
// EUR per tonne
export const CO2_RATE_PER_TONNE = 0.02;

export const ROAD_INFLATION_FACTOR = 1.3;
export const DEFAULT_DISTANCE_KM = 1000;

// Multimodal
export const DEFAULT_CONTAINER_WEIGHT_KG = 20_000;
export const FALLBACK_RATE_PER_NM = 0.5;
export const MIN_FALLBACK_CONTAINER_RATE = 1000;
export const CONTAINER_RATE_MULTIPLIERS: Readonly<Record<ContainerType, number>> = {
    [ContainerType.Dry20]: 1.0,
    [ContainerType.Dry40]: 1.4,
    [ContainerType.HighCube40]: 1.5,
};
export const VOLATILITY_EXPONENT = 1.2;
export const ECOLOGICAL_CHARGE_TYPES = ['ECA', 'CLS'] as const;
export const DEFAULT_CONGESTION_LEVEL = 'medium';

// Via-hub
export const HUB_MIN_LDM = 1;
export const HUB_MAX_LDM = 10;
export const HUB_INSURANCE_RATE = 0.05;
export const HUB_CO2_RATE_PER_KG = 0.008;
export const DEFAULT_BACKHAUL_PROBABILITY = 0.5;
export const DEFAULT_BACKHAUL_MAX_DISCOUNT = 0.2;
export const TERMINAL_FEE_PER_TONNE = 50;
