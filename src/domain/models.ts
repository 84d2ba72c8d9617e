export enum ContainerType {
    Dry20 = '20dv',
    Dry40 = '40dv',
    HighCube40 = '40hc',
}

export type Quarter = 'Q1' | 'Q2' | 'Q3' | 'Q4';

export interface Coordinates {
    lat: number;
    lon: number;
}

// A resolved endpoint. Coordinates are only known up front when the reference row carries them.
export interface Location {
    countryCode: string;     // ISO 3166-1 alpha-2
    postalCode: string;      // empty for city-level destinations
    region: string;
    placeName: string;
    coordinates?: Coordinates;
}

export interface RegionEntry {
    countryCode: string;
    postalCode: string;
    region: string;
    placeName: string;
    coordinates?: Coordinates;
}

export interface RouteRate {
    fromRegion: string;
    toRegion: string;
    distanceKm: number;
    baseRatePerLdm: number;
    baseRatePerKm: number;
    coefficient: number;
    seasonalFactors: Record<string, number>;   // "1".."12"
    urgencyFactors: Record<string, number>;
}

export interface BucketBand {
    lower: number;
    upper?: number;          // undefined = open-ended ("2000+")
    factor: number;
}

export interface BucketTable {
    bands: BucketBand[];
    upperBound: 'exclusive' | 'inclusive';
}

export interface CorrectionFactors {
    distance: BucketTable;
    ldm: BucketTable;
    weight: BucketTable;
    baseRateLdmCorrection: number;
    baseRateKmCorrection: number;
    generalCorrection: number;
}

export interface Port {
    id: string;
    name: string;
    country: string;
    region: string;
    latitude: number;
    longitude: number;
}

export interface ContainerRate {
    avgRate: number;
    carriers: string;
    notes: string;
}

export interface FuelSurcharge {
    minPercent: number;
    maxPercent: number;
}

export interface CrisisWindow {
    originRegion: string;
    destinationRegion: string;
    startDate: string;       // YYYY-MM-DD, inclusive
    endDate: string;         // YYYY-MM-DD, inclusive
    multiplier: number;
    description: string;
}

export interface FreightIndex {
    name: string;
    currentValue: number;
    baseValue: number;
    weight: number;          // default weight, used when the route has no override
    description: string;
}

export interface RouteIndexWeight {
    route: string;
    indexName: string;
    weight: number;
}

export interface CongestionCharge {
    level: string;
    containerType: string;
    amount: number;
    currency: string;
}

export interface LaneRate {
    countryCode: string;
    baseRatePerLoadingMeter: number;
    baseRatePerKm: number;
    coefficient: number;
}

export interface BackhaulParams {
    backhaulProbability: number;
    maxDiscount: number;
}

export interface HubDestination {
    countryCode: string;
    city: string;
    ratePerKm: number;
    baseDistanceKm: number;
    customsPerLdm: number;
    region: string;
    coordinates?: Coordinates;
}

export type DistanceSource = 'road' | 'matrix' | 'matrix-reverse' | 'great-circle' | 'default';

export interface DistanceEstimate {
    distanceKm: number;
    source: DistanceSource;
}

export interface Surcharge {
    name: string;
    amount: number;
}

export interface RegionalPriceBreakdown {
    chargeableLdm: number;
    rateSource: 'route' | 'default';
    baseRatePerLdm: number;
    baseRatePerKm: number;
    distanceFactor: number;
    ldmCorrection: number;
    weightCorrection: number;
    volumeCorrection: number;
    baseCost: number;
    generalCorrection: number;
    seasonalFactor: number;
    adjustedCost: number;
    surcharges: Surcharge[];
    total: number;
}

export interface RoadQuote {
    quoteId: string;
    quotedAt: Date;
    origin: Location;
    destination: Location;
    distanceKm: number;
    distanceSource: DistanceSource;
    ldm: number;
    weightKg: number;
    chargeableLdm: number;
    month: number;
    pricing: RegionalPriceBreakdown;
    total: number;
}

export interface PortSummary {
    id: string;
    name: string;
    country: string;
    region: string;
}

export interface MultimodalQuote {
    quoteId: string;
    quotedAt: Date;
    origin: PortSummary;
    destination: PortSummary;
    containerType: ContainerType;
    weightKg: number;
    distanceNm: number;
    baseRate: number;
    rateSource: 'container-rate' | 'distance-fallback';
    carriers: string;
    notes: string;
    weightedIndexChange: number;
    volatilityFactor: number;
    crisisMultiplier: number;
    quarter: Quarter;
    seasonalFactor: number;
    adjustedRate: number;
    fuelSurchargePercent: number;
    originCongestionLevel: string;
    destinationCongestionLevel: string;
    surcharges: Surcharge[];
    routeKey?: string;
    indexWeights?: Record<string, number>;
    total: number;
}

export interface LegCost {
    from: string;
    to: string;
    distanceKm: number;
    distanceSource: DistanceSource;
    cost: number;
}

export interface ViaHubQuote {
    quoteId: string;
    quotedAt: Date;
    origin: Location;
    hub: Location;
    destination: Location;
    ldm: number;
    weightKg: number;
    chargeableLdm: number;
    legs: [LegCost, LegCost];
    terminalCost: number;
    distanceKm: number;
    total: number;
}
