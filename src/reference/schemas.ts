import { z } from 'zod';

const factorMapSchema = z.record(z.string(), z.number());

export const regionRowSchema = z.object({
    countryCode: z.string().min(1),
    postalCode: z.string().min(1),
    region: z.string().min(1),
    placeName: z.string(),
    latitude: z.number().optional(),
    longitude: z.number().optional(),
});

export const regionDetailSchema = z.object({
    name: z.string().optional(),
    centerLat: z.number().optional(),
    centerLon: z.number().optional(),
});

export const routeRateRowSchema = z.object({
    fromRegion: z.string().min(1),
    toRegion: z.string().min(1),
    distanceKm: z.number(),
    baseRatePerLdm: z.number(),
    baseRatePerKm: z.number(),
    coefficient: z.number().default(1),
    seasonalFactors: factorMapSchema.default({}),
    urgencyFactors: factorMapSchema.default({}),
});

export const correctionFactorsSchema = z.object({
    distanceFactors: factorMapSchema,
    ldmFactors: factorMapSchema,
    weightFactors: factorMapSchema,
    baseRateLdmCorrection: z.number().default(1),
    baseRateKmCorrection: z.number().default(1),
    generalCorrection: z.number().default(1),
});

export const portRowSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    country: z.string(),
    region: z.string().min(1),
    latitude: z.number(),
    longitude: z.number(),
});

export const containerRateRowSchema = z.object({
    originRegion: z.string(),
    destinationRegion: z.string(),
    containerType: z.string(),
    avgRate: z.number(),
    carriers: z.string().default(''),
    notes: z.string().default(''),
});

export const fuelSurchargeRowSchema = z.object({
    originRegion: z.string(),
    destinationRegion: z.string(),
    minPercent: z.number(),
    maxPercent: z.number(),
});

export const ecologicalChargeRowSchema = z.object({
    region: z.string(),
    chargeType: z.string(),
    containerType: z.string(),
    amount: z.number(),
    currency: z.string().default('USD'),
});

export const quarterlySeasonalRowSchema = z.object({
    originRegion: z.string(),
    destinationRegion: z.string(),
    quarter: z.enum(['Q1', 'Q2', 'Q3', 'Q4']),
    factor: z.number(),
});

export const portCongestionRowSchema = z.object({
    portId: z.string(),
    congestionLevel: z.string(),
    containerType: z.string(),
    amount: z.number(),
    currency: z.string().default('USD'),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const crisisRowSchema = z.object({
    regionPair: z.string(),          // "Origin-Destination"
    startDate: isoDate,
    endDate: isoDate,
    multiplier: z.number(),
    description: z.string().default(''),
});

export const freightIndexRowSchema = z.object({
    name: z.string().min(1),
    currentValue: z.number(),
    baseValue: z.number().refine(v => v !== 0, 'Base value cannot be zero'),
    weight: z.number(),
    description: z.string().default(''),
});

export const routeIndexWeightRowSchema = z.object({
    route: z.string().min(1),
    indexName: z.string().min(1),
    weight: z.number(),
});

export const laneRateRowSchema = z.object({
    countryCode: z.string().length(2),
    baseRatePerLoadingMeter: z.number(),
    baseRatePerKm: z.number(),
    coefficient: z.number().default(1),
});

export const backhaulRowSchema = z.object({
    countryCode: z.string().length(2),
    backhaulProbability: z.number().min(0).max(1),
    maxDiscount: z.number().min(0).max(1),
});

export const hubDestinationRowSchema = z.object({
    countryCode: z.string().length(2),
    city: z.string().min(1),
    ratePerKm: z.number(),
    baseDistanceKm: z.number(),
    customsPerLdm: z.number(),
    region: z.string().optional(),
    latitude: z.number().optional(),
    longitude: z.number().optional(),
});

export const referenceDataSchema = z.object({
    regions: z.array(regionRowSchema),
    regionDetails: z.record(z.string(), regionDetailSchema).default({}),
    routeRates: z.array(routeRateRowSchema).default([]),
    correctionFactors: correctionFactorsSchema,
    ports: z.array(portRowSchema).default([]),
    containerRates: z.array(containerRateRowSchema).default([]),
    fuelSurcharges: z.array(fuelSurchargeRowSchema).default([]),
    ecologicalCharges: z.array(ecologicalChargeRowSchema).default([]),
    quarterlySeasonalFactors: z.array(quarterlySeasonalRowSchema).default([]),
    portCongestion: z.array(portCongestionRowSchema).default([]),
    crisisCoefficients: z.array(crisisRowSchema).default([]),
    freightIndices: z.array(freightIndexRowSchema).default([]),
    routeIndexWeights: z.array(routeIndexWeightRowSchema).default([]),
    laneRates: z.array(laneRateRowSchema).default([]),
    backhaul: z.array(backhaulRowSchema).default([]),
    hubDestinations: z.array(hubDestinationRowSchema).default([]),
});

export type ReferenceDataInput = z.input<typeof referenceDataSchema>;
export type ReferenceData = z.output<typeof referenceDataSchema>;
