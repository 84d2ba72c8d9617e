import { z, ZodError } from 'zod';
import { ContainerType } from './models';
import { InvalidInputError } from './errors';

export const MAX_ROAD_LDM = 13.6;          // full semi-trailer
export const MAX_ROAD_WEIGHT_KG = 40_000;

const countryCodeSchema = z.string()
    .trim()
    .length(2, 'Country code must be 2-letter ISO format')
    .transform(val => val.toUpperCase());

const postalCodeSchema = z.string()
    .trim()
    .regex(/^[A-Za-z0-9\- ]{3,10}$/, 'Postal code must be 3-10 letters, digits, spaces or dashes');

export const roadQuoteRequestSchema = z.object({
    originCountry: countryCodeSchema,
    originPostalCode: postalCodeSchema,
    destinationCountry: countryCodeSchema,
    destinationPostalCode: postalCodeSchema,
    ldm: z.number()
        .positive('LDM must be positive')
        .max(MAX_ROAD_LDM, `LDM cannot exceed ${MAX_ROAD_LDM}`),
    weightKg: z.number()
        .positive('Weight must be positive')
        .max(MAX_ROAD_WEIGHT_KG, `Weight cannot exceed ${MAX_ROAD_WEIGHT_KG} kg`),
    month: z.number().int().min(1).max(12).optional(),   // defaults to the current month
});

// rejects 2025-13-01 and 2025-02-30, which Date would roll over
function isCalendarDate(value: string): boolean {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const multimodalQuoteRequestSchema = z.object({
    originPort: z.string().trim().min(1, 'Origin port is required'),
    destinationPort: z.string().trim().min(1, 'Destination port is required'),
    containerType: z.nativeEnum(ContainerType),
    weightKg: z.number().positive('Weight must be positive').default(20_000),
    date: z.string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD format')
        .refine(isCalendarDate, 'Date must be a valid calendar date')
        .optional(),
});

export const viaHubQuoteRequestSchema = z.object({
    originCountry: countryCodeSchema,
    originPostalCode: postalCodeSchema,
    destinationCountry: countryCodeSchema,
    destinationCity: z.string().trim().min(1, 'Destination city is required'),
    ldm: z.number(),
    weightKg: z.number(),
});

export type RoadQuoteRequest = z.infer<typeof roadQuoteRequestSchema>;
export type MultimodalQuoteRequest = z.infer<typeof multimodalQuoteRequestSchema>;
export type ViaHubQuoteRequest = z.infer<typeof viaHubQuoteRequestSchema>;

export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
    try {
        return schema.parse(input);
    } catch (err) {
        if (err instanceof ZodError) {
            throw new InvalidInputError(
                `Invalid ${label} request`,
                {
                    issues: err.issues.map(issue => ({
                        field: issue.path.join('.'),
                        message: issue.message,
                    })),
                },
            );
        }
        throw err;
    }
}
