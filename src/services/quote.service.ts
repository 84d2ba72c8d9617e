import { InvalidInputError, NotFoundError } from '../domain/errors';
import { ContainerType, FreightIndex, MultimodalQuote, Port, RoadQuote, ViaHubQuote } from '../domain/models';
import {
    multimodalQuoteRequestSchema,
    parseRequest,
    roadQuoteRequestSchema,
    viaHubQuoteRequestSchema,
} from '../domain/schemas';
import { ReferenceDataStore } from '../reference/store';
import { RegionalPricer } from '../pricing/regional';
import { IndexedPricer } from '../pricing/indexed';
import { round2 } from '../lib/round';
import { DistanceResolver } from './distance-resolver';
import { LocationResolver } from './location-resolver';
import { ItineraryComposer } from './itinerary.service';

export type Clock = () => Date;

interface QuoteServiceDeps {
    reference: ReferenceDataStore;
    distances: DistanceResolver;
    clock?: Clock;
}

function generateQuoteId(now: Date): string {
    return `q_${now.getTime()}_${Math.random().toString(36).substring(2, 8)}`;
}

function isoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Engine-facing API: one call per calculator variant. Raw input is
 * validated here; everything below works on typed values.
 */
export class QuoteService {
    private reference: ReferenceDataStore;
    private distances: DistanceResolver;
    private clock: Clock;
    private locations: LocationResolver;
    private regional: RegionalPricer;
    private indexed: IndexedPricer;
    private itineraries: ItineraryComposer;

    constructor(deps: QuoteServiceDeps) {
        this.reference = deps.reference;
        this.distances = deps.distances;
        this.clock = deps.clock ?? (() => new Date());
        this.locations = new LocationResolver(this.reference);
        this.regional = new RegionalPricer(this.reference);
        this.indexed = new IndexedPricer(this.reference);
        this.itineraries = new ItineraryComposer(this.locations, this.distances, this.reference);
    }

    async quoteRoad(rawRequest: unknown): Promise<RoadQuote> {
        const request = parseRequest(roadQuoteRequestSchema, rawRequest, 'road quote');
        if (request.originCountry === request.destinationCountry
            && request.originPostalCode === request.destinationPostalCode) {
            throw new InvalidInputError('Origin and destination cannot be the same', {
                countryCode: request.originCountry,
                postalCode: request.originPostalCode,
            });
        }

        const origin = this.locations.resolve(request.originCountry, request.originPostalCode);
        const destination = this.locations.resolve(request.destinationCountry, request.destinationPostalCode);

        const now = this.clock();
        const month = request.month ?? now.getMonth() + 1;
        const distance = await this.distances.resolveDistance(origin, destination);

        const pricing = this.regional.price({
            distanceKm: distance.distanceKm,
            loadUnits: request.ldm,
            weightKg: request.weightKg,
            originRegion: origin.region,
            destinationRegion: destination.region,
            month,
        });

        return {
            quoteId: generateQuoteId(now),
            quotedAt: now,
            origin,
            destination,
            distanceKm: round2(distance.distanceKm),
            distanceSource: distance.source,
            ldm: request.ldm,
            weightKg: request.weightKg,
            chargeableLdm: round2(pricing.chargeableLdm),
            month,
            pricing,
            total: pricing.total,
        };
    }

    async quoteMultimodal(rawRequest: unknown): Promise<MultimodalQuote> {
        const request = parseRequest(multimodalQuoteRequestSchema, rawRequest, 'multimodal quote');
        const origin = this.requirePort(request.originPort, 'Origin');
        const destination = this.requirePort(request.destinationPort, 'Destination');
        if (origin.id === destination.id) {
            throw new InvalidInputError('Origin and destination ports cannot be the same', { portId: origin.id });
        }

        const now = this.clock();
        const priced = this.indexed.price({
            origin,
            destination,
            containerType: request.containerType,
            weightKg: request.weightKg,
            date: request.date ?? isoDate(now),
        });
        return { quoteId: generateQuoteId(now), quotedAt: now, ...priced };
    }

    async quoteViaHub(rawRequest: unknown): Promise<ViaHubQuote> {
        const request = parseRequest(viaHubQuoteRequestSchema, rawRequest, 'via-hub quote');
        const itinerary = await this.itineraries.compose(request);
        const now = this.clock();
        return { quoteId: generateQuoteId(now), quotedAt: now, ...itinerary };
    }

    listPorts(): Port[] {
        return this.reference.listPorts().sort(
            (a, b) => a.region.localeCompare(b.region) || a.name.localeCompare(b.name),
        );
    }

    listContainerTypes(): ContainerType[] {
        return Object.values(ContainerType);
    }

    listIndices(): FreightIndex[] {
        return this.reference.listIndices().sort((a, b) => b.weight - a.weight);
    }

    listRouteIndexWeights(): Record<string, Record<string, number>> {
        return this.reference.listRouteIndexWeights();
    }

    private requirePort(portId: string, label: string): Port {
        const port = this.reference.getPort(portId);
        if (!port) {
            throw new NotFoundError(`${label} port ${portId} not found`, { portId });
        }
        return port;
    }
}
