import { InvalidInputError, NotFoundError } from '../domain/errors';
import { Coordinates, Location, ViaHubQuote } from '../domain/models';
import { ViaHubQuoteRequest } from '../domain/schemas';
import { ReferenceDataStore } from '../reference/store';
import { chargeableLoad } from '../pricing/regional';
import { priceFeederLeg, priceOnwardLeg, terminalFee } from '../pricing/lane';
import { DENSITY_FACTOR, HUB_MAX_LDM, HUB_MIN_LDM } from '../pricing/constants';
import { round2 } from '../lib/round';
import { DistanceResolver } from './distance-resolver';
import { LocationResolver } from './location-resolver';

const HUB_COORDINATES: Readonly<Coordinates> = { lat: 40.8028, lon: 29.4307 };

export const HUB_LOCATION: Readonly<Location> = {
    countryCode: 'TR',
    postalCode: '41400',
    region: 'TR_MARMARA',
    placeName: 'Gebze',
    coordinates: HUB_COORDINATES,
};

export type ViaHubItinerary = Omit<ViaHubQuote, 'quoteId' | 'quotedAt'>;

function validateLoad(ldm: number, weightKg: number): void {
    if (!Number.isFinite(ldm) || ldm < HUB_MIN_LDM || ldm > HUB_MAX_LDM) {
        throw new InvalidInputError(`LDM must be between ${HUB_MIN_LDM} and ${HUB_MAX_LDM}`, { field: 'ldm', value: ldm });
    }
    const maxWeight = ldm * DENSITY_FACTOR;
    if (!Number.isFinite(weightKg) || weightKg <= 0 || weightKg > maxWeight) {
        throw new InvalidInputError(`Weight must be positive and at most ${maxWeight} kg for ${ldm} LDM`, {
            field: 'weightKg',
            value: weightKg,
        });
    }
}

/**
 * Two-leg itinerary through the fixed hub. All lookups that can fail the
 * request run before the first distance lookup.
 */
export class ItineraryComposer {
    constructor(
        private readonly locations: LocationResolver,
        private readonly distances: DistanceResolver,
        private readonly reference: ReferenceDataStore,
    ) { }

    async compose(request: ViaHubQuoteRequest): Promise<ViaHubItinerary> {
        const { ldm, weightKg } = request;
        validateLoad(ldm, weightKg);

        const origin = this.locations.resolve(request.originCountry, request.originPostalCode);
        const destinationRow = this.reference.getHubDestination(request.destinationCountry, request.destinationCity);
        if (!destinationRow) {
            throw new NotFoundError(`Destination not served from hub: ${request.destinationCity}, ${request.destinationCountry}`, {
                countryCode: request.destinationCountry,
                city: request.destinationCity,
            });
        }
        const lane = this.reference.getLaneRate(origin.countryCode);
        if (!lane) {
            throw new NotFoundError(`No lane rate for origin country ${origin.countryCode}`, { countryCode: origin.countryCode });
        }

        const destination: Location = {
            countryCode: destinationRow.countryCode,
            postalCode: '',
            region: destinationRow.region,
            placeName: destinationRow.city,
            ...(destinationRow.coordinates ? { coordinates: { ...destinationRow.coordinates } } : {}),
        };

        const feederDistance = await this.distances.resolveDistance(origin, HUB_LOCATION);
        const onwardDistance = await this.distances.resolveDistance(HUB_LOCATION, destination);

        const totalDistanceKm = feederDistance.distanceKm + onwardDistance.distanceKm;

        const chargeableLdm = chargeableLoad(ldm, weightKg);
        // the feeder lane tariff runs over the whole trip, not just the distance to the hub
        const feederCost = priceFeederLeg(
            lane,
            this.reference.getBackhaul(origin.countryCode),
            totalDistanceKm,
            ldm,
            weightKg,
        );
        const onwardCost = priceOnwardLeg(destinationRow, chargeableLdm);
        const terminalCost = terminalFee(weightKg);

        return {
            origin,
            hub: { ...HUB_LOCATION, coordinates: { ...HUB_COORDINATES } },
            destination,
            ldm,
            weightKg,
            chargeableLdm: round2(chargeableLdm),
            legs: [
                {
                    from: origin.region,
                    to: HUB_LOCATION.region,
                    distanceKm: round2(feederDistance.distanceKm),
                    distanceSource: feederDistance.source,
                    cost: round2(feederCost),
                },
                {
                    from: HUB_LOCATION.region,
                    to: destination.region,
                    distanceKm: round2(onwardDistance.distanceKm),
                    distanceSource: onwardDistance.source,
                    cost: round2(onwardCost),
                },
            ],
            terminalCost: round2(terminalCost),
            distanceKm: round2(totalDistanceKm),
            total: round2(feederCost + onwardCost + terminalCost),
        };
    }
}
