import { InvalidInputError, NotFoundError } from '../../src/domain/errors';
import { ItineraryComposer, HUB_LOCATION } from '../../src/services/itinerary.service';
import { LocationResolver } from '../../src/services/location-resolver';
import { createDistanceResolver } from '../helpers';

async function createComposer() {
    const deps = await createDistanceResolver();
    deps.roadDistanceKm
        .mockResolvedValueOnce({ kind: 'success', value: 2000 })
        .mockResolvedValueOnce({ kind: 'success', value: 4500 });
    const composer = new ItineraryComposer(new LocationResolver(deps.reference), deps.resolver, deps.reference);
    return { composer, ...deps };
}

const REQUEST = {
    originCountry: 'DE',
    originPostalCode: '10115',
    destinationCountry: 'KZ',
    destinationCity: 'Almaty',
    ldm: 4,
    weightKg: 6000,
};

describe('ItineraryComposer', () => {
    it('should price both legs and the terminal fee', async () => {
        const { composer, roadDistanceKm } = await createComposer();

        const itinerary = await composer.compose(REQUEST);

        expect(roadDistanceKm.mock.calls[0][1]).toEqual(HUB_LOCATION.coordinates);
        expect(roadDistanceKm.mock.calls[1]).toEqual([HUB_LOCATION.coordinates, { lat: 43.2389, lon: 76.8897 }]);
        expect(itinerary.chargeableLdm).toBe(4);
        expect(itinerary.legs).toEqual([
            { from: 'DE_EAST', to: 'TR_MARMARA', distanceKm: 2000, distanceSource: 'road', cost: 14790 },
            { from: 'TR_MARMARA', to: 'KZ_ALMATY', distanceKm: 4500, distanceSource: 'road', cost: 14800 },
        ]);
        expect(itinerary.terminalCost).toBe(300);
        expect(itinerary.distanceKm).toBe(6500);
        expect(itinerary.total).toBe(29890);
    });

    it('should reject out-of-range LDM before any lookup', async () => {
        const { composer, geocode } = await createComposer();

        await expect(composer.compose({ ...REQUEST, ldm: 0.5 })).rejects.toThrow(InvalidInputError);
        await expect(composer.compose({ ...REQUEST, ldm: 10.5 })).rejects.toThrow('LDM must be between 1 and 10');
        expect(geocode).not.toHaveBeenCalled();
    });

    it('should reject a weight above the LDM capacity', async () => {
        const { composer, geocode } = await createComposer();

        await expect(composer.compose({ ...REQUEST, weightKg: 7401 })).rejects.toThrow(
            'Weight must be positive and at most 7400 kg for 4 LDM',
        );
        await expect(composer.compose({ ...REQUEST, weightKg: 0 })).rejects.toThrow(InvalidInputError);
        expect(geocode).not.toHaveBeenCalled();
    });

    it('should fail with NotFoundError for an unserved destination', async () => {
        const { composer, geocode } = await createComposer();

        await expect(composer.compose({ ...REQUEST, destinationCity: 'Astana' })).rejects.toThrow(NotFoundError);
        expect(geocode).not.toHaveBeenCalled();
    });

    it('should fail with NotFoundError when the origin country has no lane rate', async () => {
        const { composer, geocode } = await createComposer();

        await expect(composer.compose({ ...REQUEST, originCountry: 'IT', originPostalCode: '20121' }))
            .rejects.toThrow('No lane rate for origin country IT');
        expect(geocode).not.toHaveBeenCalled();
    });
});
