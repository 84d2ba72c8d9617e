import { priceFeederLeg, priceOnwardLeg, terminalFee } from '../../src/pricing/lane';
import { buildReference } from '../helpers';

describe('lane pricing', () => {
    const reference = buildReference();

    it('should price the feeder leg with the country backhaul discount', () => {
        const lane = reference.getLaneRate('FR');
        if (!lane) throw new Error('fixture lane FR missing');

        // max(470 * 2, 0.62 * 100 * 2) * 1.05 = 987; discount 0.4 * 0.25
        const cost = priceFeederLeg(lane, reference.getBackhaul('FR'), 100, 2, 1000);

        expect(cost).toBeCloseTo(888.3 * 1.05 + 8, 6);
    });

    it('should apply the default backhaul discount when the country has none', () => {
        const lane = reference.getLaneRate('DE');
        if (!lane) throw new Error('fixture lane DE missing');

        const cost = priceFeederLeg(lane, undefined, 2000, 4, 6000);

        expect(cost).toBeCloseTo(4320 * 1.05 + 48, 6);
    });

    it('should price the onward leg on the lane base distance and customs', () => {
        const tashkent = reference.getHubDestination('UZ', 'Tashkent');
        if (!tashkent) throw new Error('fixture destination missing');

        expect(priceOnwardLeg(tashkent, 3)).toBeCloseTo(0.95 * 3900 * 3 + 140 * 3, 6);
    });

    it('should charge terminal handling per started tonne', () => {
        expect(terminalFee(1000)).toBe(50);
        expect(terminalFee(1001)).toBe(100);
        expect(terminalFee(6500)).toBe(350);
    });
});
