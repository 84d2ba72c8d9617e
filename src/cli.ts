import { loadConfig, AppConfig } from './config';
import { createEngine } from './bootstrap';
import { FreightError } from './domain/errors';

async function runQuote(label: string, quote: () => Promise<{ total: number; quoteId: string }>): Promise<void> {
    console.log(`\n--- ${label} ---`);
    try {
        const result = await quote();
        console.log(JSON.stringify(result, null, 2));
        console.log(`Total: ${result.total.toFixed(2)} (quote ${result.quoteId})`);
    } catch (err) {
        if (err instanceof FreightError) {
            console.log(JSON.stringify(err.toJSON(), null, 2));
        } else {
            throw err;
        }
    }
}

async function main() {
    console.log('=== Freight Rate Engine Demo ===');

    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (err) {
        console.error('Config error:', err instanceof Error ? err.message : err);
        console.log('\nHint: copy .env.example to .env and adjust the values.\n');
        process.exit(1);
    }

    const engine = await createEngine(config);
    const { quotes } = engine;

    try {
        await runQuote('Road (DE 10115 -> FR 75001)', () => quotes.quoteRoad({
            originCountry: 'DE',
            originPostalCode: '10115',
            destinationCountry: 'FR',
            destinationPostalCode: '75001',
            ldm: 5,
            weightKg: 1000,
        }));

        await runQuote('Multimodal (CNSHA -> NLRTM, 40hc)', () => quotes.quoteMultimodal({
            originPort: 'CNSHA',
            destinationPort: 'NLRTM',
            containerType: '40hc',
        }));

        await runQuote('Via hub (DE 10115 -> KZ Almaty)', () => quotes.quoteViaHub({
            originCountry: 'DE',
            originPostalCode: '10115',
            destinationCountry: 'KZ',
            destinationCity: 'Almaty',
            ldm: 4,
            weightKg: 6000,
        }));

        console.log('\n--- Validation Demo ---');
        await runQuote('Identical origin and destination', () => quotes.quoteRoad({
            originCountry: 'DE',
            originPostalCode: '10115',
            destinationCountry: 'DE',
            destinationPostalCode: '10115',
            ldm: 2,
            weightKg: 500,
        }));
    } finally {
        await engine.close();
    }

    console.log('\nDone.');
}

main().catch((err) => {
    console.error('[demo] Fatal error:', err);
    process.exit(1);
});
