import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export interface GeocoderConfig {
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
}

export interface RouterConfig {
    baseUrl: string;
    timeoutMs: number;
}

export interface RetryConfig {
    maxAttempts: number;
    initialDelayMs: number;
    backoffFactor: number;
}

export interface DbConfig {
    connectionString: string;
}

export interface AppConfig {
    nodeEnv: string;
    geocoder: GeocoderConfig;
    router: RouterConfig;
    retry: RetryConfig;
    geocodeCachePath: string;
    referenceDataPath: string;
    db?: DbConfig;    // absent -> geocode cache lives in a JSON file
}

function readEnv(key: string, fallback?: string): string {
    const val = process.env[key] ?? fallback;
    if (val === undefined) {
        throw new Error(
            `Missing required environment variable: ${key}. ` +
            `Check your .env file or environment.`
        );
    }
    return val;
}

function readIntEnv(key: string, fallback: number): number {
    const raw = readEnv(key, String(fallback));
    const parsed = parseInt(raw, 10);
    if (isNaN(parsed) || parsed < 0) {
        throw new Error(`Environment variable ${key} must be a non-negative integer, got "${raw}"`);
    }
    return parsed;
}

export function loadConfig(): AppConfig {
    const databaseUrl = process.env.DATABASE_URL;

    return {
        nodeEnv: readEnv('NODE_ENV', 'development'),
        geocoder: {
            baseUrl: readEnv('GEOCODER_BASE_URL', 'https://nominatim.openstreetmap.org'),
            userAgent: readEnv('GEOCODER_USER_AGENT', 'freight-rate-engine/1.0'),
            timeoutMs: readIntEnv('GEOCODER_TIMEOUT_MS', 10_000),
        },
        router: {
            baseUrl: readEnv('ROUTER_BASE_URL', 'https://router.project-osrm.org'),
            timeoutMs: readIntEnv('ROUTER_TIMEOUT_MS', 15_000),
        },
        retry: {
            maxAttempts: Math.max(1, readIntEnv('RETRY_MAX_ATTEMPTS', 3)),
            initialDelayMs: readIntEnv('RETRY_INITIAL_DELAY_MS', 2_000),
            backoffFactor: 2,
        },
        geocodeCachePath: path.resolve(process.cwd(), readEnv('GEOCODE_CACHE_PATH', 'data/geocode-cache.json')),
        referenceDataPath: path.resolve(process.cwd(), readEnv('REFERENCE_DATA_PATH', 'data/reference-data.json')),
        ...(databaseUrl ? { db: { connectionString: databaseUrl } } : {}),
    };
}
