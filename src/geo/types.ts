import { Coordinates } from '../domain/models';
import { AttemptOutcome } from '../http/retry';

// One request/response round trip each. Retry and caching are the caller's job.
export interface GeocodingProvider {
    readonly name: string;
    geocode(address: string): Promise<AttemptOutcome<Coordinates>>;
}

export interface RoutingProvider {
    readonly name: string;
    roadDistanceKm(from: Coordinates, to: Coordinates): Promise<AttemptOutcome<number>>;
}
