import { Coordinates } from '../domain/models';

export const EARTH_RADIUS_KM = 6371;
export const EARTH_RADIUS_NM = 3440.07;

const toRadians = (deg: number): number => deg * Math.PI / 180;

export function haversine(from: Coordinates, to: Coordinates, radius: number = EARTH_RADIUS_KM): number {
    const fromLat = toRadians(from.lat);
    const toLat = toRadians(to.lat);
    const deltaLat = toLat - fromLat;
    const deltaLon = toRadians(to.lon) - toRadians(from.lon);

    const a = Math.sin(deltaLat / 2) ** 2
        + Math.cos(fromLat) * Math.cos(toLat) * Math.sin(deltaLon / 2) ** 2;
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

    return radius * c;
}
