export * from './domain';
export { loadConfig } from './config';
export type { AppConfig, GeocoderConfig, RouterConfig, RetryConfig, DbConfig } from './config';
export { createEngine, loadReferenceData } from './bootstrap';
export type { Engine } from './bootstrap';
export { ReferenceDataStore, ReferenceDataError, parseReferenceData } from './reference/store';
export type { ReferenceDataInput } from './reference/schemas';
export { GeocodeCache } from './cache/geocode-cache';
export type { GeocodeStore, CachedCoordinates } from './cache/geocode-cache';
export { FileGeocodeStore } from './cache/file-store';
export { PgGeocodeStore } from './db/geocode-repository';
export type { GeocodingProvider, RoutingProvider } from './geo/types';
export { NominatimGeocoder } from './geo/nominatim';
export { OsrmRouter } from './geo/osrm';
export { RegionalPricer } from './pricing/regional';
export type { RegionalPriceInput } from './pricing/regional';
export { IndexedPricer } from './pricing/indexed';
export { LocationResolver } from './services/location-resolver';
export { DistanceResolver } from './services/distance-resolver';
export { ItineraryComposer, HUB_LOCATION } from './services/itinerary.service';
export { QuoteService } from './services/quote.service';
