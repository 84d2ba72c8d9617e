export { ContainerType } from './models';
export type {
    Quarter,
    Coordinates,
    Location,
    RegionEntry,
    RouteRate,
    BucketBand,
    BucketTable,
    CorrectionFactors,
    Port,
    PortSummary,
    ContainerRate,
    FuelSurcharge,
    CrisisWindow,
    FreightIndex,
    RouteIndexWeight,
    CongestionCharge,
    LaneRate,
    BackhaulParams,
    HubDestination,
    DistanceSource,
    DistanceEstimate,
    Surcharge,
    RegionalPriceBreakdown,
    RoadQuote,
    MultimodalQuote,
    LegCost,
    ViaHubQuote,
} from './models';

export {
    roadQuoteRequestSchema,
    multimodalQuoteRequestSchema,
    viaHubQuoteRequestSchema,
    parseRequest,
    MAX_ROAD_LDM,
    MAX_ROAD_WEIGHT_KG,
} from './schemas';
export type { RoadQuoteRequest, MultimodalQuoteRequest, ViaHubQuoteRequest } from './schemas';

export {
    FreightError,
    InvalidInputError,
    NotFoundError,
    CalculationError,
    ExternalServiceError,
    RateLimitError,
    NetworkError,
    TimeoutError,
    ParseError,
} from './errors';
export type { ErrorCode } from './errors';
