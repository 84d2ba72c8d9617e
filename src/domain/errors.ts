export type ErrorCode =
    | 'INVALID_INPUT'
    | 'NOT_FOUND'
    | 'CALCULATION_ERROR'
    | 'EXTERNAL_SERVICE_ERROR'
    | 'RATE_LIMITED'
    | 'NETWORK_ERROR'
    | 'TIMEOUT'
    | 'PARSE_ERROR'
    | 'UNKNOWN';

export class FreightError extends Error {
    public readonly code: ErrorCode;
    public readonly service?: string;
    public readonly retryable: boolean;
    public readonly statusCode?: number;
    public readonly details?: Record<string, unknown>;

    constructor(opts: {
        message: string;
        code: ErrorCode;
        service?: string;
        retryable?: boolean;
        statusCode?: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super(opts.message);
        this.name = 'FreightError';
        this.code = opts.code;
        this.service = opts.service;
        this.retryable = opts.retryable ?? false;
        this.statusCode = opts.statusCode;
        this.details = opts.details;
        if (opts.cause) {
            this.cause = opts.cause;
        }
    }
    toJSON() {
        return {
            error: {
                code: this.code,
                message: this.message,
                retryable: this.retryable,
                ...(this.service ? { service: this.service } : {}),
                ...(this.statusCode ? { statusCode: this.statusCode } : {}),
                ...(this.details ? { details: this.details } : {}),
            },
        };
    }
}

export class InvalidInputError extends FreightError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({
            message,
            code: 'INVALID_INPUT',
            retryable: false,
            statusCode: 400,
            details,
        });
        this.name = 'InvalidInputError';
    }
}

export class NotFoundError extends FreightError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({
            message,
            code: 'NOT_FOUND',
            retryable: false,
            statusCode: 404,
            details,
        });
        this.name = 'NotFoundError';
    }
}

export class CalculationError extends FreightError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({
            message,
            code: 'CALCULATION_ERROR',
            retryable: false,
            details,
        });
        this.name = 'CalculationError';
    }
}

// Geocoding/routing failures. Absorbed by the distance fallback ladder, never surfaced in a quote.
export class ExternalServiceError extends FreightError {
    constructor(opts: {
        service: string;
        message: string;
        code?: ErrorCode;
        retryable?: boolean;
        statusCode?: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super({
            ...opts,
            code: opts.code ?? 'EXTERNAL_SERVICE_ERROR',
        });
        this.name = 'ExternalServiceError';
    }
}

export class RateLimitError extends ExternalServiceError {
    public readonly retryAfterMs?: number;

    constructor(service: string, retryAfterMs?: number) {
        super({
            message: `Rate limited by ${service}. ${retryAfterMs ? `Retry after ${retryAfterMs}ms` : 'Try again later.'}`,
            code: 'RATE_LIMITED',
            service,
            retryable: true,
            statusCode: 429,
        });
        this.name = 'RateLimitError';
        this.retryAfterMs = retryAfterMs;
    }
}

export class NetworkError extends ExternalServiceError {
    constructor(service: string, message: string, cause?: Error) {
        super({
            message,
            code: 'NETWORK_ERROR',
            service,
            retryable: true,
            cause,
        });
        this.name = 'NetworkError';
    }
}

export class TimeoutError extends ExternalServiceError {
    constructor(service: string, timeoutMs: number) {
        super({
            message: `Request to ${service} timed out after ${timeoutMs}ms`,
            code: 'TIMEOUT',
            service,
            retryable: true,
        });
        this.name = 'TimeoutError';
    }
}

export class ParseError extends ExternalServiceError {
    constructor(service: string, message: string, cause?: Error) {
        super({
            message,
            code: 'PARSE_ERROR',
            service,
            retryable: false,
            cause,
        });
        this.name = 'ParseError';
    }
}
