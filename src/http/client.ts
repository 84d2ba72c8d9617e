import axios, {
    AxiosInstance,
    AxiosRequestConfig,
    AxiosResponse,
} from 'axios';
import {
    FreightError,
    ExternalServiceError,
    NetworkError,
    TimeoutError,
    RateLimitError,
} from '../domain/errors';

export interface HttpClientOptions {
    baseURL?: string;
    timeoutMs: number;
    defaultHeaders?: Record<string, string>;
}

export interface HttpResponse<T = unknown> {
    status: number;
    data: T;
    headers: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class HttpClient {
    private client: AxiosInstance;
    private service: string;

    constructor(service: string, options: HttpClientOptions) {
        this.service = service;
        this.client = axios.create({
            baseURL: options.baseURL,
            timeout: options.timeoutMs,
            headers: {
                'Accept': 'application/json',
                ...options.defaultHeaders,
            },
        });
    }

    async get<T>(url: string, config?: AxiosRequestConfig): Promise<HttpResponse<T>> {
        try {
            const response: AxiosResponse<T> = await this.client.get(url, config);
            return this.wrapResponse(response);
        } catch (err) {
            throw this.handleError(err);
        }
    }

    private wrapResponse<T>(response: AxiosResponse<T>): HttpResponse<T> {
        const headers: Record<string, string> = {};
        for (const [key, value] of Object.entries(response.headers ?? {})) {
            if (value !== undefined && value !== null) headers[key] = String(value);
        }
        return {
            status: response.status,
            data: response.data,
            headers,
        };
    }
    private handleError(err: unknown): FreightError {
        if (!axios.isAxiosError(err)) {
            return new NetworkError(
                this.service,
                `Unexpected error: ${err instanceof Error ? err.message : 'unknown'}`,
                err instanceof Error ? err : undefined,
            );
        }

        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
            return new TimeoutError(this.service, this.client.defaults.timeout ?? 0);
        }
        if (!err.response) {
            return new NetworkError(
                this.service,
                `Network error: ${err.message}`,
                err,
            );
        }

        const { status, data } = err.response;
        if (status === 429) {
            const retryAfter = err.response.headers?.['retry-after'];
            const retryMs = retryAfter ? parseInt(String(retryAfter), 10) * 1000 : undefined;
            return new RateLimitError(this.service, retryMs);
        }
        return new ExternalServiceError({
            message: `${this.service} API error (HTTP ${status}): ${this.extractErrorMessage(data)}`,
            service: this.service,
            statusCode: status,
            retryable: status >= 500,
            details: isRecord(data) ? data : { raw: data },
        });
    }
    private extractErrorMessage(data: unknown): string {
        if (typeof data === 'string') return data;
        if (isRecord(data)) {
            // OSRM: { code, message }; Nominatim: { error: { message } } or { error: "..." }
            if (typeof data.message === 'string') return data.message;
            if (typeof data.error === 'string') return data.error;
            if (isRecord(data.error) && typeof data.error.message === 'string') return data.error.message;
            if (typeof data.code === 'string') return data.code;
        }
        return 'Unknown error';
    }
}
