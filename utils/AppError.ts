// utils/AppError.ts

export interface ErrorDetail {
    field: string;
    message: string;
}

/**
 * Base class for errors the HTTP layer can translate into a response.
 * Other errors become a 500 unless they carry a 4xx status (Express parser errors).
 */
class AppError extends Error {
    public readonly statusCode: number;
    public readonly status: 'fail' | 'error';
    public readonly code: string;
    public readonly isOperational = true;

    constructor(message: string, statusCode: number, code = 'APP_ERROR') {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.status = statusCode < 500 ? 'fail' : 'error';
        this.code = code;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ValidationError extends AppError {
    public readonly details: ErrorDetail[];

    constructor(message: string, details: ErrorDetail[] = []) {
        super(message, 400, 'VALIDATION_ERROR');
        this.details = details;
    }
}

export class NotFoundError extends AppError {
    constructor(message: string, code = 'CITY_NOT_FOUND') {
        super(message, 404, code);
    }
}

/**
 * Provider failure. 503 when the provider could not be reached (timeout,
 * connection refused); 502 when it answered with something we cannot use.
 */
export class UpstreamError extends AppError {
    constructor(message: string, public readonly unreachable = false) {
        super(message, unreachable ? 503 : 502, unreachable ? 'UPSTREAM_UNAVAILABLE' : 'UPSTREAM_ERROR');
    }
}

export class RateLimitedError extends AppError {
    constructor(public readonly retryAfterSeconds: number, message = 'Too many requests, please try again later.') {
        super(message, 429, 'RATE_LIMITED');
    }
}

export default AppError;
