export type SpotifyErrorKind =
    | 'unauthenticated'
    | 'forbidden'
    | 'not_found'
    | 'rate_limited'
    | 'unavailable'
    | 'network'
    | 'malformed_response'
    | 'client';

export class SpotifyApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly retryable: boolean,
        public readonly kind: SpotifyErrorKind = 'client'
    ) {
        super(message);
        this.name = 'SpotifyApiError';
    }
}

export class SpotifyUnauthenticatedError extends SpotifyApiError {
    constructor(message = 'Access token expired or invalid') {
        super(message, 401, false, 'unauthenticated');
        this.name = 'SpotifyUnauthenticatedError';
    }
}

export class SpotifyForbiddenError extends SpotifyApiError {
    constructor(message = 'Forbidden - check scopes or user access') {
        super(message, 403, false, 'forbidden');
        this.name = 'SpotifyForbiddenError';
    }
}

export class SpotifyNotFoundError extends SpotifyApiError {
    constructor(message = 'Resource not found') {
        super(message, 404, false, 'not_found');
        this.name = 'SpotifyNotFoundError';
    }
}

export class SpotifyRateLimitError extends SpotifyApiError {
    constructor(
        public readonly retryAfterSeconds: number,
        message = 'Rate limited by Spotify'
    ) {
        super(message, 429, true, 'rate_limited');
        this.name = 'SpotifyRateLimitError';
    }
}

export class SpotifyDownError extends SpotifyApiError {
    constructor(statusCode: number, message = 'Spotify service unavailable') {
        super(message, statusCode, true, 'unavailable');
        this.name = 'SpotifyDownError';
    }
}

// Request never produced a response
export class SpotifyNetworkError extends SpotifyApiError {
    constructor(cause: unknown) {
        super(
            `Network error calling Spotify: ${cause instanceof Error ? cause.message : String(cause)}`,
            0,
            true,
            'network'
        );
        this.name = 'SpotifyNetworkError';
        this.cause = cause;
    }
}

// Thrown by the accounts service on a failed code or refresh exchange
export class TokenRefreshError extends Error {
    constructor(
        message: string,
        public readonly isRevoked: boolean,
        public readonly spotifyError?: string,
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'TokenRefreshError';
    }
}

// Network-level failure: DNS, reset connection, request timeout
export function isNetworkError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    if (error.name === 'AbortError' || error.name === 'TimeoutError') return true;
    return error.message.includes('fetch failed');
}

export function isRetryableError(error: unknown): boolean {
    if (error instanceof SpotifyApiError) {
        return error.retryable;
    }
    return isNetworkError(error);
}
