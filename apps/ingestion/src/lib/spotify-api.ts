import pRetry from 'p-retry';
import type { Logger } from 'pino';
import type { SpotifyRecentlyPlayedResponse } from '../types/spotify';
import {
    SpotifyApiError,
    SpotifyUnauthenticatedError,
    SpotifyForbiddenError,
    SpotifyNotFoundError,
    SpotifyRateLimitError,
    SpotifyDownError,
    SpotifyNetworkError,
    isNetworkError,
    isRetryableError,
} from './spotify-errors';
import { parseRecentlyPlayedEnvelope } from './spotify-parser';
import type { FetchLike } from './spotify';
import { ingestionLoggers } from './logger';

export type SleepLike = (ms: number) => Promise<void>;

// Options for recently played tracks
export interface RecentlyPlayedOptions {
    limit?: number;  // 1-50, default 50
    after?: number;  // get plays after this time (ms)
    before?: number; // get plays before this time (ms)
}

export interface SpotifyApiConfig {
    apiUrl: string;
    maxRetries: number;
    retryBaseMs: number;
    retryMaxMs: number;
    timeoutMs: number;
}

export interface SpotifyApiDependencies {
    fetchImpl?: FetchLike;
    sleep?: SleepLike;
    logger?: Logger;
}

const DEFAULT_RETRY_AFTER_SECONDS = 60;

function parseRetryAfterSeconds(header: string | null): number {
    if (!header) return DEFAULT_RETRY_AFTER_SECONDS;
    const seconds = Number.parseInt(header.trim(), 10);
    return Number.isNaN(seconds) || seconds < 0 ? DEFAULT_RETRY_AFTER_SECONDS : seconds;
}

// Handle API response and throw appropriate errors
async function handleResponse(response: Response): Promise<unknown> {
    if (response.ok) {
        return response.json();
    }

    if (response.status === 401) {
        throw new SpotifyUnauthenticatedError();
    }

    if (response.status === 403) {
        throw new SpotifyForbiddenError();
    }

    if (response.status === 404) {
        throw new SpotifyNotFoundError();
    }

    if (response.status === 429) {
        throw new SpotifyRateLimitError(parseRetryAfterSeconds(response.headers.get('Retry-After')));
    }

    if (response.status >= 500) {
        throw new SpotifyDownError(response.status);
    }

    // Other errors
    const errorText = await response.text();
    throw new SpotifyApiError(`Spotify API error: ${errorText}`, response.status, false);
}

function sleepFor(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SpotifyApiClient {
    private readonly fetchImpl: FetchLike;
    private readonly sleep: SleepLike;
    private readonly log: Logger;

    constructor(
        private readonly config: SpotifyApiConfig,
        dependencies: SpotifyApiDependencies = {}
    ) {
        this.fetchImpl = dependencies.fetchImpl ?? fetch;
        this.sleep = dependencies.sleep ?? sleepFor;
        this.log = dependencies.logger ?? ingestionLoggers.fetcher;
    }

    buildRecentlyPlayedUrl(options: RecentlyPlayedOptions = {}): string {
        const params = new URLSearchParams();

        params.set('limit', String(options.limit || 50));

        if (options.after !== undefined) {
            params.set('after', String(options.after));
        } else if (options.before !== undefined) {
            params.set('before', String(options.before));
        }

        return `${this.config.apiUrl}/me/player/recently-played?${params.toString()}`;
    }

    // Fetch recently played tracks
    async getRecentlyPlayed(
        accessToken: string,
        options: RecentlyPlayedOptions = {}
    ): Promise<SpotifyRecentlyPlayedResponse> {
        const payload = await this.fetchWithRetry(this.buildRecentlyPlayedUrl(options), accessToken);
        return parseRecentlyPlayedEnvelope(payload);
    }

    // Retries 5xx, network failures and 429 (after waiting Retry-After);
    // everything else fails on the first attempt.
    private async fetchWithRetry(url: string, accessToken: string): Promise<unknown> {
        return pRetry(
            async () => {
                let response: Response;
                try {
                    response = await this.fetchImpl(url, {
                        headers: {
                            Authorization: `Bearer ${accessToken}`,
                            Accept: 'application/json',
                        },
                        signal: AbortSignal.timeout(this.config.timeoutMs),
                    });
                } catch (error) {
                    // Rethrown as a non-TypeError so p-retry treats it as retryable
                    if (isNetworkError(error)) throw new SpotifyNetworkError(error);
                    throw new pRetry.AbortError(error instanceof Error ? error : String(error));
                }

                try {
                    return await handleResponse(response);
                } catch (error) {
                    if (isRetryableError(error)) throw error;
                    throw new pRetry.AbortError(error instanceof Error ? error : String(error));
                }
            },
            {
                retries: this.config.maxRetries,
                factor: 2,
                minTimeout: this.config.retryBaseMs,
                maxTimeout: this.config.retryMaxMs,
                onFailedAttempt: async (error) => {
                    this.log.warn(
                        {
                            event: 'spotify_request_retry',
                            attempt: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        'Spotify API attempt failed'
                    );

                    if (error instanceof SpotifyRateLimitError && error.retriesLeft > 0) {
                        const waitMs = error.retryAfterSeconds * 1000;
                        // A provider-imposed wait longer than the backoff cap ends the run
                        if (waitMs > this.config.retryMaxMs) {
                            throw error;
                        }
                        await this.sleep(waitMs);
                    }
                },
            }
        );
    }
}
