import type { Logger } from 'pino';
import type { PlayEvent, Watermark } from '../types/ingestion';
import type { SpotifyRecentlyPlayedResponse } from '../types/spotify';
import type { RecentlyPlayedOptions } from '../lib/spotify-api';
import { SpotifyApiError, SpotifyRateLimitError } from '../lib/spotify-errors';
import {
    AuthExpiredUnrecoverableError,
    ProviderRequestRejectedError,
    ProviderResponseInvalidError,
    RateLimitedError,
    TransientNetworkError,
} from '../lib/ingestion-errors';
import { parseRecentlyPlayed, rawPlayedAtMs } from '../lib/spotify-parser';
import { ingestionLoggers } from '../lib/logger';
import { watermarkMs } from './cursor-store';

export interface RecentlyPlayedSource {
    getRecentlyPlayed(accessToken: string, options?: RecentlyPlayedOptions): Promise<SpotifyRecentlyPlayedResponse>;
}

export interface FetchedPage {
    pageNumber: number;
    // Cursor sent for this page; both null for an unbounded request
    after: number | null;
    before: number | null;
    events: PlayEvent[];
    malformed: number;
    rejected: unknown[];
    // Provider continuation cursors, when the response carried them
    cursorAfter: string | null;
    cursorBefore: string | null;
    // Range of played_at across every item, malformed ones included, widened
    // by the provider cursors
    newestSeenMs: number | null;
    oldestSeenMs: number | null;
}

export interface EventFetcherOptions {
    pageLimit: number;
    maxPages: number;
    // Cap for backward history paging
    historyMaxPages?: number;
    logger?: Logger;
}

export const DEFAULT_HISTORY_MAX_PAGES = 100;

function numericCursor(value: string | null): number | null {
    if (value === null) return null;
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed >= 0 ? parsed : null;
}

function seenRange(items: unknown[], cursorAfter: number | null, cursorBefore: number | null) {
    const seen = items.map(rawPlayedAtMs).filter((ms): ms is number => ms !== null);
    const newest = [...seen, ...(cursorAfter === null ? [] : [cursorAfter])];
    const oldest = [...seen, ...(cursorBefore === null ? [] : [cursorBefore])];
    return {
        newestSeenMs: newest.length > 0 ? Math.max(...newest) : null,
        oldestSeenMs: oldest.length > 0 ? Math.min(...oldest) : null,
    };
}

// Maps provider failures onto the engine taxonomy. 401 stays a provider error
// so the caller can refresh the token and restart from the same watermark.
export function translateFetchError(error: unknown): unknown {
    if (!(error instanceof SpotifyApiError)) {
        return error;
    }

    switch (error.kind) {
        case 'rate_limited':
            return new RateLimitedError(
                error instanceof SpotifyRateLimitError ? error.retryAfterSeconds * 1000 : 60_000
            );
        case 'unavailable':
        case 'network':
            return new TransientNetworkError(error.message, { cause: error });
        case 'forbidden':
            return new AuthExpiredUnrecoverableError(
                'Spotify refused the request (403); check the granted scopes',
                { cause: error }
            );
        case 'malformed_response':
            return new ProviderResponseInvalidError(error.message, { cause: error });
        case 'not_found':
        case 'client':
            return new ProviderRequestRejectedError(error.statusCode, error.message, { cause: error });
        case 'unauthenticated':
            return error;
    }
}

export class EventFetcher {
    private readonly log: Logger;

    constructor(
        private readonly source: RecentlyPlayedSource,
        private readonly options: EventFetcherOptions
    ) {
        this.log = options.logger ?? ingestionLoggers.fetcher;
    }

    // Pages forward from the watermark. A fresh call restarts from the
    // watermark; the returned iterator cannot be rewound.
    async *fetchSince(accessToken: string, watermark: Watermark | null): AsyncGenerator<FetchedPage, void, undefined> {
        const limit = this.options.pageLimit;

        if (!watermark) {
            // First run: most recent page only
            const response = await this.request(accessToken, { limit });
            yield this.toPage(1, { after: null, before: null }, response);
            return;
        }

        const requested = new Set<number>();
        let after = watermarkMs(watermark);
        let pageNumber = 0;

        while (true) {
            if (pageNumber >= this.options.maxPages) {
                this.log.warn(
                    { event: 'page_cap_reached', maxPages: this.options.maxPages, after },
                    `Reached ${this.options.maxPages} pages of new data, stopping`
                );
                return;
            }

            requested.add(after);
            pageNumber++;

            const response = await this.request(accessToken, { limit, after });
            const page = this.toPage(pageNumber, { after, before: null }, response);
            yield page;

            if (response.items.length < limit || response.next === null) {
                return;
            }

            const nextAfter = this.nextAfter(page, after);
            if (nextAfter === null || requested.has(nextAfter)) {
                this.log.warn({ event: 'cursor_stalled', after }, 'Pagination cursor did not advance, stopping');
                return;
            }
            after = nextAfter;
        }
    }

    // Pages backward from the newest play with `before`, until the provider
    // has no older history or the history cap is reached.
    async *fetchHistory(accessToken: string): AsyncGenerator<FetchedPage, void, undefined> {
        const limit = this.options.pageLimit;
        const maxPages = this.options.historyMaxPages ?? DEFAULT_HISTORY_MAX_PAGES;
        const requested = new Set<number>();
        let before: number | null = null;
        let pageNumber = 0;

        while (true) {
            if (pageNumber >= maxPages) {
                this.log.warn(
                    { event: 'history_cap_reached', maxPages, before },
                    `Reached ${maxPages} pages of history, stopping`
                );
                return;
            }

            pageNumber++;

            const response = await this.request(accessToken, before === null ? { limit } : { limit, before });
            const page = this.toPage(pageNumber, { after: null, before }, response);
            yield page;

            if (response.items.length < limit || response.next === null) {
                return;
            }

            const nextBefore = this.nextBefore(page, before);
            if (nextBefore === null || requested.has(nextBefore)) {
                this.log.warn({ event: 'cursor_stalled', before }, 'History cursor did not move back, stopping');
                return;
            }
            requested.add(nextBefore);
            before = nextBefore;
        }
    }

    private nextAfter(page: FetchedPage, current: number): number | null {
        const fromProvider = numericCursor(page.cursorAfter);
        if (fromProvider !== null && fromProvider > current) {
            return fromProvider;
        }
        return page.newestSeenMs !== null && page.newestSeenMs > current ? page.newestSeenMs : null;
    }

    private nextBefore(page: FetchedPage, current: number | null): number | null {
        const isOlder = (ms: number | null): ms is number => ms !== null && (current === null || ms < current);
        const fromProvider = numericCursor(page.cursorBefore);
        if (isOlder(fromProvider)) {
            return fromProvider;
        }
        return isOlder(page.oldestSeenMs) ? page.oldestSeenMs : null;
    }

    private async request(accessToken: string, options: RecentlyPlayedOptions): Promise<SpotifyRecentlyPlayedResponse> {
        try {
            return await this.source.getRecentlyPlayed(accessToken, options);
        } catch (error) {
            throw translateFetchError(error);
        }
    }

    private toPage(
        pageNumber: number,
        cursor: { after: number | null; before: number | null },
        response: SpotifyRecentlyPlayedResponse
    ): FetchedPage {
        const { events, malformed, rejected } = parseRecentlyPlayed(response.items);
        const cursorAfter = response.cursors?.after ?? null;
        const cursorBefore = response.cursors?.before ?? null;

        if (malformed > 0) {
            this.log.warn(
                { event: 'record_malformed', page: pageNumber, malformed },
                `Dropped ${malformed} malformed records`
            );
        }

        this.log.info(
            { event: 'page_fetched', page: pageNumber, ...cursor, items: response.items.length, events: events.length },
            `Page ${pageNumber}: fetched ${events.length} tracks`
        );

        return {
            pageNumber,
            ...cursor,
            events,
            malformed,
            rejected,
            cursorAfter,
            cursorBefore,
            ...seenRange(response.items, numericCursor(cursorAfter), numericCursor(cursorBefore)),
        };
    }
}
