import type { Logger } from 'pino';
import type { IngestionBatch, IngestionOutcome, PlayEvent, RunSummary, Watermark } from '../types/ingestion';
import { watermarkMs, type CursorStore } from './cursor-store';
import type { EventFetcher } from './event-fetcher';
import type { ObjectWriter } from './object-writer';
import { SpotifyApiError, SpotifyUnauthenticatedError } from '../lib/spotify-errors';
import {
    AuthExpiredUnrecoverableError,
    IngestionError,
    errorMessage,
    isAuthError,
} from '../lib/ingestion-errors';
import { ingestionLoggers } from '../lib/logger';

export interface TokenProvider {
    ensureValidToken(): Promise<string>;
    forceRefresh(): Promise<string>;
}

export interface IngestionDependencies {
    tokens: TokenProvider;
    cursorStore: CursorStore;
    fetcher: Pick<EventFetcher, 'fetchSince' | 'fetchHistory'>;
    writer: Pick<ObjectWriter, 'write' | 'quarantine'>;
    // With no watermark, page back through all history the provider exposes
    // instead of taking only the most recent page
    backfillOnFirstRun?: boolean;
    now?: () => Date;
    logger?: Logger;
}

export function playEventKey(event: PlayEvent): string {
    return `${event.track_id}|${event.played_at_timestamp}`;
}

// Keeps the first occurrence of each (track_id, played_at) in provider order
export function dedupeEvents(events: readonly PlayEvent[]): { events: PlayEvent[]; duplicates: number } {
    const seen = new Set<string>();
    const unique: PlayEvent[] = [];

    for (const event of events) {
        const key = playEventKey(event);
        if (seen.has(key)) continue;
        seen.add(key);
        unique.push(event);
    }

    return { events: unique, duplicates: events.length - unique.length };
}

export function sortByPlayedAt(events: readonly PlayEvent[]): PlayEvent[] {
    return [...events].sort((a, b) => a.played_at_timestamp - b.played_at_timestamp);
}

type FailureOutcome = Extract<IngestionOutcome, { status: 'auth_failure' | 'transient_failure' | 'permanent_failure' }>;

function failureStatus(retryable: boolean): FailureOutcome['status'] {
    return retryable ? 'transient_failure' : 'permanent_failure';
}

// Maps a failed run onto the outcome reported to the scheduler
export function classifyFailure(error: unknown): FailureOutcome {
    if (error instanceof IngestionError) {
        return {
            status: isAuthError(error) ? 'auth_failure' : failureStatus(error.retryable),
            kind: error.kind,
            message: error.message,
        };
    }
    if (error instanceof SpotifyApiError) {
        return { status: failureStatus(error.retryable), kind: `spotify_${error.kind}`, message: error.message };
    }
    return { status: 'transient_failure', kind: 'unknown', message: errorMessage(error) };
}

interface CollectedEvents {
    events: PlayEvent[];
    rejected: unknown[];
    pagesFetched: number;
    malformed: number;
    newestSeenMs: number | null;
}

export class IngestionOrchestrator {
    private readonly now: () => Date;
    private readonly log: Logger;

    constructor(private readonly deps: IngestionDependencies) {
        this.now = deps.now ?? (() => new Date());
        this.log = deps.logger ?? ingestionLoggers.orchestrator;
    }

    // Scheduler entry point: never throws, always reports an outcome
    async run(): Promise<IngestionOutcome> {
        try {
            return await this.ingest();
        } catch (error) {
            const outcome = classifyFailure(error);
            this.log.error(
                { event: 'ingestion_failed', status: outcome.status, kind: outcome.kind, error: outcome.message },
                'Ingestion failed; watermark unchanged'
            );
            return outcome;
        }
    }

    // Throws on failure. State only changes in the final two steps, in order:
    // batch (or quarantine) write, then watermark advance.
    async ingest(): Promise<Extract<IngestionOutcome, { status: 'success' | 'noop' | 'skipped' }>> {
        let token = await this.deps.tokens.ensureValidToken();
        const watermark = await this.deps.cursorStore.loadWatermark();
        const fetchedAt = this.now();

        let collected: CollectedEvents;
        try {
            collected = await this.collect(token, watermark);
        } catch (error) {
            if (!(error instanceof SpotifyUnauthenticatedError)) throw error;

            // Token looked valid locally but was rejected; refresh once and restart
            this.log.warn({ event: 'token_rejected' }, 'Access token rejected by Spotify, refreshing');
            token = await this.deps.tokens.forceRefresh();
            try {
                collected = await this.collect(token, watermark);
            } catch (retryError) {
                if (retryError instanceof SpotifyUnauthenticatedError) {
                    throw new AuthExpiredUnrecoverableError('Spotify rejected a freshly refreshed token', {
                        cause: retryError,
                    });
                }
                throw retryError;
            }
        }

        const { events: unique, duplicates } = dedupeEvents(collected.events);
        const fresh = watermark ? unique.filter((event) => isNewerThan(event, watermark)) : unique;
        const summary: RunSummary = {
            pagesFetched: collected.pagesFetched,
            fetched: collected.events.length,
            duplicates,
            stale: unique.length - fresh.length,
            malformed: collected.malformed,
        };

        if (fresh.length === 0) {
            const resumeAfterMs = collected.newestSeenMs;
            if (collected.rejected.length > 0 && resumeAfterMs !== null && isPast(resumeAfterMs, watermark)) {
                return this.skipMalformed(collected, { fetchedAt, watermark, resumeAfterMs, summary });
            }
            this.log.info({ event: 'ingestion_noop', ...summary }, 'No new tracks found');
            return { status: 'noop', ingested: 0, watermark };
        }

        const batch: IngestionBatch = {
            fetchedAt,
            sourceWatermark: watermark,
            events: sortByPlayedAt(fresh),
            malformedCount: collected.malformed,
            pagesFetched: collected.pagesFetched,
        };

        const receipt = await this.deps.writer.write(batch);
        const advanced = await this.deps.cursorStore.advance(receipt);

        this.log.info(
            {
                event: 'ingestion_complete',
                ...summary,
                ingested: batch.events.length,
                location: receipt.location,
                range: [batch.events[0].played_at, batch.events[batch.events.length - 1].played_at],
            },
            `Processed ${batch.events.length} tracks`
        );

        return { status: 'success', ingested: batch.events.length, location: receipt.location, watermark: advanced };
    }

    // Every record in the window was malformed. Without this the next run
    // would fetch the same window and never reach the plays behind it.
    private async skipMalformed(
        collected: CollectedEvents,
        context: { fetchedAt: Date; watermark: Watermark | null; resumeAfterMs: number; summary: RunSummary }
    ): Promise<Extract<IngestionOutcome, { status: 'skipped' }>> {
        const receipt = await this.deps.writer.quarantine({
            fetchedAt: context.fetchedAt,
            sourceWatermark: context.watermark,
            records: collected.rejected,
            resumeAfterMs: context.resumeAfterMs,
        });
        const advanced = await this.deps.cursorStore.advance(receipt);

        this.log.error(
            {
                event: 'malformed_window_skipped',
                ...context.summary,
                quarantined: collected.rejected.length,
                location: receipt.location,
                resumeAfterMs: context.resumeAfterMs,
            },
            `No valid tracks in ${collected.pagesFetched} pages; quarantined ${collected.rejected.length} malformed records and moved past them`
        );

        return {
            status: 'skipped',
            ingested: 0,
            quarantined: collected.rejected.length,
            location: receipt.location,
            watermark: advanced,
        };
    }

    private async collect(token: string, watermark: Watermark | null): Promise<CollectedEvents> {
        const events: PlayEvent[] = [];
        const rejected: unknown[] = [];
        let pagesFetched = 0;
        let malformed = 0;
        let newestSeenMs: number | null = null;

        const backfill = watermark === null && this.deps.backfillOnFirstRun === true;
        if (backfill) {
            this.log.info({ event: 'backfill_started' }, 'No watermark; paging back through available history');
        }
        const pages = backfill
            ? this.deps.fetcher.fetchHistory(token)
            : this.deps.fetcher.fetchSince(token, watermark);

        for await (const page of pages) {
            pagesFetched++;
            malformed += page.malformed;
            events.push(...page.events);
            rejected.push(...page.rejected);
            if (page.newestSeenMs !== null && (newestSeenMs === null || page.newestSeenMs > newestSeenMs)) {
                newestSeenMs = page.newestSeenMs;
            }
        }

        return { events, rejected, pagesFetched, malformed, newestSeenMs };
    }
}

function isPast(playedAtMs: number, watermark: Watermark | null): boolean {
    return watermark === null || playedAtMs > watermarkMs(watermark);
}

function isNewerThan(event: PlayEvent, watermark: Watermark): boolean {
    return isPast(event.played_at_timestamp, watermark);
}
