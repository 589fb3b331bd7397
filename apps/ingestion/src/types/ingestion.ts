// Data contracts for the ingestion pipeline

// OAuth token pair as held in memory. expiresAt is always derived from the
// lifetime stated by the accounts service at issue time.
export interface CredentialRecord {
    accessToken: string;
    refreshToken: string;
    expiresAt: Date;
    scope?: string;
    tokenType?: string;
}

// Resume point for the next execution
export type Watermark =
    | { type: 'timestamp'; playedAtMs: number }
    | { type: 'token'; token: string };

// One normalized play, keyed by (track_id, played_at)
export interface PlayEvent {
    readonly played_at: string;
    readonly played_at_timestamp: number;
    readonly track_id: string;
    readonly track_name: string;
    readonly artist_id: string;
    readonly artist_name: string;
    readonly album_id: string;
    readonly album_name: string;
    readonly release_date: string | null;
    readonly duration_ms: number;
    readonly popularity: number;
}

export interface ParsedPage {
    events: PlayEvent[];
    malformed: number;
    // Raw items behind the malformed count
    rejected: unknown[];
}

// Everything one execution fetched; never partially persisted
export interface IngestionBatch {
    fetchedAt: Date;
    sourceWatermark: Watermark | null;
    events: PlayEvent[];
    malformedCount: number;
    pagesFetched: number;
}

// Raw records that failed validation, kept so the watermark can pass them
export interface QuarantineBatch {
    fetchedAt: Date;
    sourceWatermark: Watermark | null;
    records: unknown[];
    // Newest point the provider showed for these records (epoch ms)
    resumeAfterMs: number;
}

export type IngestionOutcome =
    | { status: 'success'; ingested: number; location: string; watermark: Watermark }
    | { status: 'noop'; ingested: 0; watermark: Watermark | null }
    // Nothing valid in a full window of malformed records; moved past it
    | { status: 'skipped'; ingested: 0; quarantined: number; location: string; watermark: Watermark }
    | {
        // transient: retry later; permanent: the same run will fail the same way
        status: 'auth_failure' | 'transient_failure' | 'permanent_failure';
        kind: string;
        message: string;
    };

// Run summary for logging
export interface RunSummary {
    pagesFetched: number;
    fetched: number;
    duplicates: number;
    stale: number;
    malformed: number;
}
