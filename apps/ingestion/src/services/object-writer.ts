import type { Logger } from 'pino';
import type { ObjectStorage } from '../lib/object-storage';
import type { IngestionBatch, QuarantineBatch, Watermark } from '../types/ingestion';
import { StorageWriteFailedError, errorMessage } from '../lib/ingestion-errors';
import { ingestionLoggers } from '../lib/logger';
import { withStorageRetry } from '../lib/retry';

const RECEIPT_ISSUER = Symbol('object-writer');

// Proof that a batch reached durable storage. Only ObjectWriter can construct
// one, and CursorStore.advance requires one, so the watermark cannot move
// ahead of a write.
export class WriteReceipt {
    // Nominal brand: an object literal with the same fields is not a receipt
    readonly #issued = true;

    constructor(
        issuer: typeof RECEIPT_ISSUER,
        readonly key: string,
        readonly location: string,
        readonly eventCount: number,
        readonly newestPlayedAtMs: number
    ) {
        if (issuer !== RECEIPT_ISSUER) {
            throw new Error('WriteReceipt can only be issued by ObjectWriter');
        }
    }
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

// raw/year=YYYY/month=MM/day=DD (UTC)
export function partitionPath(prefix: string, fetchedAt: Date): string {
    return [
        prefix,
        `year=${fetchedAt.getUTCFullYear()}`,
        `month=${pad(fetchedAt.getUTCMonth() + 1)}`,
        `day=${pad(fetchedAt.getUTCDate())}`,
    ].join('/');
}

export function batchFileName(fetchedAt: Date, stem = 'spotify_plays'): string {
    const date = `${fetchedAt.getUTCFullYear()}${pad(fetchedAt.getUTCMonth() + 1)}${pad(fetchedAt.getUTCDate())}`;
    const time = `${pad(fetchedAt.getUTCHours())}${pad(fetchedAt.getUTCMinutes())}${pad(fetchedAt.getUTCSeconds())}`;
    return `${stem}_${date}_${time}_${pad(fetchedAt.getUTCMilliseconds(), 3)}.json`;
}

export function batchKey(prefix: string, fetchedAt: Date): string {
    return `${partitionPath(prefix, fetchedAt)}/${batchFileName(fetchedAt)}`;
}

function describeWatermark(watermark: Watermark | null): string | number | null {
    if (!watermark) return null;
    return watermark.type === 'timestamp' ? watermark.playedAtMs : watermark.token;
}

const isoSeconds = (date: Date): string => date.toISOString().replace(/\.\d{3}Z$/, 'Z');

export function serializeBatch(batch: IngestionBatch): string {
    return JSON.stringify(
        {
            fetched_at: isoSeconds(batch.fetchedAt),
            track_count: batch.events.length,
            source_watermark: describeWatermark(batch.sourceWatermark),
            tracks: batch.events,
        },
        null,
        2
    );
}

export function serializeQuarantine(batch: QuarantineBatch): string {
    return JSON.stringify(
        {
            fetched_at: isoSeconds(batch.fetchedAt),
            record_count: batch.records.length,
            source_watermark: describeWatermark(batch.sourceWatermark),
            resume_after: batch.resumeAfterMs,
            records: batch.records,
        },
        null,
        2
    );
}

export interface ObjectWriterOptions {
    prefix: string;
    quarantinePrefix?: string;
    retries?: number;
    logger?: Logger;
}

export class ObjectWriter {
    private readonly log: Logger;

    constructor(
        private readonly storage: ObjectStorage,
        private readonly options: ObjectWriterOptions
    ) {
        this.log = options.logger ?? ingestionLoggers.writer;
    }

    async write(batch: IngestionBatch): Promise<WriteReceipt> {
        if (batch.events.length === 0) {
            throw new Error('Refusing to write an empty batch');
        }

        const key = batchKey(this.options.prefix, batch.fetchedAt);
        const location = await this.persist(key, serializeBatch(batch), 'write_batch');
        const newestPlayedAtMs = Math.max(...batch.events.map((event) => event.played_at_timestamp));

        this.log.info(
            { event: 'batch_written', location, tracks: batch.events.length },
            `Saved ${batch.events.length} tracks`
        );

        return new WriteReceipt(RECEIPT_ISSUER, key, location, batch.events.length, newestPlayedAtMs);
    }

    // Keeps records that could not be parsed, so the watermark can move past
    // them without losing them. The receipt resumes after resumeAfterMs.
    async quarantine(batch: QuarantineBatch): Promise<WriteReceipt> {
        if (batch.records.length === 0) {
            throw new Error('Refusing to quarantine an empty batch');
        }

        const prefix = this.options.quarantinePrefix ?? 'quarantine';
        const key = `${partitionPath(prefix, batch.fetchedAt)}/${batchFileName(batch.fetchedAt, 'spotify_rejected')}`;
        const location = await this.persist(key, serializeQuarantine(batch), 'write_quarantine');

        this.log.warn(
            { event: 'records_quarantined', location, records: batch.records.length },
            `Quarantined ${batch.records.length} malformed records`
        );

        return new WriteReceipt(RECEIPT_ISSUER, key, location, 0, batch.resumeAfterMs);
    }

    private async persist(key: string, body: string, operation: string): Promise<string> {
        try {
            await withStorageRetry(() => this.storage.put(key, body, 'application/json'), {
                retries: this.options.retries ?? 3,
                logger: this.log,
                operation,
            });
        } catch (error) {
            throw new StorageWriteFailedError(`Failed to write ${key}: ${errorMessage(error)}`, { cause: error });
        }
        return this.storage.locate(key);
    }
}
