import { z } from 'zod';
import type { Logger } from 'pino';
import type { ObjectStorage } from '../lib/object-storage';
import type { Watermark } from '../types/ingestion';
import { ingestionLoggers } from '../lib/logger';
import { withStorageRetry } from '../lib/retry';
import { StorageWriteFailedError, UnsupportedCursorError, errorMessage } from '../lib/ingestion-errors';
import type { WriteReceipt } from './object-writer';

export interface CursorStore {
    loadWatermark(): Promise<Watermark | null>;
    advance(receipt: WriteReceipt): Promise<Watermark>;
}

const storedStateSchema = z.union([
    z.object({
        last_processed_timestamp: z.number().int().nonnegative(),
    }),
    z.object({
        cursor_token: z.string().min(1),
    }),
]);

export function watermarkFromReceipt(receipt: WriteReceipt): Extract<Watermark, { type: 'timestamp' }> {
    return { type: 'timestamp', playedAtMs: receipt.newestPlayedAtMs };
}

// Epoch ms the provider resumes after. Token watermarks are only ever seeded by
// an operator; Spotify's cursors are epoch ms, so anything else cannot be paged from.
export function watermarkMs(watermark: Watermark): number {
    if (watermark.type === 'timestamp') {
        return watermark.playedAtMs;
    }
    const parsed = Number(watermark.token);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new UnsupportedCursorError(watermark.token);
    }
    return parsed;
}

export function serializeWatermark(playedAtMs: number, now: Date = new Date()): string {
    return JSON.stringify(
        {
            last_processed_timestamp: playedAtMs,
            last_processed_at: new Date(playedAtMs).toISOString().replace(/\.\d{3}Z$/, 'Z'),
            updated_at: now.toISOString().replace(/\.\d{3}Z$/, 'Z'),
        },
        null,
        2
    );
}

export function deserializeWatermark(raw: string): Watermark {
    const parsed = storedStateSchema.parse(JSON.parse(raw));
    if ('cursor_token' in parsed) {
        return { type: 'token', token: parsed.cursor_token };
    }
    return { type: 'timestamp', playedAtMs: parsed.last_processed_timestamp };
}

export interface ObjectCursorStoreOptions {
    key: string;
    retries?: number;
    logger?: Logger;
}

export class ObjectCursorStore implements CursorStore {
    private readonly log: Logger;
    private current: Watermark | null = null;

    constructor(
        private readonly storage: ObjectStorage,
        private readonly options: ObjectCursorStoreOptions
    ) {
        this.log = options.logger ?? ingestionLoggers.cursor;
    }

    // Unlike credentials, an unreadable watermark is an error: treating it as
    // absent would silently restart from the first-run window.
    async loadWatermark(): Promise<Watermark | null> {
        const raw = await this.storage.get(this.options.key);
        if (raw === null) {
            this.log.info({ event: 'watermark_absent', key: this.options.key }, 'No previous state found - first run');
            this.current = null;
            return null;
        }

        this.current = deserializeWatermark(raw);
        this.log.info({ event: 'watermark_loaded', watermark: this.current }, 'Loaded watermark');
        return this.current;
    }

    async advance(receipt: WriteReceipt): Promise<Watermark> {
        const next = watermarkFromReceipt(receipt);
        const currentMs = this.current ? watermarkMs(this.current) : null;

        if (currentMs !== null && next.playedAtMs <= currentMs) {
            throw new Error(`Watermark must move forward (current=${currentMs}, proposed=${next.playedAtMs})`);
        }

        try {
            await withStorageRetry(() => this.storage.put(this.options.key, serializeWatermark(next.playedAtMs)), {
                retries: this.options.retries ?? 3,
                logger: this.log,
                operation: 'advance_watermark',
            });
        } catch (error) {
            // The batch is already durable; the next run re-fetches and re-writes it
            throw new StorageWriteFailedError(
                `Failed to advance watermark at ${this.options.key}: ${errorMessage(error)}`,
                { cause: error }
            );
        }

        this.current = next;
        this.log.info(
            { event: 'watermark_advanced', watermark: next, location: receipt.location },
            'Watermark advanced'
        );
        return next;
    }
}
