import { z } from 'zod';
import type { Logger } from 'pino';
import type { ObjectStorage } from '../lib/object-storage';
import type { CredentialRecord } from '../types/ingestion';
import { decrypt, encrypt, isEncrypted } from '../lib/encryption';
import { ingestionLoggers } from '../lib/logger';
import { errorMessage } from '../lib/ingestion-errors';

export interface CredentialStore {
    load(): Promise<CredentialRecord | null>;
    save(record: CredentialRecord): Promise<void>;
}

const storedCredentialSchema = z.object({
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'invalid expires_at'),
    scope: z.string().optional(),
    token_type: z.string().optional(),
});

export function serializeCredentials(record: CredentialRecord, now: Date = new Date()): string {
    return JSON.stringify({
        access_token: record.accessToken,
        refresh_token: record.refreshToken,
        expires_at: record.expiresAt.toISOString(),
        scope: record.scope,
        token_type: record.tokenType,
        updated_at: now.toISOString(),
    });
}

export function deserializeCredentials(raw: string): CredentialRecord {
    const parsed = storedCredentialSchema.parse(JSON.parse(raw));
    return {
        accessToken: parsed.access_token,
        refreshToken: parsed.refresh_token,
        expiresAt: new Date(parsed.expires_at),
        scope: parsed.scope,
        tokenType: parsed.token_type,
    };
}

export interface ObjectCredentialStoreOptions {
    key: string;
    encryptionKey?: string;
    logger?: Logger;
}

// Token pair persisted as one small JSON blob, optionally AES-GCM encrypted.
// Writes replace the whole object.
export class ObjectCredentialStore implements CredentialStore {
    private readonly log: Logger;

    constructor(
        private readonly storage: ObjectStorage,
        private readonly options: ObjectCredentialStoreOptions
    ) {
        this.log = options.logger ?? ingestionLoggers.auth;
    }

    // Any read or decode failure means "no credentials yet"
    async load(): Promise<CredentialRecord | null> {
        try {
            const blob = await this.storage.get(this.options.key);
            if (blob === null) {
                this.log.info({ event: 'credentials_absent', key: this.options.key }, 'No stored credentials');
                return null;
            }
            return deserializeCredentials(this.decode(blob));
        } catch (error) {
            this.log.warn(
                { event: 'credentials_unreadable', key: this.options.key, error: errorMessage(error) },
                'Stored credentials could not be read; treating as absent'
            );
            return null;
        }
    }

    async save(record: CredentialRecord): Promise<void> {
        const json = serializeCredentials(record);
        const body = this.options.encryptionKey ? encrypt(json, this.options.encryptionKey) : json;
        await this.storage.put(
            this.options.key,
            body,
            this.options.encryptionKey ? 'text/plain' : 'application/json'
        );
        this.log.info(
            { event: 'credentials_saved', location: this.storage.locate(this.options.key), expiresAt: record.expiresAt.toISOString() },
            'Credentials persisted'
        );
    }

    private decode(blob: string): string {
        if (!isEncrypted(blob)) {
            return blob;
        }
        if (!this.options.encryptionKey) {
            throw new Error('Stored credentials are encrypted but no ENCRYPTION_KEY is configured');
        }
        return decrypt(blob.trim(), this.options.encryptionKey);
    }
}
