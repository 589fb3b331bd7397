import type { Env } from '../env';
import type { FetchLike } from '../lib/spotify';
import { SpotifyOAuthClient } from '../lib/spotify';
import { SpotifyApiClient, type SleepLike } from '../lib/spotify-api';
import { FileSystemObjectStorage, S3ObjectStorage, type ObjectStorage } from '../lib/object-storage';
import { TokenManager } from '../lib/token-manager';
import { ObjectCredentialStore } from './credential-store';
import { ObjectCursorStore } from './cursor-store';
import { EventFetcher } from './event-fetcher';
import { ObjectWriter } from './object-writer';
import { IngestionOrchestrator } from './ingestion';

export interface ContainerOverrides {
    storage?: ObjectStorage;
    fetchImpl?: FetchLike;
    sleep?: SleepLike;
    now?: () => Date;
}

export interface IngestionContainer {
    storage: ObjectStorage;
    oauth: SpotifyOAuthClient;
    tokenManager: TokenManager;
    orchestrator: IngestionOrchestrator;
    credentialStore: ObjectCredentialStore;
}

export function createStorage(env: Env): ObjectStorage {
    if (env.STORAGE_DRIVER === 'filesystem') {
        return new FileSystemObjectStorage(env.STORAGE_ROOT);
    }
    if (!env.S3_BUCKET) {
        throw new Error('S3_BUCKET is required when STORAGE_DRIVER is s3');
    }
    return new S3ObjectStorage({ bucket: env.S3_BUCKET, region: env.S3_REGION });
}

// Wires one execution's collaborators. Nothing here is a process-wide
// singleton, so each invocation starts from durable state only.
export function createContainer(env: Env, overrides: ContainerOverrides = {}): IngestionContainer {
    const storage = overrides.storage ?? createStorage(env);
    const now = overrides.now ?? (() => new Date());

    const oauth = new SpotifyOAuthClient(
        {
            clientId: env.SPOTIFY_CLIENT_ID,
            clientSecret: env.SPOTIFY_CLIENT_SECRET,
            redirectUri: env.SPOTIFY_REDIRECT_URI,
            accountsUrl: env.SPOTIFY_ACCOUNTS_URL,
            timeoutMs: env.FETCH_TIMEOUT_MS,
        },
        overrides.fetchImpl
    );

    const api = new SpotifyApiClient(
        {
            apiUrl: env.SPOTIFY_API_URL,
            maxRetries: env.FETCH_MAX_RETRIES,
            retryBaseMs: env.FETCH_RETRY_BASE_MS,
            retryMaxMs: env.FETCH_RETRY_MAX_MS,
            timeoutMs: env.FETCH_TIMEOUT_MS,
        },
        { fetchImpl: overrides.fetchImpl, sleep: overrides.sleep }
    );

    const credentialStore = new ObjectCredentialStore(storage, {
        key: env.CREDENTIALS_KEY,
        encryptionKey: env.ENCRYPTION_KEY,
    });

    const tokenManager = new TokenManager(credentialStore, oauth, {
        bootstrapRefreshToken: env.SPOTIFY_BOOTSTRAP_REFRESH_TOKEN,
        expirySkewMs: env.TOKEN_EXPIRY_SKEW_SECONDS * 1000,
        saveRetries: env.STORAGE_MAX_RETRIES,
        now: () => now().getTime(),
    });

    const orchestrator = new IngestionOrchestrator({
        tokens: tokenManager,
        cursorStore: new ObjectCursorStore(storage, { key: env.STATE_KEY, retries: env.STORAGE_MAX_RETRIES }),
        fetcher: new EventFetcher(api, {
            pageLimit: env.FETCH_PAGE_LIMIT,
            maxPages: env.FETCH_MAX_PAGES,
            historyMaxPages: env.BACKFILL_MAX_PAGES,
        }),
        writer: new ObjectWriter(storage, {
            prefix: env.OUTPUT_PREFIX,
            quarantinePrefix: env.QUARANTINE_PREFIX,
            retries: env.STORAGE_MAX_RETRIES,
        }),
        backfillOnFirstRun: env.FIRST_RUN_BACKFILL,
        now,
    });

    return { storage, oauth, tokenManager, orchestrator, credentialStore };
}
