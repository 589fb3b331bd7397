import type { Logger } from 'pino';
import type { CredentialRecord } from '../types/ingestion';
import type { SpotifyTokenResponse } from '../types/spotify';
import type { CredentialStore } from '../services/credential-store';
import { TokenRefreshError, isNetworkError } from './spotify-errors';
import {
    AuthBootstrapRequiredError,
    AuthExpiredUnrecoverableError,
    CredentialPersistError,
    TransientNetworkError,
    errorMessage,
} from './ingestion-errors';
import { ingestionLoggers } from './logger';
import { withStorageRetry } from './retry';

export type AuthState = 'NoCredentials' | 'Valid' | 'Expired' | 'Refreshing' | 'Failed';

export interface TokenEndpoint {
    refreshAccessToken(refreshToken: string): Promise<SpotifyTokenResponse>;
}

export interface TokenManagerOptions {
    // Used once when the store is empty, in place of the interactive flow
    bootstrapRefreshToken?: string;
    // Treat tokens this close to expiry as already expired
    expirySkewMs?: number;
    saveRetries?: number;
    now?: () => number;
    logger?: Logger;
}

// Keeps a usable access token for the current execution. The in-memory record
// is only a cache: a refreshed pair is written to the credential store before
// its access token is handed out.
export class TokenManager {
    private state: AuthState = 'NoCredentials';
    private current: CredentialRecord | null = null;
    private loaded = false;

    private readonly now: () => number;
    private readonly expirySkewMs: number;
    private readonly log: Logger;

    constructor(
        private readonly store: CredentialStore,
        private readonly endpoint: TokenEndpoint,
        private readonly options: TokenManagerOptions = {}
    ) {
        this.now = options.now ?? Date.now;
        this.expirySkewMs = options.expirySkewMs ?? 60_000;
        this.log = options.logger ?? ingestionLoggers.auth;
    }

    getState(): AuthState {
        return this.state;
    }

    async ensureValidToken(): Promise<string> {
        if (this.state === 'Failed') {
            throw new AuthExpiredUnrecoverableError('Authorization failed earlier in this execution');
        }

        if (!this.loaded) {
            this.current = await this.store.load();
            this.loaded = true;
        }

        if (!this.current) {
            this.state = 'NoCredentials';
            return this.bootstrap();
        }

        if (this.isExpired(this.current)) {
            this.transition('Expired', { expiresAt: this.current.expiresAt.toISOString() });
            return this.refresh(this.current.refreshToken);
        }

        this.state = 'Valid';
        return this.current.accessToken;
    }

    // Called when the API rejects a token that looked valid locally
    async forceRefresh(): Promise<string> {
        if (this.state === 'Failed') {
            throw new AuthExpiredUnrecoverableError('Authorization failed earlier in this execution');
        }
        if (!this.current) {
            return this.ensureValidToken();
        }
        this.transition('Expired', { reason: 'rejected_by_api' });
        return this.refresh(this.current.refreshToken);
    }

    private async bootstrap(): Promise<string> {
        const refreshToken = this.options.bootstrapRefreshToken;
        if (!refreshToken) {
            this.log.error({ event: 'auth_bootstrap_required' }, 'No credentials stored and no bootstrap token configured');
            throw new AuthBootstrapRequiredError();
        }
        this.log.info({ event: 'auth_bootstrap' }, 'Bootstrapping credentials from configured refresh token');
        return this.refresh(refreshToken);
    }

    private async refresh(refreshToken: string): Promise<string> {
        const previousState = this.state;
        this.transition('Refreshing');

        // Lifetime counts from the request, so network latency only shortens it
        const requestedAt = this.now();
        let tokens: SpotifyTokenResponse;
        try {
            tokens = await this.endpoint.refreshAccessToken(refreshToken);
        } catch (error) {
            if (error instanceof TokenRefreshError && isTerminalRefreshFailure(error)) {
                this.transition('Failed', { spotifyError: error.spotifyError, statusCode: error.statusCode });
                throw new AuthExpiredUnrecoverableError(
                    `Refresh token rejected (${error.spotifyError ?? error.statusCode ?? 'unknown'}); re-authorization required`,
                    { cause: error }
                );
            }

            this.state = previousState;
            if (error instanceof TokenRefreshError || isNetworkError(error)) {
                throw new TransientNetworkError(`Token refresh failed: ${errorMessage(error)}`, { cause: error });
            }
            throw error;
        }

        const record: CredentialRecord = {
            accessToken: tokens.access_token,
            // Spotify only sends refresh_token when it rotates it
            refreshToken: tokens.refresh_token ?? refreshToken,
            expiresAt: new Date(requestedAt + tokens.expires_in * 1000),
            scope: tokens.scope,
            tokenType: tokens.token_type,
        };

        try {
            await withStorageRetry(() => this.store.save(record), {
                retries: this.options.saveRetries ?? 2,
                logger: this.log,
                operation: 'save_credentials',
            });
        } catch (error) {
            this.state = previousState;
            this.log.error(
                { event: 'credentials_persist_failed', rotated: tokens.refresh_token !== undefined, error: errorMessage(error) },
                'Refreshed credentials could not be persisted'
            );
            throw new CredentialPersistError(
                `Refreshed credentials could not be persisted: ${errorMessage(error)}`,
                { cause: error }
            );
        }

        this.current = record;
        this.transition('Valid', { expiresAt: record.expiresAt.toISOString() });
        this.log.info({ event: 'token_refreshed', rotated: tokens.refresh_token !== undefined }, 'Access token refreshed');
        return record.accessToken;
    }

    private isExpired(record: CredentialRecord): boolean {
        return this.now() >= record.expiresAt.getTime() - this.expirySkewMs;
    }

    private transition(next: AuthState, details: Record<string, unknown> = {}): void {
        this.log.debug({ event: 'auth_state', from: this.state, to: next, ...details }, 'Auth state change');
        this.state = next;
    }
}

// invalid_grant (revoked/expired refresh token) and bad client credentials
// cannot be fixed by retrying
function isTerminalRefreshFailure(error: TokenRefreshError): boolean {
    if (error.isRevoked) return true;
    return error.statusCode === 400 || error.statusCode === 401;
}
