import { createHash, randomBytes } from 'crypto';
import type { SpotifyTokenErrorResponse, SpotifyTokenResponse } from '../types/spotify';
import { TokenRefreshError } from './spotify-errors';

export const SCOPES = ['user-read-recently-played'].join(' ');

export type FetchLike = typeof fetch;

export interface SpotifyOAuthConfig {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    accountsUrl: string;
    timeoutMs?: number;
}

// PKCE utilities
export function generateCodeVerifier(): string {
    return randomBytes(32).toString('base64url');
}

export function generateCodeChallenge(verifier: string): string {
    return createHash('sha256').update(verifier).digest('base64url');
}

export function generateState(): string {
    return randomBytes(16).toString('hex');
}

async function parseTokenError(response: Response): Promise<TokenRefreshError> {
    const errorText = await response.text();
    let errorBody: SpotifyTokenErrorResponse = {};
    try {
        errorBody = JSON.parse(errorText) as SpotifyTokenErrorResponse;
    } catch {
        errorBody = {};
    }

    // invalid_grant: refresh token revoked, expired or already rotated
    const isRevoked = errorBody.error === 'invalid_grant';
    return new TokenRefreshError(
        `Token request failed: ${errorBody.error_description || errorText || response.status}`,
        isRevoked,
        errorBody.error,
        response.status
    );
}

export class SpotifyOAuthClient {
    private readonly fetchImpl: FetchLike;

    constructor(
        private readonly config: SpotifyOAuthConfig,
        fetchImpl?: FetchLike
    ) {
        this.fetchImpl = fetchImpl ?? fetch;
    }

    buildAuthUrl(codeChallenge: string, state: string): string {
        const params = new URLSearchParams({
            client_id: this.config.clientId,
            response_type: 'code',
            redirect_uri: this.config.redirectUri,
            scope: SCOPES,
            state,
            code_challenge_method: 'S256',
            code_challenge: codeChallenge,
        });

        return `${this.config.accountsUrl}/authorize?${params.toString()}`;
    }

    // Exchange authorization code for tokens
    async exchangeCodeForTokens(code: string, codeVerifier: string): Promise<SpotifyTokenResponse> {
        return this.requestToken(
            new URLSearchParams({
                grant_type: 'authorization_code',
                code,
                redirect_uri: this.config.redirectUri,
                client_id: this.config.clientId,
                code_verifier: codeVerifier,
            })
        );
    }

    // The response only carries refresh_token when Spotify rotates it
    async refreshAccessToken(refreshToken: string): Promise<SpotifyTokenResponse> {
        return this.requestToken(
            new URLSearchParams({
                grant_type: 'refresh_token',
                refresh_token: refreshToken,
            })
        );
    }

    private async requestToken(params: URLSearchParams): Promise<SpotifyTokenResponse> {
        const { clientId, clientSecret } = this.config;

        const response = await this.fetchImpl(`${this.config.accountsUrl}/api/token`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded',
                Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`,
            },
            body: params.toString(),
            signal: AbortSignal.timeout(this.config.timeoutMs ?? 10_000),
        });

        if (!response.ok) {
            throw await parseTokenError(response);
        }

        const body = (await response.json()) as SpotifyTokenResponse;
        if (typeof body.access_token !== 'string' || typeof body.expires_in !== 'number') {
            throw new TokenRefreshError('Token response missing access_token or expires_in', false);
        }
        return body;
    }
}
