import type { CredentialRecord } from '../types/ingestion';
import type { CredentialStore } from '../services/credential-store';
import type { SpotifyOAuthClient } from './spotify';

export interface AuthorizationCallback {
    redirectedUrl: string;
    expectedState: string;
    codeVerifier: string;
    now?: () => number;
}

// Full authorization-code exchange (NoCredentials -> Valid). The new pair is
// persisted before it is returned.
export async function completeAuthorization(
    oauth: Pick<SpotifyOAuthClient, 'exchangeCodeForTokens'>,
    store: CredentialStore,
    callback: AuthorizationCallback
): Promise<CredentialRecord> {
    const url = new URL(callback.redirectedUrl.trim());
    const error = url.searchParams.get('error');
    if (error) {
        throw new Error(`Authorization denied: ${error}`);
    }
    if (url.searchParams.get('state') !== callback.expectedState) {
        throw new Error('State mismatch in authorization callback');
    }
    const code = url.searchParams.get('code');
    if (!code) {
        throw new Error('Authorization callback has no code');
    }

    const issuedAt = (callback.now ?? Date.now)();
    const tokens = await oauth.exchangeCodeForTokens(code, callback.codeVerifier);
    if (!tokens.refresh_token) {
        throw new Error('Token exchange returned no refresh token');
    }

    const record: CredentialRecord = {
        accessToken: tokens.access_token,
        refreshToken: tokens.refresh_token,
        expiresAt: new Date(issuedAt + tokens.expires_in * 1000),
        scope: tokens.scope,
        tokenType: tokens.token_type,
    };
    await store.save(record);
    return record;
}
