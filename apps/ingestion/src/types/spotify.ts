// Raw payloads returned by the Spotify Web API and accounts service.
// Play items stay `unknown` until spotify-parser validates them.

export interface SpotifyTokenResponse {
    access_token: string;
    token_type: string;
    scope?: string;
    expires_in: number;
    refresh_token?: string;
}

export interface SpotifyTokenErrorResponse {
    error?: string;
    error_description?: string;
}

export interface SpotifyRecentlyPlayedResponse {
    items: unknown[];
    next: string | null;
    limit?: number;
    cursors: { after?: string | null; before?: string | null } | null;
    href?: string;
}
