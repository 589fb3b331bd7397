import { z } from 'zod';
import type { SpotifyRecentlyPlayedResponse } from '../types/spotify';
import type { ParsedPage, PlayEvent } from '../types/ingestion';
import { SpotifyApiError } from './spotify-errors';

const idSchema = z.string().min(1);

const playHistoryItemSchema = z.object({
    played_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'invalid timestamp'),
    track: z.object({
        id: idSchema,
        name: z.string(),
        duration_ms: z.number().int().nonnegative(),
        popularity: z.number().int().min(0).max(100),
        album: z.object({
            id: idSchema,
            name: z.string(),
            release_date: z.string().nullish(),
        }),
        artists: z.array(z.object({ id: idSchema, name: z.string() })).min(1),
    }),
});

const envelopeSchema = z.object({
    items: z.array(z.unknown()),
    next: z.string().nullish(),
    limit: z.number().optional(),
    cursors: z
        .object({
            after: z.union([z.string(), z.number()]).nullish(),
            before: z.union([z.string(), z.number()]).nullish(),
        })
        .nullish(),
});

export function parseRecentlyPlayedEnvelope(payload: unknown): SpotifyRecentlyPlayedResponse {
    const parsed = envelopeSchema.safeParse(payload);
    if (!parsed.success) {
        throw new SpotifyApiError(
            `Malformed recently-played response: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
            200,
            false,
            'malformed_response'
        );
    }

    const { items, next, limit, cursors } = parsed.data;
    return {
        items,
        next: next ?? null,
        limit,
        cursors: cursors
            ? {
                after: cursors.after === null || cursors.after === undefined ? null : String(cursors.after),
                before: cursors.before === null || cursors.before === undefined ? null : String(cursors.before),
            }
            : null,
    };
}

// Normalizes one play; null when the record does not describe a playable track
export function parsePlayHistoryItem(item: unknown): PlayEvent | null {
    const parsed = playHistoryItemSchema.safeParse(item);
    if (!parsed.success) {
        return null;
    }

    const { played_at, track } = parsed.data;
    const playedAtMs = Date.parse(played_at);
    const primaryArtist = track.artists[0];

    return Object.freeze({
        played_at: new Date(playedAtMs).toISOString(),
        played_at_timestamp: playedAtMs,
        track_id: track.id,
        track_name: track.name,
        artist_id: primaryArtist.id,
        artist_name: primaryArtist.name,
        album_id: track.album.id,
        album_name: track.album.name,
        release_date: track.album.release_date ?? null,
        duration_ms: track.duration_ms,
        popularity: track.popularity,
    });
}

const playedAtOnlySchema = z.object({ played_at: z.string() });

// played_at of any item, valid track or not; null when unreadable
export function rawPlayedAtMs(item: unknown): number | null {
    const parsed = playedAtOnlySchema.safeParse(item);
    if (!parsed.success) {
        return null;
    }
    const ms = Date.parse(parsed.data.played_at);
    return Number.isNaN(ms) ? null : ms;
}

export function parseRecentlyPlayed(items: unknown[]): ParsedPage {
    const events: PlayEvent[] = [];
    const rejected: unknown[] = [];

    for (const item of items) {
        const event = parsePlayHistoryItem(item);
        if (event) {
            events.push(event);
        } else {
            rejected.push(item);
        }
    }

    return { events, malformed: rejected.length, rejected };
}
