import {
    IngestionOrchestrator,
    classifyFailure,
    dedupeEvents,
    sortByPlayedAt,
    type TokenProvider,
} from '../../../src/services/ingestion';
import type { FetchedPage } from '../../../src/services/event-fetcher';
import { ObjectCursorStore } from '../../../src/services/cursor-store';
import { ObjectWriter } from '../../../src/services/object-writer';
import { SpotifyApiError, SpotifyUnauthenticatedError } from '../../../src/lib/spotify-errors';
import {
    AuthBootstrapRequiredError,
    ConfigError,
    CredentialPersistError,
    ProviderRequestRejectedError,
    ProviderResponseInvalidError,
    RateLimitedError,
    TransientNetworkError,
    UnsupportedCursorError,
} from '../../../src/lib/ingestion-errors';
import { makeNoopLogger } from '../../../src/lib/logger';
import type { PlayEvent, Watermark } from '../../../src/types/ingestion';
import { InMemoryObjectStorage } from '../../mocks/object-storage.mock';
import { playEvent } from '../../mocks/events.mock';

const STATE_KEY = 'state/last_run_state.json';
const FIRST_RUN_AT = new Date('2025-12-25T08:00:00.000Z');
const FIRST_FILE = 'raw/year=2025/month=12/day=25/spotify_plays_20251225_080000_000.json';

// A page is either its valid events or a complete page
type FetchStep = Array<PlayEvent[] | FetchedPage> | Error;

function fetchedPage(pageNumber: number, events: PlayEvent[], overrides: Partial<FetchedPage> = {}): FetchedPage {
    const played = events.map((event) => event.played_at_timestamp);
    return {
        pageNumber,
        after: null,
        before: null,
        events,
        malformed: 0,
        rejected: [],
        cursorAfter: null,
        cursorBefore: null,
        newestSeenMs: played.length > 0 ? Math.max(...played) : null,
        oldestSeenMs: played.length > 0 ? Math.min(...played) : null,
        ...overrides,
    };
}

// Each fetch call plays the next step: pages to yield, or an error to throw
class ScriptedFetcher {
    readonly calls: Array<{ token: string; watermark: Watermark | null }> = [];
    readonly historyCalls: string[] = [];

    constructor(private readonly steps: FetchStep[]) {}

    async *fetchSince(accessToken: string, watermark: Watermark | null): AsyncGenerator<FetchedPage, void, undefined> {
        const step = this.nextStep();
        this.calls.push({ token: accessToken, watermark });
        yield* this.play(step);
    }

    async *fetchHistory(accessToken: string): AsyncGenerator<FetchedPage, void, undefined> {
        const step = this.nextStep();
        this.historyCalls.push(accessToken);
        yield* this.play(step);
    }

    private nextStep(): FetchStep {
        const taken = this.calls.length + this.historyCalls.length;
        return this.steps[Math.min(taken, this.steps.length - 1)];
    }

    private async *play(step: FetchStep): AsyncGenerator<FetchedPage, void, undefined> {
        if (step instanceof Error) {
            throw step;
        }
        let pageNumber = 0;
        for (const entry of step) {
            pageNumber++;
            yield Array.isArray(entry) ? fetchedPage(pageNumber, entry) : entry;
        }
    }
}

// Yields the first page, then fails mid-pagination
class FailingAfterFirstPage {
    async *fetchSince(): AsyncGenerator<FetchedPage, void, undefined> {
        yield fetchedPage(1, [playEvent('t1', '2025-12-25T07:00:00Z')]);
        throw new TransientNetworkError('connection reset');
    }

    async *fetchHistory(): AsyncGenerator<FetchedPage, void, undefined> {
        yield* this.fetchSince();
    }
}

function makeTokens(): TokenProvider & { ensureValidToken: jest.Mock; forceRefresh: jest.Mock } {
    return {
        ensureValidToken: jest.fn(async () => 'test-access'),
        forceRefresh: jest.fn(async () => 'refreshed-access'),
    };
}

function setup(
    steps: FetchStep[],
    options: { fetcher?: ScriptedFetcher | FailingAfterFirstPage; backfillOnFirstRun?: boolean } = {}
) {
    const storage = new InMemoryObjectStorage();
    const tokens = makeTokens();
    const fetcher = options.fetcher ?? new ScriptedFetcher(steps);
    let clock = FIRST_RUN_AT.getTime();
    const orchestrator = new IngestionOrchestrator({
        tokens,
        cursorStore: new ObjectCursorStore(storage, { key: STATE_KEY, retries: 0, logger: makeNoopLogger() }),
        fetcher,
        writer: new ObjectWriter(storage, { prefix: 'raw', retries: 0, logger: makeNoopLogger() }),
        backfillOnFirstRun: options.backfillOnFirstRun,
        now: () => new Date(clock),
        logger: makeNoopLogger(),
    });
    return {
        storage,
        tokens,
        fetcher,
        orchestrator,
        advanceClock: (ms: number) => {
            clock += ms;
        },
    };
}

function storedTracks(storage: InMemoryObjectStorage, key: string): unknown {
    const body = storage.readJson(key);
    return typeof body === 'object' && body !== null && 'tracks' in body ? body.tracks : undefined;
}

describe('dedupeEvents', () => {
    test('keeps the first occurrence in provider order', () => {
        const first = playEvent('t1', '2025-12-25T07:00:00Z');
        const second = { ...first, track_name: 'Second copy' };

        const result = dedupeEvents([first, playEvent('t2', '2025-12-25T07:00:00Z'), second]);

        expect(result.events.map((event) => event.track_name)).toEqual(['Track t1', 'Track t2']);
        expect(result.duplicates).toBe(1);
    });

    test('treats the same track at different times as distinct plays', () => {
        const result = dedupeEvents([playEvent('t1', '2025-12-25T07:00:00Z'), playEvent('t1', '2025-12-25T07:05:00Z')]);
        expect(result.duplicates).toBe(0);
    });
});

describe('sortByPlayedAt', () => {
    test('orders oldest first without mutating the input', () => {
        const input = [playEvent('b', '2025-12-25T07:30:00Z'), playEvent('a', '2025-12-25T07:00:00Z')];

        expect(sortByPlayedAt(input).map((event) => event.track_id)).toEqual(['a', 'b']);
        expect(input.map((event) => event.track_id)).toEqual(['b', 'a']);
    });
});

describe('classifyFailure', () => {
    test.each([
        [new AuthBootstrapRequiredError(), 'auth_failure', 'auth_bootstrap_required'],
        [new CredentialPersistError('lost'), 'transient_failure', 'credential_persist_failed'],
        [new RateLimitedError(30_000), 'transient_failure', 'rate_limited'],
        [new ConfigError(['PORT: bad']), 'permanent_failure', 'config_invalid'],
        [new ProviderRequestRejectedError(404, 'Not found'), 'permanent_failure', 'provider_request_rejected'],
        [new ProviderResponseInvalidError('bad envelope'), 'permanent_failure', 'provider_response_invalid'],
        [new UnsupportedCursorError('opaque'), 'permanent_failure', 'cursor_unsupported'],
        [new SpotifyApiError('bad request', 400, false), 'permanent_failure', 'spotify_client'],
        [new Error('boom'), 'transient_failure', 'unknown'],
    ])('%s', (error, status, kind) => {
        expect(classifyFailure(error)).toMatchObject({ status, kind });
    });
});

describe('IngestionOrchestrator', () => {
    test('writes new plays oldest first and advances the watermark', async () => {
        const newer = playEvent('t2', '2025-12-25T07:30:00Z');
        const older = playEvent('t1', '2025-12-25T07:00:00Z');
        const { storage, orchestrator } = setup([[[newer, older]]]);

        const outcome = await orchestrator.run();

        const watermark = { type: 'timestamp', playedAtMs: Date.parse('2025-12-25T07:30:00Z') };
        expect(outcome).toEqual({ status: 'success', ingested: 2, location: `memory://${FIRST_FILE}`, watermark });
        expect(storedTracks(storage, FIRST_FILE)).toEqual([older, newer]);
        expect(storage.readJson(STATE_KEY)).toMatchObject({ last_processed_timestamp: watermark.playedAtMs });
    });

    test('writes the batch before the watermark', async () => {
        const { storage, orchestrator } = setup([[[playEvent('t1', '2025-12-25T07:00:00Z')]]]);

        await orchestrator.run();

        expect(storage.puts).toEqual([FIRST_FILE, STATE_KEY]);
    });

    test('keeps the first copy of a duplicated play', async () => {
        const first = playEvent('t1', '2025-12-25T07:00:00Z');
        const second = { ...first, track_name: 'Second copy' };
        const { storage, orchestrator } = setup([[[first], [second]]]);

        await expect(orchestrator.run()).resolves.toMatchObject({ status: 'success', ingested: 1 });
        expect(storedTracks(storage, FIRST_FILE)).toEqual([first]);
    });

    test('drops plays at or before the watermark', async () => {
        const { storage, orchestrator } = setup([
            [[playEvent('t2', '2025-12-25T07:30:00Z'), playEvent('t1', '2025-12-25T07:00:00Z')]],
        ]);
        storage.objects.set(STATE_KEY, JSON.stringify({ last_processed_timestamp: Date.parse('2025-12-25T07:00:00Z') }));

        const outcome = await orchestrator.run();

        expect(outcome).toMatchObject({ status: 'success', ingested: 1 });
        expect(storedTracks(storage, FIRST_FILE)).toEqual([playEvent('t2', '2025-12-25T07:30:00Z')]);
    });

    test('is a noop when nothing is new', async () => {
        const { storage, orchestrator } = setup([[[]]]);

        await expect(orchestrator.run()).resolves.toEqual({ status: 'noop', ingested: 0, watermark: null });
        expect(storage.puts).toEqual([]);
    });

    test('is idempotent when re-run against the same data', async () => {
        const pages = [[playEvent('t2', '2025-12-25T07:30:00Z'), playEvent('t1', '2025-12-25T07:00:00Z')]];
        const { storage, orchestrator, advanceClock } = setup([pages]);

        await orchestrator.run();
        advanceClock(60_000);
        const second = await orchestrator.run();

        expect(second).toEqual({
            status: 'noop',
            ingested: 0,
            watermark: { type: 'timestamp', playedAtMs: Date.parse('2025-12-25T07:30:00Z') },
        });
        expect(storage.keysUnder('raw/')).toEqual([FIRST_FILE]);
    });

    test('re-ingests a written batch when the watermark write fails', async () => {
        const pages = [[playEvent('t1', '2025-12-25T07:00:00Z')]];
        const { storage, orchestrator, advanceClock } = setup([pages]);
        storage.failPuts('state/');

        const failed = await orchestrator.run();

        expect(failed).toMatchObject({ status: 'transient_failure', kind: 'storage_write_failed' });
        expect(storage.keysUnder('raw/')).toEqual([FIRST_FILE]);
        expect(storage.objects.has(STATE_KEY)).toBe(false);

        storage.clearFailures();
        advanceClock(60_000);
        const retried = await orchestrator.run();

        const secondFile = 'raw/year=2025/month=12/day=25/spotify_plays_20251225_080100_000.json';
        expect(retried).toMatchObject({ status: 'success', ingested: 1, location: `memory://${secondFile}` });
        expect(storage.keysUnder('raw/')).toEqual([FIRST_FILE, secondFile]);
    });

    test('does not advance the watermark when the batch write fails', async () => {
        const { storage, orchestrator } = setup([[[playEvent('t1', '2025-12-25T07:00:00Z')]]]);
        storage.failPuts('raw/');

        await expect(orchestrator.run()).resolves.toMatchObject({
            status: 'transient_failure',
            kind: 'storage_write_failed',
        });
        expect(storage.objects.has(STATE_KEY)).toBe(false);
    });

    test('persists nothing when pagination fails part way', async () => {
        const { storage, orchestrator } = setup([], { fetcher: new FailingAfterFirstPage() });

        await expect(orchestrator.run()).resolves.toMatchObject({
            status: 'transient_failure',
            kind: 'transient_network',
        });
        expect(storage.puts).toEqual([]);
    });

    test('refreshes once and restarts from the same watermark on 401', async () => {
        const fetcher = new ScriptedFetcher([
            new SpotifyUnauthenticatedError(),
            [[playEvent('t1', '2025-12-25T07:00:00Z')]],
        ]);
        const { orchestrator, tokens } = setup([], { fetcher });

        await expect(orchestrator.run()).resolves.toMatchObject({ status: 'success', ingested: 1 });

        expect(tokens.forceRefresh).toHaveBeenCalledTimes(1);
        expect(fetcher.calls).toEqual([
            { token: 'test-access', watermark: null },
            { token: 'refreshed-access', watermark: null },
        ]);
    });

    test('gives up when a refreshed token is also rejected', async () => {
        const fetcher = new ScriptedFetcher([new SpotifyUnauthenticatedError()]);
        const { storage, orchestrator, tokens } = setup([], { fetcher });

        await expect(orchestrator.run()).resolves.toMatchObject({
            status: 'auth_failure',
            kind: 'auth_expired_unrecoverable',
        });
        expect(tokens.forceRefresh).toHaveBeenCalledTimes(1);
        expect(fetcher.calls).toHaveLength(2);
        expect(storage.puts).toEqual([]);
    });

    test('reports missing credentials as an auth failure without fetching', async () => {
        const fetcher = new ScriptedFetcher([[[playEvent('t1', '2025-12-25T07:00:00Z')]]]);
        const { orchestrator, tokens } = setup([], { fetcher });
        tokens.ensureValidToken.mockRejectedValue(new AuthBootstrapRequiredError());

        await expect(orchestrator.run()).resolves.toEqual({
            status: 'auth_failure',
            kind: 'auth_bootstrap_required',
            message: 'No stored credentials; run the authorization flow',
        });
        expect(fetcher.calls).toEqual([]);
    });

    test('reports rate limiting as transient', async () => {
        const { orchestrator } = setup([new RateLimitedError(120_000)]);

        await expect(orchestrator.run()).resolves.toEqual({
            status: 'transient_failure',
            kind: 'rate_limited',
            message: 'Rate limited; try again in 120s',
        });
    });

    test('ingest() throws where run() reports', async () => {
        const { orchestrator } = setup([new TransientNetworkError('Spotify service unavailable')]);

        await expect(orchestrator.ingest()).rejects.toBeInstanceOf(TransientNetworkError);
    });

    test('quarantines a window of only malformed records and moves past it', async () => {
        const localFile = { played_at: '2025-12-25T07:10:00Z', track: { id: null, name: 'Voice memo' } };
        const pastLocalFile = Date.parse('2025-12-25T07:10:00Z');
        const { storage, orchestrator } = setup([
            [fetchedPage(1, [], { malformed: 1, rejected: [localFile], newestSeenMs: pastLocalFile })],
        ]);
        storage.objects.set(STATE_KEY, JSON.stringify({ last_processed_timestamp: Date.parse('2025-12-25T07:00:00Z') }));

        const outcome = await orchestrator.run();

        const quarantineFile = 'quarantine/year=2025/month=12/day=25/spotify_rejected_20251225_080000_000.json';
        expect(outcome).toEqual({
            status: 'skipped',
            ingested: 0,
            quarantined: 1,
            location: `memory://${quarantineFile}`,
            watermark: { type: 'timestamp', playedAtMs: pastLocalFile },
        });
        expect(storage.puts).toEqual([quarantineFile, STATE_KEY]);
        expect(storage.readJson(quarantineFile)).toMatchObject({ record_count: 1, records: [localFile] });
        expect(storage.keysUnder('raw/')).toEqual([]);
    });

    test('is a noop when malformed records do not reach past the watermark', async () => {
        const watermarkMs = Date.parse('2025-12-25T07:00:00Z');
        const { storage, orchestrator } = setup([
            [fetchedPage(1, [], { malformed: 1, rejected: [{ played_at: 'garbage' }], newestSeenMs: watermarkMs })],
        ]);
        storage.objects.set(STATE_KEY, JSON.stringify({ last_processed_timestamp: watermarkMs }));

        await expect(orchestrator.run()).resolves.toMatchObject({ status: 'noop' });
        expect(storage.puts).toEqual([]);
    });

    test('keeps valid plays in the normal batch when some records are malformed', async () => {
        const valid = playEvent('t1', '2025-12-25T07:00:00Z');
        const { storage, orchestrator } = setup([
            [fetchedPage(1, [valid], { malformed: 1, rejected: [{ played_at: '2025-12-25T07:05:00Z' }] })],
        ]);

        await expect(orchestrator.run()).resolves.toMatchObject({ status: 'success', ingested: 1 });
        expect(storage.puts).toEqual([FIRST_FILE, STATE_KEY]);
    });

    test('pages back through history on the first run when backfill is enabled', async () => {
        const fetcher = new ScriptedFetcher([
            [[playEvent('t3', '2025-12-25T07:30:00Z')], [playEvent('t2', '2025-12-25T07:00:00Z')]],
        ]);
        const { storage, orchestrator } = setup([], { fetcher, backfillOnFirstRun: true });

        const outcome = await orchestrator.run();

        expect(outcome).toMatchObject({
            status: 'success',
            ingested: 2,
            watermark: { type: 'timestamp', playedAtMs: Date.parse('2025-12-25T07:30:00Z') },
        });
        expect(fetcher.historyCalls).toEqual(['test-access']);
        expect(fetcher.calls).toEqual([]);
        expect(storage.keysUnder('raw/')).toEqual([FIRST_FILE]);
    });

    test('pages forward once a watermark exists even with backfill enabled', async () => {
        const fetcher = new ScriptedFetcher([[[playEvent('t3', '2025-12-25T07:30:00Z')]]]);
        const { storage, orchestrator } = setup([], { fetcher, backfillOnFirstRun: true });
        storage.objects.set(STATE_KEY, JSON.stringify({ last_processed_timestamp: Date.parse('2025-12-25T07:00:00Z') }));

        await orchestrator.run();

        expect(fetcher.historyCalls).toEqual([]);
        expect(fetcher.calls).toEqual([
            { token: 'test-access', watermark: { type: 'timestamp', playedAtMs: Date.parse('2025-12-25T07:00:00Z') } },
        ]);
    });

    test('filters plays against a seeded numeric token watermark', async () => {
        const { storage, orchestrator } = setup([
            [[playEvent('t2', '2025-12-25T07:30:00Z'), playEvent('t1', '2025-12-25T07:00:00Z')]],
        ]);
        storage.objects.set(STATE_KEY, JSON.stringify({ cursor_token: String(Date.parse('2025-12-25T07:00:00Z')) }));

        await expect(orchestrator.run()).resolves.toMatchObject({ status: 'success', ingested: 1 });
        expect(storedTracks(storage, FIRST_FILE)).toEqual([playEvent('t2', '2025-12-25T07:30:00Z')]);
    });

    test('reports an unusable stored cursor as a permanent failure', async () => {
        const { storage, orchestrator } = setup([[[playEvent('t1', '2025-12-25T07:00:00Z')]]]);
        storage.objects.set(STATE_KEY, JSON.stringify({ cursor_token: 'opaque' }));

        await expect(orchestrator.run()).resolves.toMatchObject({
            status: 'permanent_failure',
            kind: 'cursor_unsupported',
        });
        expect(storage.puts).toEqual([]);
    });
});
