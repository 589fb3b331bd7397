import {
    ObjectCredentialStore,
    deserializeCredentials,
    serializeCredentials,
} from '../../../src/services/credential-store';
import { isEncrypted } from '../../../src/lib/encryption';
import { makeNoopLogger } from '../../../src/lib/logger';
import { InMemoryObjectStorage } from '../../mocks/object-storage.mock';

const KEY = 'secrets/spotify_token.json';
const ENCRYPTION_KEY = '0123456789abcdef'.repeat(4);

const record = {
    accessToken: 'test-access',
    refreshToken: 'test-refresh',
    expiresAt: new Date('2025-06-01T01:00:00.000Z'),
    scope: 'user-read-recently-played',
    tokenType: 'Bearer',
};

describe('credential serialization', () => {
    test('writes snake_case fields', () => {
        expect(JSON.parse(serializeCredentials(record, new Date('2025-06-01T00:00:00.000Z')))).toEqual({
            access_token: 'test-access',
            refresh_token: 'test-refresh',
            expires_at: '2025-06-01T01:00:00.000Z',
            scope: 'user-read-recently-played',
            token_type: 'Bearer',
            updated_at: '2025-06-01T00:00:00.000Z',
        });
    });

    test('reads back what it writes', () => {
        expect(deserializeCredentials(serializeCredentials(record))).toEqual(record);
    });
});

describe('ObjectCredentialStore', () => {
    test('returns null when nothing is stored', async () => {
        const store = new ObjectCredentialStore(new InMemoryObjectStorage(), { key: KEY, logger: makeNoopLogger() });

        await expect(store.load()).resolves.toBeNull();
    });

    test('saves plain JSON without an encryption key', async () => {
        const storage = new InMemoryObjectStorage();
        const store = new ObjectCredentialStore(storage, { key: KEY, logger: makeNoopLogger() });

        await store.save(record);

        expect(storage.readJson(KEY)).toMatchObject({ refresh_token: 'test-refresh' });
        await expect(store.load()).resolves.toEqual(record);
    });

    test('encrypts at rest when a key is configured', async () => {
        const storage = new InMemoryObjectStorage();
        const store = new ObjectCredentialStore(storage, {
            key: KEY,
            encryptionKey: ENCRYPTION_KEY,
            logger: makeNoopLogger(),
        });

        await store.save(record);

        const blob = storage.objects.get(KEY) ?? '';
        expect(isEncrypted(blob)).toBe(true);
        expect(blob).not.toContain('test-refresh');
        await expect(store.load()).resolves.toEqual(record);
    });

    test('treats an unreadable blob as absent', async () => {
        const storage = new InMemoryObjectStorage();
        storage.objects.set(KEY, '{not json');
        const store = new ObjectCredentialStore(storage, { key: KEY, logger: makeNoopLogger() });

        await expect(store.load()).resolves.toBeNull();
    });

    test('treats an encrypted blob without a key as absent', async () => {
        const storage = new InMemoryObjectStorage();
        const writer = new ObjectCredentialStore(storage, {
            key: KEY,
            encryptionKey: ENCRYPTION_KEY,
            logger: makeNoopLogger(),
        });
        await writer.save(record);

        const reader = new ObjectCredentialStore(storage, { key: KEY, logger: makeNoopLogger() });
        await expect(reader.load()).resolves.toBeNull();
    });

    test('propagates write failures', async () => {
        const storage = new InMemoryObjectStorage();
        storage.failPuts('secrets/');
        const store = new ObjectCredentialStore(storage, { key: KEY, logger: makeNoopLogger() });

        await expect(store.save(record)).rejects.toThrow('simulated put failure for secrets/spotify_token.json');
    });
});
