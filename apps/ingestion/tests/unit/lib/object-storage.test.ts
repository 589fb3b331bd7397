import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { FileSystemObjectStorage } from '../../../src/lib/object-storage';

describe('FileSystemObjectStorage', () => {
    let root: string;
    let storage: FileSystemObjectStorage;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'listening-ingest-'));
        storage = new FileSystemObjectStorage(root);
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    test('returns null for a missing object', async () => {
        await expect(storage.get('state/last_run_state.json')).resolves.toBeNull();
    });

    test('creates partition directories on put', async () => {
        await storage.put('raw/year=2025/month=12/day=25/batch.json', '{"ok":true}');

        await expect(storage.get('raw/year=2025/month=12/day=25/batch.json')).resolves.toBe('{"ok":true}');
    });

    test('replaces objects whole and leaves no temp files', async () => {
        await storage.put('state/last_run_state.json', 'first');
        await storage.put('state/last_run_state.json', 'second');

        await expect(storage.get('state/last_run_state.json')).resolves.toBe('second');
        await expect(readdir(join(root, 'state'))).resolves.toEqual(['last_run_state.json']);
    });

    test('locates objects under the root', () => {
        expect(storage.locate('raw/a.json')).toBe(join(root, 'raw', 'a.json'));
    });

    test('rejects keys that escape the root', async () => {
        await expect(storage.put('../outside.json', '{}')).rejects.toThrow('Object key escapes storage root');
    });

    test('rejects keys that land in a sibling directory sharing the root prefix', async () => {
        const sibling = `../${basename(root)}2/x.json`;

        await expect(storage.put(sibling, '{}')).rejects.toThrow(`Object key escapes storage root: ${sibling}`);
        await expect(storage.get(sibling)).rejects.toThrow('Object key escapes storage root');
    });
});
