import { describe, it, expect, afterEach } from 'vitest';
import { readdir } from 'fs/promises';
import path from 'path';
import { NotFoundError } from '../errors';
import { SourceManifest } from '../manifest';
import type { SourceFileId } from '../types';
import { makeTempDir, removeDir } from './helpers';

const id = (name: string, timestamp = '2025-09-13T16:25:00.000Z'): SourceFileId => ({ stream: 'current', name, timestamp });

describe('SourceManifest', () => {
    let dir = '';

    afterEach(async () => {
        if (dir) await removeDir(dir);
        dir = '';
    });

    it('settles processed and quarantined files', () => {
        const manifest = new SourceManifest();
        manifest.markProcessed(id('a.hdf'));
        manifest.quarantine(id('b.hdf'), new Error('bad shape'));
        manifest.recordFailure(id('c.hdf'), new Error('timeout'));

        expect(manifest.isSettled('a.hdf')).toBe(true);
        expect(manifest.isSettled('b.hdf')).toBe(true);
        expect(manifest.get('b.hdf')?.lastError).toBe('bad shape');
        expect(manifest.isSettled('c.hdf')).toBe(false);
        expect(manifest.isSettled('unknown.hdf')).toBe(false);
    });

    it('suppresses not-found files until the cool-down ends', () => {
        let now = 1_000;
        const manifest = new SourceManifest(() => now);
        manifest.recordCooldown(id('a.hdf'), new NotFoundError('gone'), 500);

        expect(manifest.get('a.hdf')?.cooldownUntil).toBe(1_500);
        expect(manifest.isSettled('a.hdf')).toBe(true);
        now = 1_501;
        expect(manifest.isSettled('a.hdf')).toBe(false);
    });

    it('keeps a fetched file fetched after a later failure', () => {
        const manifest = new SourceManifest();
        manifest.recordAttempt(id('a.hdf'));
        manifest.recordFetched(id('a.hdf'), 'abc123');
        manifest.recordFailure(id('a.hdf'), new Error('render failed'));

        const record = manifest.get('a.hdf');
        expect(record?.state).toBe('fetched');
        expect(record?.attempts).toBe(1);
        expect(record?.contentHash).toBe('abc123');
        expect(manifest.isFetched('a.hdf')).toBe(true);
    });

    it('drops records that are no longer kept', () => {
        const manifest = new SourceManifest();
        manifest.markProcessed(id('old.hdf', '2025-09-13T10:00:00.000Z'));
        manifest.markProcessed(id('new.hdf', '2025-09-13T16:25:00.000Z'));

        const dropped = manifest.retain((r) => r.id.timestamp >= '2025-09-13T12:00:00.000Z');
        expect(dropped.map((r) => r.id.name)).toEqual(['old.hdf']);
        expect(manifest.all().map((r) => r.id.name)).toEqual(['new.hdf']);
    });

    it('saves and loads its records', async () => {
        dir = await makeTempDir();
        const file = path.join(dir, 'manifest.json');
        const manifest = new SourceManifest(() => 42);
        manifest.quarantine(id('a.hdf'), new Error('corrupt'));
        await manifest.save(file);

        const loaded = await SourceManifest.load(file);
        expect(loaded.get('a.hdf')).toEqual({
            id: id('a.hdf'),
            state: 'quarantined',
            attempts: 0,
            lastError: 'corrupt',
            updatedAt: 42
        });
    });

    it('survives overlapping saves to the same file', async () => {
        dir = await makeTempDir();
        const file = path.join(dir, 'manifest.json');
        const manifest = new SourceManifest();
        manifest.markProcessed(id('a.hdf'));

        await Promise.all([manifest.save(file), manifest.save(file), manifest.save(file)]);

        expect(await readdir(dir)).toEqual(['manifest.json']);
        expect((await SourceManifest.load(file)).get('a.hdf')?.state).toBe('processed');
    });

    it('starts empty when no file exists', async () => {
        dir = await makeTempDir();
        const loaded = await SourceManifest.load(path.join(dir, 'missing.json'));
        expect(loaded.all()).toEqual([]);
    });

    it('rejects unknown formats', () => {
        expect(() => SourceManifest.fromJSON({ version: 99, records: [] })).toThrow('Invalid manifest');
    });
});
