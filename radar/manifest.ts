/**
 * Radar Composite CDN — Source Manifest
 *
 * Per-stream record of every remote file the downloader has touched:
 * fetched, processed, quarantined (permanent decode failure) or failed.
 * Persisted as JSON beside the downloaded files so a restart does not
 * reprocess quarantined inputs.
 */

import { readFile, rename, writeFile } from 'fs/promises';
import { errorMessage } from './errors';
import type { SourceFileId, SourceRecord, SourceState } from './types';

export const MANIFEST_FILE = 'manifest.json';
const MANIFEST_VERSION = 1;

interface SerializedManifest {
    version: number;
    records: SourceRecord[];
}

function isSerializedManifest(value: unknown): value is SerializedManifest {
    if (typeof value !== 'object' || value === null) return false;
    const candidate: { version?: unknown; records?: unknown } = value;
    return candidate.version === MANIFEST_VERSION && Array.isArray(candidate.records);
}

export class SourceManifest {
    private records = new Map<string, SourceRecord>();
    private saveSequence = 0;
    private pendingSave: Promise<void> = Promise.resolve();

    constructor(private readonly now: () => number = Date.now) { }

    get(name: string): SourceRecord | undefined {
        return this.records.get(name);
    }

    all(): SourceRecord[] {
        return Array.from(this.records.values());
    }

    /**
     * True when the file must not be fetched again right now: already
     * processed, quarantined, or inside a not-found cool-down.
     */
    isSettled(name: string): boolean {
        const record = this.records.get(name);
        if (!record) return false;
        if (record.state === 'processed' || record.state === 'quarantined') return true;
        return record.cooldownUntil !== undefined && record.cooldownUntil > this.now();
    }

    isFetched(name: string): boolean {
        return this.records.get(name)?.state === 'fetched';
    }

    recordAttempt(id: SourceFileId): void {
        const record = this.upsert(id, this.records.get(id.name)?.state ?? 'failed');
        record.attempts += 1;
    }

    recordFetched(id: SourceFileId, contentHash: string): void {
        const record = this.upsert(id, 'fetched');
        record.contentHash = contentHash;
        delete record.lastError;
        delete record.cooldownUntil;
    }

    markProcessed(id: SourceFileId): void {
        const record = this.upsert(id, 'processed');
        delete record.lastError;
    }

    quarantine(id: SourceFileId, error: unknown): void {
        this.upsert(id, 'quarantined').lastError = errorMessage(error);
    }

    /** Transient failure: the file stays eligible for the next cycle */
    recordFailure(id: SourceFileId, error: unknown): void {
        const current = this.records.get(id.name)?.state;
        this.upsert(id, current === 'fetched' ? 'fetched' : 'failed').lastError = errorMessage(error);
    }

    recordCooldown(id: SourceFileId, error: unknown, cooldownMs: number): void {
        const record = this.upsert(id, 'failed');
        record.lastError = errorMessage(error);
        record.cooldownUntil = this.now() + cooldownMs;
    }

    /**
     * Forget records whose names are no longer worth tracking.
     */
    retain(keep: (record: SourceRecord) => boolean): SourceRecord[] {
        const dropped: SourceRecord[] = [];
        for (const [name, record] of this.records) {
            if (!keep(record)) {
                this.records.delete(name);
                dropped.push(record);
            }
        }
        return dropped;
    }

    private upsert(id: SourceFileId, state: SourceState): SourceRecord {
        const existing = this.records.get(id.name);
        if (existing) {
            existing.state = state;
            existing.updatedAt = this.now();
            return existing;
        }
        const record: SourceRecord = { id: { ...id }, state, attempts: 0, updatedAt: this.now() };
        this.records.set(id.name, record);
        return record;
    }

    // =========================================================================
    // Persistence
    // =========================================================================

    toJSON(): SerializedManifest {
        return { version: MANIFEST_VERSION, records: this.all() };
    }

    static fromJSON(value: unknown, now: () => number = Date.now): SourceManifest {
        const manifest = new SourceManifest(now);
        if (!isSerializedManifest(value)) {
            throw new Error('Invalid manifest: unsupported version or shape');
        }
        for (const record of value.records) {
            manifest.records.set(record.id.name, record);
        }
        return manifest;
    }

    /**
     * Saves run one at a time in call order, each through its own temp file,
     * and serialize the records as they are when the save starts writing.
     */
    save(file: string): Promise<void> {
        const run = this.pendingSave.then(() => this.writeTo(file));
        // The caller gets the rejection; later saves still run
        this.pendingSave = run.catch(() => undefined);
        return run;
    }

    private async writeTo(file: string): Promise<void> {
        const tmp = `${file}.${process.pid}.${++this.saveSequence}.tmp`;
        await writeFile(tmp, JSON.stringify(this.toJSON(), null, 2));
        await rename(tmp, file);
    }

    /**
     * Load a saved manifest; a missing file yields an empty one.
     */
    static async load(file: string, now: () => number = Date.now): Promise<SourceManifest> {
        let text: string;
        try {
            text = await readFile(file, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return new SourceManifest(now);
            }
            throw error;
        }
        return SourceManifest.fromJSON(JSON.parse(text), now);
    }
}
