/**
 * Radar Composite CDN — Output Storage
 *
 * The output directory is the only state shared between jobs and the static
 * file server. Every write goes to a staging file first and is renamed into
 * place, so readers see either the previous artifact or the new one.
 */

import { mkdir, readdir, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { FilesystemError, errorMessage } from './errors';

// =============================================================================
// Storage Interface
// =============================================================================

export interface OutputStore {
    /** Check if a published artifact exists */
    exists(key: string): Promise<boolean>;

    /**
     * Stage `data` and atomically publish it under `key`, replacing any
     * previous artifact. When `signal` is aborted before promotion the staged
     * file is discarded and nothing is published.
     */
    publish(key: string, data: Uint8Array, signal?: AbortSignal): Promise<void>;

    /** Keys of all published artifacts */
    list(): Promise<string[]>;

    /** Remove a published artifact (no-op if absent) */
    remove(key: string): Promise<void>;
}

export class PublishAbortedError extends Error {
    constructor(key: string) {
        super(`Publication of ${key} aborted`);
        this.name = 'PublishAbortedError';
    }
}

function isErrnoCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

// =============================================================================
// Local Directory
// =============================================================================

export const STAGING_DIR = '.staging';

/**
 * Output directory on the local filesystem. Staging lives inside the
 * directory so the final rename never crosses filesystems.
 */
export class LocalOutputStore implements OutputStore {
    private sequence = 0;

    constructor(readonly dir: string) { }

    private resolve(key: string): string {
        if (key !== path.basename(key) || key.startsWith('.')) {
            throw new FilesystemError(`Invalid artifact key: ${key}`, key);
        }
        return path.join(this.dir, key);
    }

    async exists(key: string): Promise<boolean> {
        return (await this.list()).includes(key);
    }

    async publish(key: string, data: Uint8Array, signal?: AbortSignal): Promise<void> {
        const target = this.resolve(key);
        const stagingDir = path.join(this.dir, STAGING_DIR);
        const staged = path.join(stagingDir, `${key}.${process.pid}.${++this.sequence}.tmp`);

        try {
            await mkdir(stagingDir, { recursive: true });
            await writeFile(staged, data);
        } catch (error) {
            await this.discard(staged);
            throw new FilesystemError(`Staging ${key} failed: ${errorMessage(error)}`, staged, { cause: error });
        }

        if (signal?.aborted) {
            await this.discard(staged);
            throw new PublishAbortedError(key);
        }

        try {
            await rename(staged, target);
        } catch (error) {
            await this.discard(staged);
            throw new FilesystemError(`Publishing ${key} failed: ${errorMessage(error)}`, target, { cause: error });
        }
    }

    async list(): Promise<string[]> {
        try {
            const entries = await readdir(this.dir, { withFileTypes: true });
            return entries
                .filter((e) => e.isFile() && !e.name.startsWith('.'))
                .map((e) => e.name)
                .sort();
        } catch (error) {
            if (isErrnoCode(error, 'ENOENT')) return [];
            throw new FilesystemError(`Listing ${this.dir} failed: ${errorMessage(error)}`, this.dir, { cause: error });
        }
    }

    async remove(key: string): Promise<void> {
        const target = this.resolve(key);
        try {
            await unlink(target);
        } catch (error) {
            if (isErrnoCode(error, 'ENOENT')) return;
            throw new FilesystemError(`Removing ${key} failed: ${errorMessage(error)}`, target, { cause: error });
        }
    }

    private async discard(staged: string): Promise<void> {
        try {
            await unlink(staged);
        } catch (error) {
            if (!isErrnoCode(error, 'ENOENT')) throw error;
        }
    }
}

// =============================================================================
// In-Memory Storage (for testing)
// =============================================================================

/**
 * In-memory output store. Records every publication in order so tests can
 * check how many times a key was written.
 */
export class MemoryOutputStore implements OutputStore {
    private store = new Map<string, Uint8Array>();

    /** Keys in publication order (repeats included) */
    readonly publications: string[] = [];

    /** Keys in removal order */
    readonly removals: string[] = [];

    async exists(key: string): Promise<boolean> {
        return this.store.has(key);
    }

    async publish(key: string, data: Uint8Array, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) throw new PublishAbortedError(key);
        this.store.set(key, data);
        this.publications.push(key);
    }

    async list(): Promise<string[]> {
        return Array.from(this.store.keys()).sort();
    }

    async remove(key: string): Promise<void> {
        if (this.store.delete(key)) this.removals.push(key);
    }

    get(key: string): Uint8Array | null {
        return this.store.get(key) ?? null;
    }

    /** Get all keys (for debugging) */
    keys(): string[] {
        return Array.from(this.store.keys()).sort();
    }
}
