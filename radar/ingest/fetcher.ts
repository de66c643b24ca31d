/**
 * Radar Composite CDN — Ingest Fetcher
 *
 * Lists a remote directory, diffs it against the local manifest and
 * downloads new files into the stream's data directory. Bodies land in
 * `<name>.part` first and are renamed once complete.
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import type { RetryConfig, StreamConfig } from '../config';
import {
    NetworkError,
    NotFoundError,
    PartialWriteError,
    RadarError,
    errorMessage,
    toRadarError
} from '../errors';
import { hashHex } from '../hash';
import { createLogger, type Logger } from '../log';
import type { SourceManifest } from '../manifest';
import { SOURCE_SUFFIX, parseSourceName } from '../naming';
import type { FetchedSource, SourceFileId, StreamId } from '../types';

// =============================================================================
// Types
// =============================================================================

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface DownloaderOptions {
    stream: StreamId;
    config: StreamConfig;
    retry: RetryConfig;
    requestTimeoutMs: number;
    manifest: SourceManifest;
    /** Defaults to the global fetch */
    fetchImpl?: FetchImpl;
    sleep?: Sleep;
    logger?: Logger;
}

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

/**
 * Delay before retry number `attempt` (1-based):
 * min(maxDelayMs, baseDelayMs * 2^(attempt - 1)).
 */
export function backoffDelay(attempt: number, retry: RetryConfig): number {
    return Math.min(retry.maxDelayMs, retry.baseDelayMs * 2 ** (attempt - 1));
}

const HREF = /href\s*=\s*["']([^"']+)["']/gi;

/**
 * File names linked from an HTML directory listing, in document order,
 * without duplicates.
 */
export function parseListing(html: string): string[] {
    const names = new Set<string>();
    for (const match of html.matchAll(HREF)) {
        const target = match[1].split(/[?#]/)[0];
        const last = target.split('/').filter(Boolean).pop();
        if (!last) continue;
        try {
            names.add(decodeURIComponent(last));
        } catch {
            names.add(last);
        }
    }
    return Array.from(names);
}

function classifyStatus(url: string, response: Response): RadarError | null {
    if (response.ok) return null;
    const status = response.status;
    if (status >= 400 && status < 500) {
        return new NotFoundError(`GET ${url} → ${status} ${response.statusText}`.trim(), status);
    }
    return new NetworkError(`GET ${url} → ${status} ${response.statusText}`.trim(), status);
}

// =============================================================================
// Downloader
// =============================================================================

export class Downloader {
    readonly stream: StreamId;
    private readonly config: StreamConfig;
    private readonly retry: RetryConfig;
    private readonly requestTimeoutMs: number;
    private readonly manifest: SourceManifest;
    private readonly fetchImpl: FetchImpl;
    private readonly sleep: Sleep;
    private readonly log: Logger;

    constructor(options: DownloaderOptions) {
        this.stream = options.stream;
        this.config = options.config;
        this.retry = options.retry;
        this.requestTimeoutMs = options.requestTimeoutMs;
        this.manifest = options.manifest;
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
        this.sleep = options.sleep ?? defaultSleep;
        this.log = options.logger ?? createLogger(`fetch:${options.stream}`);
    }

    get dataDir(): string {
        return this.config.dataDir;
    }

    localPath(name: string): string {
        return path.join(this.config.dataDir, name);
    }

    /**
     * Newest `trackLimit` source files in the remote listing, newest first.
     */
    async listRemote(signal?: AbortSignal): Promise<SourceFileId[]> {
        const url = this.config.listingUrl;
        const html = await this.withRetry(`listing ${url}`, signal, async (attemptSignal) => {
            const response = await this.request(url, attemptSignal);
            try {
                return await response.text();
            } catch (error) {
                throw new NetworkError(`Reading listing ${url} failed: ${errorMessage(error)}`, undefined, { cause: error });
            }
        });

        const ids: SourceFileId[] = [];
        for (const name of parseListing(html)) {
            const id = parseSourceName(this.stream, name);
            if (id) {
                ids.push(id);
            } else if (name.toLowerCase().endsWith(SOURCE_SUFFIX[this.stream])) {
                this.log.debug(`Skipping unparseable name ${name}`);
            }
        }

        ids.sort((a, b) => (a.timestamp === b.timestamp ? b.name.localeCompare(a.name) : b.timestamp.localeCompare(a.timestamp)));
        return ids.slice(0, this.config.trackLimit);
    }

    /**
     * Listing entries that are neither processed, quarantined nor cooling down.
     */
    async discover(signal?: AbortSignal): Promise<SourceFileId[]> {
        const listed = await this.listRemote(signal);
        const fresh = listed.filter((id) => !this.manifest.isSettled(id.name));
        this.log.debug(`Listing has ${listed.length} tracked files, ${fresh.length} pending`);
        return fresh;
    }

    /**
     * Download one source file. A file already recorded as fetched is reused
     * without a request while its bytes still hash to the recorded value.
     */
    async fetch(id: SourceFileId, signal?: AbortSignal): Promise<FetchedSource> {
        const target = this.localPath(id.name);
        const record = this.manifest.get(id.name);

        if (record?.state === 'fetched' && record.contentHash) {
            const local = await readFile(target).catch(() => null);
            if (local && hashHex(local) === record.contentHash) {
                return { id, path: target, sizeBytes: local.length, contentHash: record.contentHash };
            }
            if (local) {
                this.log.warn(`${id.name} differs from the fetched copy, downloading again`);
            }
        }

        this.manifest.recordAttempt(id);
        const url = new URL(encodeURIComponent(id.name), this.config.listingUrl).toString();
        const bytes = await this.withRetry(id.name, signal, (attemptSignal) => this.download(url, target, attemptSignal));

        const contentHash = hashHex(bytes);
        this.manifest.recordFetched(id, contentHash);
        this.log.info(`Fetched ${id.name} (${bytes.length} bytes)`);
        return { id, path: target, sizeBytes: bytes.length, contentHash };
    }

    /**
     * Delete a downloaded file (no-op if absent).
     */
    async removeLocal(name: string): Promise<void> {
        try {
            await unlink(this.localPath(name));
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
            throw error;
        }
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private async download(url: string, target: string, signal: AbortSignal): Promise<Uint8Array> {
        const response = await this.request(url, signal);
        const header = response.headers.get('content-length');
        const expected = header !== null && /^\d+$/.test(header.trim()) ? Number(header) : null;

        let bytes: Uint8Array;
        try {
            bytes = new Uint8Array(await response.arrayBuffer());
        } catch (error) {
            if (signal.aborted) {
                throw new NetworkError(`Download of ${url} timed out or was aborted`, undefined, { cause: error });
            }
            throw new PartialWriteError(`Body of ${url} truncated: ${errorMessage(error)}`, expected, 0);
        }
        if (expected !== null && bytes.length !== expected) {
            throw new PartialWriteError(
                `Body of ${url} has ${bytes.length} bytes, expected ${expected}`,
                expected,
                bytes.length
            );
        }

        const partial = `${target}.part`;
        try {
            await mkdir(path.dirname(target), { recursive: true });
            await writeFile(partial, bytes);
            await rename(partial, target);
        } catch (error) {
            await unlink(partial).catch(() => undefined);
            throw new PartialWriteError(`Writing ${target} failed: ${errorMessage(error)}`, expected, bytes.length);
        }
        return bytes;
    }

    /**
     * One GET with a per-request timeout, linked to the caller's signal.
     */
    private async request(url: string, signal: AbortSignal): Promise<Response> {
        let response: Response;
        try {
            response = await this.fetchImpl(url, { signal });
        } catch (error) {
            throw new NetworkError(`GET ${url} failed: ${errorMessage(error)}`, undefined, { cause: error });
        }
        const failure = classifyStatus(url, response);
        if (failure) throw failure;
        return response;
    }

    private async withRetry<T>(
        label: string,
        signal: AbortSignal | undefined,
        operation: (attemptSignal: AbortSignal) => Promise<T>
    ): Promise<T> {
        const { attempts } = this.retry;
        for (let attempt = 1; ; attempt++) {
            if (signal?.aborted) {
                throw new NetworkError(`Fetching ${label} aborted`);
            }

            const controller = new AbortController();
            const onAbort = () => controller.abort();
            signal?.addEventListener('abort', onAbort, { once: true });
            const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs);

            try {
                return await operation(controller.signal);
            } catch (caught) {
                const error = toRadarError(caught, (message, cause) => new NetworkError(message, undefined, { cause }));
                if (error.permanent || attempt >= attempts || signal?.aborted) {
                    throw error;
                }
                const wait = backoffDelay(attempt, this.retry);
                this.log.warn(`${label}: attempt ${attempt}/${attempts} failed (${error.message}), retrying in ${wait}ms`);
                try {
                    await this.sleep(wait, signal);
                } catch (sleepError) {
                    throw new NetworkError(`Fetching ${label} aborted`, undefined, { cause: sleepError });
                }
            } finally {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
            }
        }
    }
}
