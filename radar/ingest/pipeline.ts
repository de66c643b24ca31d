/**
 * Radar Composite CDN — Ingest Pipeline
 *
 * Current-stream orchestration: diff the listing, fan new composites out to
 * the job pool, fold the outcomes into the manifest and prune old artifacts.
 */

import { mkdir } from 'fs/promises';
import path from 'path';
import type { RadarConfig } from '../config';
import { NotFoundError, isQuarantineError } from '../errors';
import { createLogger, type Logger } from '../log';
import type { SourceManifest } from '../manifest';
import { parseArtifactKey, renderKey } from '../naming';
import type { OutputStore } from '../storage';
import {
    COLORMAP_VARIANTS,
    emptyStreamReport,
    type JobFailure,
    type RenderedArtifact,
    type SourceFileId,
    type StreamCycleReport,
    type StreamId
} from '../types';
import type { Downloader } from './fetcher';
import type { InFlightRegistry } from './locks';
import type { JobHandler, JobOutcome, WorkerPool } from './pool';
import { JobError, artifactSetKeys, type RenderJob, type RenderJobResult } from './render-job';

// =============================================================================
// Shared Helpers
// =============================================================================

export interface StreamContext {
    config: RadarConfig;
    downloader: Downloader;
    manifest: SourceManifest;
    /** Where the manifest is saved after each cycle; unset keeps it in memory */
    manifestPath?: string;
    store: OutputStore;
    pool: WorkerPool;
    registry: InFlightRegistry;
    handler: JobHandler<RenderJob, RenderJobResult>;
    logger?: Logger;
}

/**
 * Published artifacts of a stream, newest first.
 */
export async function listArtifacts(store: OutputStore, stream: StreamId): Promise<RenderedArtifact[]> {
    const artifacts: RenderedArtifact[] = [];
    for (const key of await store.list()) {
        const artifact = parseArtifactKey(stream, key);
        if (artifact) artifacts.push(artifact);
    }
    return artifacts.sort(compareArtifacts);
}

function compareArtifacts(a: RenderedArtifact, b: RenderedArtifact): number {
    if (a.timestamp !== b.timestamp) return b.timestamp.localeCompare(a.timestamp);
    const leadA = a.leadMinutes ?? 0;
    const leadB = b.leadMinutes ?? 0;
    if (leadA !== leadB) return leadA - leadB;
    if (a.variant !== b.variant) return a.variant.localeCompare(b.variant);
    return a.scale - b.scale;
}

/**
 * Fold one job outcome into the manifest and the stream report.
 * Returns true when the source published its full artifact set.
 */
export function settleOutcome(
    ctx: Pick<StreamContext, 'config' | 'manifest'>,
    id: SourceFileId,
    outcome: JobOutcome<RenderJobResult>,
    report: StreamCycleReport,
    log: Logger
): boolean {
    if (outcome.status === 'abandoned') {
        report.abandoned++;
        return false;
    }

    if (outcome.status === 'fulfilled') {
        const { published, failed } = outcome.value;
        report.artifacts.push(...published);
        if (failed.length === 0) {
            return true;
        }
        for (const failure of failed) {
            report.failures.push({ id, stage: 'publish', error: failure.error });
        }
        ctx.manifest.recordFailure(id, failed[0].error);
        return false;
    }

    const failure: JobFailure = outcome.error instanceof JobError
        ? { id, stage: outcome.error.stage, error: outcome.error.error }
        : { id, stage: 'render', error: outcome.error };
    report.failures.push(failure);

    const cause = failure.error;
    if (isQuarantineError(cause)) {
        log.warn(`Quarantining ${id.name}: ${cause.message}`);
        ctx.manifest.quarantine(id, cause);
    } else if (cause instanceof NotFoundError) {
        log.warn(`${id.name} not available (${cause.status}), cooling down`);
        ctx.manifest.recordCooldown(id, cause, ctx.config.notFoundCooldownMs);
    } else {
        log.warn(`${id.name} failed at ${failure.stage}: ${cause.message}`);
        ctx.manifest.recordFailure(id, cause);
    }
    return false;
}

/**
 * True when every artifact the job would publish already exists.
 */
export async function hasFullArtifactSet(
    store: OutputStore,
    config: RadarConfig,
    timestamp: string,
    leadMinutes?: number
): Promise<boolean> {
    const existing = new Set(await store.list());
    return artifactSetKeys(timestamp, leadMinutes, config.scales, COLORMAP_VARIANTS).every((k) => existing.has(k));
}

// =============================================================================
// Current Stream
// =============================================================================

export class PipelineOrchestrator {
    readonly stream: StreamId = 'current';
    private readonly log: Logger;

    constructor(private readonly ctx: StreamContext) {
        this.log = ctx.logger ?? createLogger('ingest');
    }

    /**
     * Process a set of new source files. Render keys already in flight are
     * skipped and counted; every other id runs as an independent pooled job.
     */
    async processDelta(ids: readonly SourceFileId[], signal?: AbortSignal): Promise<StreamCycleReport> {
        const report = emptyStreamReport(this.stream);
        const tasks: Promise<void>[] = [];

        for (const id of ids) {
            const key = renderKey(id);
            if (!this.ctx.registry.tryAcquire(key)) {
                report.skippedInFlight++;
                this.log.info(`Skipping ${id.name}: ${key} already in flight`);
                continue;
            }
            tasks.push(this.processOne(id, key, report, signal).finally(() => this.ctx.registry.release(key)));
        }

        await Promise.all(tasks);
        return report;
    }

    /**
     * One full cycle: discover, process, prune, persist the manifest.
     */
    async runCycle(signal?: AbortSignal): Promise<StreamCycleReport> {
        const listed = await this.ctx.downloader.listRemote(signal);
        const fresh = listed.filter((id) => !this.ctx.manifest.isSettled(id.name));
        this.log.info(`Listing: ${listed.length} tracked, ${fresh.length} new`);

        const report = await this.processDelta(fresh, signal);
        report.discovered = fresh.length;
        report.pruned = await this.prune(new Set(listed.map((id) => id.name)));
        await this.persist();

        this.log.info(
            `Cycle done: ${report.processed} processed, ${report.failures.length} failures, ` +
            `${report.skippedInFlight} in flight, ${report.pruned.length} pruned`
        );
        return report;
    }

    /**
     * Artifacts of the newest published timestamp.
     */
    async latestArtifacts(): Promise<RenderedArtifact[]> {
        const artifacts = await listArtifacts(this.ctx.store, this.stream);
        if (artifacts.length === 0) return [];
        const newest = artifacts[0].timestamp;
        return artifacts.filter((a) => a.timestamp === newest);
    }

    /**
     * Keep the newest `maxPublished` timestamps; drop older artifacts, their
     * source files and manifest records no longer in the listing.
     */
    async prune(listedNames: ReadonlySet<string> = new Set()): Promise<string[]> {
        const limit = this.ctx.config.streams.current.maxPublished;
        if (limit <= 0) return [];

        const artifacts = await listArtifacts(this.ctx.store, this.stream);
        const timestamps = Array.from(new Set(artifacts.map((a) => a.timestamp)));
        if (timestamps.length <= limit) return [];

        const cutoff = timestamps[limit - 1];
        const removed: string[] = [];
        for (const artifact of artifacts) {
            if (artifact.timestamp < cutoff) {
                await this.ctx.store.remove(artifact.key);
                removed.push(artifact.key);
            }
        }

        const dropped = this.ctx.manifest.retain((r) => listedNames.has(r.id.name) || r.id.timestamp >= cutoff);
        for (const record of dropped) {
            await this.ctx.downloader.removeLocal(record.id.name);
        }

        if (removed.length > 0) {
            this.log.info(`Pruned ${removed.length} artifacts older than ${cutoff}`);
        }
        return removed;
    }

    private async processOne(
        id: SourceFileId,
        key: string,
        report: StreamCycleReport,
        signal?: AbortSignal
    ): Promise<void> {
        if (await hasFullArtifactSet(this.ctx.store, this.ctx.config, id.timestamp)) {
            this.log.info(`${id.name}: artifacts already published, marking processed`);
            this.ctx.manifest.markProcessed(id);
            report.processed++;
            return;
        }
        if (signal?.aborted) {
            report.abandoned++;
            return;
        }

        const outcome = await this.ctx.pool.run<RenderJob, RenderJobResult>({ id, renderKey: key }, this.ctx.handler);
        if (settleOutcome(this.ctx, id, outcome, report, this.log)) {
            this.ctx.manifest.markProcessed(id);
            report.processed++;
            this.log.info(`Radar ${id.name} processed into ${outcome.status === 'fulfilled' ? outcome.value.published.length : 0} files`);
        }
    }

    private async persist(): Promise<void> {
        if (this.ctx.manifestPath) {
            await mkdir(path.dirname(this.ctx.manifestPath), { recursive: true });
            await this.ctx.manifest.save(this.ctx.manifestPath);
        }
    }
}
