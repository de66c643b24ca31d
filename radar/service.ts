/**
 * Radar Composite CDN — Service
 *
 * Wires config, downloaders, manifests, output stores, the shared job pool
 * and the scheduler into the four operations the entry point needs:
 * runCycle, latestArtifacts, start and shutdown.
 */

import path from 'path';
import type { RadarConfig } from './config';
import { errorMessage } from './errors';
import { Downloader, type FetchImpl, type Sleep } from './ingest/fetcher';
import { ForecastProcessor, type BundleExtractor } from './ingest/forecast';
import { InFlightRegistry } from './ingest/locks';
import { PipelineOrchestrator, type StreamContext } from './ingest/pipeline';
import { WorkerPool } from './ingest/pool';
import { createRenderHandler, type RenderJobDeps } from './ingest/render-job';
import { Scheduler } from './ingest/scheduler';
import { createLogger, type Logger } from './log';
import { MANIFEST_FILE, SourceManifest } from './manifest';
import { MAX_Z_CONTRACT } from './odim';
import { COLOR_TABLES } from './palette';
import { LocalOutputStore, type OutputStore } from './storage';
import {
    COLORMAP_VARIANTS,
    STREAM_IDS,
    emptyStreamReport,
    type CycleReport,
    type ProductContract,
    type RenderedArtifact,
    type StreamCycleReport,
    type StreamId
} from './types';

export interface RadarServiceOptions {
    config: RadarConfig;
    fetchImpl?: FetchImpl;
    sleep?: Sleep;
    /** Output stores per stream; defaults to the configured directories */
    stores?: Partial<Record<StreamId, OutputStore>>;
    extractor?: BundleExtractor;
    decode?: RenderJobDeps['decode'];
    contract?: ProductContract;
    /** Save manifests to the data directories (default true) */
    persistManifests?: boolean;
    now?: () => number;
    createLog?: (tag: string) => Logger;
}

export interface ServiceShutdownResult {
    completed: boolean;
    abandonedJobs: number;
}

interface StreamProcessor {
    runCycle(signal?: AbortSignal): Promise<StreamCycleReport>;
    latestArtifacts(): Promise<RenderedArtifact[]>;
}

export class RadarService {
    readonly scheduler: Scheduler;
    readonly pool: WorkerPool;
    readonly registry = new InFlightRegistry();
    private readonly processors = new Map<StreamId, StreamProcessor>();
    private readonly log: Logger;

    private constructor(
        readonly config: RadarConfig,
        options: RadarServiceOptions,
        manifests: ReadonlyMap<StreamId, SourceManifest>
    ) {
        const createLog = options.createLog ?? ((tag: string) => createLogger(tag));
        this.log = createLog('radar');
        this.pool = new WorkerPool(config.workerPoolSize, createLog('pool'));
        const persist = options.persistManifests ?? true;

        for (const stream of STREAM_IDS) {
            const manifest = manifests.get(stream);
            const streamConfig = config.streams[stream];
            if (!streamConfig.enabled || !manifest) continue;

            const store = options.stores?.[stream] ?? new LocalOutputStore(streamConfig.outputDir);
            const downloader = new Downloader({
                stream,
                config: streamConfig,
                retry: config.retry,
                requestTimeoutMs: config.requestTimeoutMs,
                manifest,
                fetchImpl: options.fetchImpl,
                sleep: options.sleep,
                logger: createLog(`fetch:${stream}`)
            });
            const handler = createRenderHandler({
                store,
                contract: options.contract ?? MAX_Z_CONTRACT,
                scales: config.scales,
                tables: COLORMAP_VARIANTS.map((v) => COLOR_TABLES[v]),
                fetchSource: (id, signal) => downloader.fetch(id, signal),
                decode: options.decode,
                logger: createLog(`render:${stream}`)
            });
            const ctx: StreamContext = {
                config,
                downloader,
                manifest,
                manifestPath: persist ? path.join(streamConfig.dataDir, MANIFEST_FILE) : undefined,
                store,
                pool: this.pool,
                registry: this.registry,
                handler,
                logger: createLog(stream === 'current' ? 'ingest' : 'forecast')
            };

            this.processors.set(
                stream,
                stream === 'current'
                    ? new PipelineOrchestrator(ctx)
                    : new ForecastProcessor({ ...ctx, extractor: options.extractor })
            );
        }

        this.scheduler = new Scheduler((signal) => this.runCycle(signal), {
            intervalMs: config.pollIntervalMs,
            quickCheckIntervalMs: config.quickCheckIntervalMs,
            quickCheckLimit: config.quickCheckLimit,
            runImmediately: true,
            now: options.now,
            logger: createLog('scheduler')
        });
    }

    /**
     * Build a service, loading each enabled stream's saved manifest.
     */
    static async create(options: RadarServiceOptions): Promise<RadarService> {
        const { config } = options;
        const now = options.now ?? Date.now;
        const persist = options.persistManifests ?? true;
        const manifests = new Map<StreamId, SourceManifest>();

        for (const stream of STREAM_IDS) {
            const streamConfig = config.streams[stream];
            if (!streamConfig.enabled) continue;
            manifests.set(
                stream,
                persist
                    ? await SourceManifest.load(path.join(streamConfig.dataDir, MANIFEST_FILE), now)
                    : new SourceManifest(now)
            );
        }
        return new RadarService(config, options, manifests);
    }

    get streams(): StreamId[] {
        return Array.from(this.processors.keys());
    }

    /**
     * One cycle over every enabled stream. A failing stream is reported in
     * `errors` and does not stop the others.
     */
    async runCycle(signal?: AbortSignal): Promise<CycleReport> {
        const startedAt = new Date().toISOString();
        const errors: CycleReport['errors'] = [];

        const streams = await Promise.all(
            Array.from(this.processors.entries()).map(async ([stream, processor]) => {
                try {
                    return await processor.runCycle(signal);
                } catch (error) {
                    const cause = error instanceof Error ? error : new Error(String(error));
                    this.log.error(`Stream ${stream} cycle failed: ${errorMessage(error)}`);
                    errors.push({ stream, error: cause });
                    return emptyStreamReport(stream);
                }
            })
        );

        return { startedAt, finishedAt: new Date().toISOString(), streams, errors };
    }

    async latestArtifacts(stream: StreamId): Promise<RenderedArtifact[]> {
        const processor = this.processors.get(stream);
        return processor ? processor.latestArtifacts() : [];
    }

    start(): void {
        this.log.info(`Starting with streams: ${this.streams.join(', ') || 'none'}`);
        this.scheduler.start();
    }

    /**
     * Stop scheduling, wait for the running cycle and its jobs up to
     * `graceMs`, then abort whatever is left.
     */
    async shutdown(graceMs: number = this.config.shutdownGraceMs): Promise<ServiceShutdownResult> {
        this.log.info(`Shutting down (grace ${graceMs}ms, ${this.registry.size} render key(s) in flight)`);
        const [cycle, pool] = await Promise.all([
            this.scheduler.shutdown(graceMs),
            this.pool.shutdown(graceMs)
        ]);
        const result = { completed: cycle.completed && pool.completed, abandonedJobs: pool.abandoned };
        this.log.info(`Shutdown ${result.completed ? 'complete' : 'forced'}, ${result.abandonedJobs} job(s) abandoned`);
        return result;
    }
}
