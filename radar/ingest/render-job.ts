/**
 * Radar Composite CDN — Render Job
 *
 * One job turns one source (a current composite or a forecast member) into
 * its full artifact set: fetch → decode → render → publish. Each artifact is
 * published on its own, so a write failure on one leaves the others in place.
 */

import {
    FilesystemError,
    NetworkError,
    RadarError,
    RenderError,
    isSystemError,
    toRadarError
} from '../errors';
import { createLogger, type Logger } from '../log';
import { artifactKey } from '../naming';
import { decodeRadarFile } from '../odim';
import { renderVariants } from '../render';
import { PublishAbortedError, type OutputStore } from '../storage';
import type {
    ColorBandTable,
    ColormapVariant,
    FetchedSource,
    JobStage,
    ProductContract,
    ReflectivityGrid,
    RenderedArtifact,
    SourceFileId
} from '../types';
import type { JobHandler } from './pool';

export interface RenderJob {
    id: SourceFileId;
    renderKey: string;
    /** Local file to decode; when absent the source is fetched first */
    sourcePath?: string;
}

export interface ArtifactFailure {
    key: string;
    error: RadarError;
}

export interface RenderJobResult {
    id: SourceFileId;
    published: RenderedArtifact[];
    failed: ArtifactFailure[];
}

/**
 * A job failure tagged with the stage it happened in.
 */
export class JobError extends Error {
    constructor(
        readonly stage: JobStage,
        readonly error: RadarError
    ) {
        super(`${stage}: ${error.message}`, { cause: error });
        this.name = 'JobError';
    }
}

export interface RenderJobDeps {
    store: OutputStore;
    contract: ProductContract;
    scales: readonly number[];
    tables: readonly ColorBandTable[];
    /** Required for jobs without a `sourcePath` */
    fetchSource?: (id: SourceFileId, signal: AbortSignal) => Promise<FetchedSource>;
    decode?: (path: string, contract: ProductContract, leadMinutes?: number) => Promise<ReflectivityGrid>;
    logger?: Logger;
}

/**
 * File names of the complete artifact set for one timestamp (and lead).
 */
export function artifactSetKeys(
    timestamp: string,
    leadMinutes: number | undefined,
    scales: readonly number[],
    variants: readonly ColormapVariant[]
): string[] {
    const keys: string[] = [];
    for (const variant of variants) {
        for (const scale of scales) {
            keys.push(artifactKey({ timestamp, leadMinutes, variant, scale }));
        }
    }
    return keys;
}

function throwIfAborted(signal: AbortSignal, stage: JobStage, id: SourceFileId): void {
    if (signal.aborted) {
        throw new JobError(stage, new NetworkError(`Job for ${id.name} aborted`));
    }
}

export function createRenderHandler(deps: RenderJobDeps): JobHandler<RenderJob, RenderJobResult> {
    const log = deps.logger ?? createLogger('render');
    const decode = deps.decode ?? decodeRadarFile;

    return async (job, signal) => {
        const { id } = job;

        // Fetch
        let sourcePath = job.sourcePath;
        if (sourcePath === undefined) {
            if (!deps.fetchSource) {
                throw new JobError('fetch', new NetworkError(`No source path or fetcher for ${id.name}`));
            }
            try {
                sourcePath = (await deps.fetchSource(id, signal)).path;
            } catch (error) {
                throw new JobError('fetch', toRadarError(error, (m, cause) => new NetworkError(m, undefined, { cause })));
            }
        }
        throwIfAborted(signal, 'decode', id);

        // Decode
        let grid: ReflectivityGrid;
        try {
            grid = await decode(sourcePath, deps.contract, id.leadMinutes);
        } catch (error) {
            const file = sourcePath;
            throw new JobError('decode', toRadarError(error, (m, cause) => isSystemError(cause)
                ? new FilesystemError(m, file, { cause })
                : new RenderError(m, { cause })));
        }
        if (grid.clampedCells) {
            log.warn(`${id.name}: ${grid.clampedCells} cells outside [${deps.contract.minValue}, ${deps.contract.maxValue}] dBZ clamped`);
        }
        throwIfAborted(signal, 'render', id);

        // Render
        let rendered: ReturnType<typeof renderVariants>;
        try {
            rendered = renderVariants(grid, deps.scales, deps.tables);
        } catch (error) {
            throw new JobError('render', toRadarError(error, (m, cause) => new RenderError(m, { cause })));
        }

        // Publish
        const result: RenderJobResult = { id, published: [], failed: [] };
        for (const variant of rendered) {
            const key = artifactKey({
                timestamp: id.timestamp,
                leadMinutes: id.leadMinutes,
                variant: variant.variant,
                scale: variant.scale
            });
            try {
                await deps.store.publish(key, variant.png, signal);
            } catch (error) {
                if (error instanceof PublishAbortedError || signal.aborted) {
                    throw new JobError('publish', new NetworkError(error instanceof Error ? error.message : String(error)));
                }
                const failure = toRadarError(error, (m, cause) => new FilesystemError(m, key, { cause }));
                log.warn(`Publishing ${key} failed: ${failure.message}`);
                result.failed.push({ key, error: failure });
                continue;
            }

            const artifact: RenderedArtifact = {
                key,
                stream: id.stream,
                scale: variant.scale,
                variant: variant.variant,
                timestamp: id.timestamp,
                state: 'published'
            };
            if (id.leadMinutes !== undefined) artifact.leadMinutes = id.leadMinutes;
            result.published.push(artifact);
        }

        log.debug(`${job.renderKey}: published ${result.published.length}/${rendered.length} artifacts`);
        return result;
    };
}
