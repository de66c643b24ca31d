/**
 * Radar Composite CDN — Core Type Definitions
 *
 * Source files come from the remote listings, grids live only inside a
 * render job, and rendered artifacts are what the output directory serves.
 */

// =============================================================================
// Streams & Source Files
// =============================================================================

export type StreamId = 'current' | 'forecast';

export const STREAM_IDS: readonly StreamId[] = ['current', 'forecast'];

/**
 * Identity of a remote source file.
 * Forecast members additionally carry the lead time they were extracted for.
 */
export interface SourceFileId {
    stream: StreamId;

    /** Remote file name (also the local file name) */
    name: string;

    /** UTC timestamp embedded in the name (ISO 8601) */
    timestamp: string;

    /** Forecast horizon in minutes (forecast members only) */
    leadMinutes?: number;
}

export type SourceState = 'fetched' | 'processed' | 'quarantined' | 'failed';

/**
 * Local bookkeeping for one source file.
 */
export interface SourceRecord {
    id: SourceFileId;
    state: SourceState;

    /** Fetch attempts across all cycles */
    attempts: number;

    /** BLAKE3 hex of the fetched bytes */
    contentHash?: string;

    lastError?: string;

    /** Epoch ms until which the file is not retried (permanent fetch failures) */
    cooldownUntil?: number;

    /** Epoch ms of the last state change */
    updatedAt: number;
}

export interface FetchedSource {
    id: SourceFileId;
    path: string;
    sizeBytes: number;
    contentHash: string;
}

// =============================================================================
// Decoded Grid
// =============================================================================

export interface GeoBounds {
    west: number;
    east: number;
    south: number;
    north: number;
}

/**
 * Physical reflectivity grid decoded from one ODIM container.
 * Row 0 is the northern edge, column 0 the western edge.
 */
export interface ReflectivityGrid {
    product: string;
    width: number;
    height: number;

    /** dBZ, row-major; meaningless where `missing` is set */
    values: Float32Array;

    /** 1 where the cell is nodata/undetect */
    missing: Uint8Array;

    bounds: GeoBounds;

    /** Projection definition as declared by the container */
    projection: string;

    /** Nominal time of the composite (ISO 8601 UTC) */
    timestamp: string;

    leadMinutes?: number;

    /** Cells whose decoded value fell outside the contract range and was clamped */
    clampedCells?: number;
}

/**
 * Fixed shape every file of a product must have.
 */
export interface ProductContract {
    product: string;
    width: number;
    height: number;
    bounds: GeoBounds;

    /** Inclusive physical range of non-missing values (dBZ) */
    minValue: number;
    maxValue: number;
}

// =============================================================================
// Rendering
// =============================================================================

export type ColormapVariant = 'standard' | 'contrast';

export const COLORMAP_VARIANTS: readonly ColormapVariant[] = ['standard', 'contrast'];

export type Rgba = readonly [number, number, number, number];

export interface ColorBandTable {
    variant: ColormapVariant;

    /** Lower edge of the first band (dBZ) */
    threshold: number;

    /** Width of every band (dBZ) */
    bandWidth: number;

    /** One opaque color per band, lowest first; the last band is open-ended */
    colors: readonly Rgba[];
}

export interface RgbaRaster {
    width: number;
    height: number;
    data: Uint8Array;
}

export type PublicationState = 'staged' | 'published';

export interface RenderedArtifact {
    /** File name inside the stream's output directory */
    key: string;
    stream: StreamId;
    scale: number;
    variant: ColormapVariant;
    timestamp: string;
    leadMinutes?: number;
    state: PublicationState;
}

// =============================================================================
// Jobs & Cycles
// =============================================================================

export type JobStage = 'fetch' | 'decode' | 'render' | 'publish';

export interface JobFailure {
    id: SourceFileId;
    stage: JobStage;
    error: Error;
}

export interface StreamCycleReport {
    stream: StreamId;

    /** New source files seen in the listing this cycle */
    discovered: number;

    /** Render keys that published their full artifact set */
    processed: number;

    /** Render keys skipped because a job for them was already running */
    skippedInFlight: number;

    /** Jobs abandoned by a shutdown */
    abandoned: number;

    failures: JobFailure[];
    artifacts: RenderedArtifact[];

    /** Artifact keys removed by retention or forecast pruning */
    pruned: string[];
}

export interface CycleReport {
    startedAt: string;
    finishedAt: string;
    streams: StreamCycleReport[];

    /** Stream-level failures (listing unreachable, unexpected errors) */
    errors: { stream: StreamId; error: Error }[];
}

export function emptyStreamReport(stream: StreamId): StreamCycleReport {
    return {
        stream,
        discovered: 0,
        processed: 0,
        skippedInFlight: 0,
        abandoned: 0,
        failures: [],
        artifacts: [],
        pruned: []
    };
}

/**
 * Number of new source files a cycle found across all streams.
 */
export function countDiscovered(report: CycleReport): number {
    return report.streams.reduce((sum, s) => sum + s.discovered, 0);
}
