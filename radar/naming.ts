/**
 * Radar Composite CDN — File Naming
 *
 * Remote names embed the product code and UTC time:
 *   current:          T_PABV22_C_OKPR_20250913162500.hdf
 *   forecast bundle:  T_PABV23_C_OKPR_20250928.2225.ft60s10.tar
 *   forecast member:  T_PABV23_C_OKPR_20250928223500_ft10.hdf
 *
 * Published artifacts are named `<YYYYMMDD_HHMM>[_ft<LL>]_<variant>[_<N>x].png`.
 */

import { compactToIso, timestampStub } from './time';
import { COLORMAP_VARIANTS, type ColormapVariant, type RenderedArtifact, type SourceFileId, type StreamId } from './types';

const COMPACT_TIMESTAMP = /(\d{8})(\d{6})/;
const BUNDLE_TIMESTAMP = /(\d{8})\.(\d{4})/;
const LEAD_LABEL = /_ft(\d+)(?:\.[a-z0-9]+)?$/i;
const ARTIFACT_NAME = /^(\d{8})_(\d{4})(?:_ft(\d+))?_([a-z]+)(?:_(\d+)x)?\.png$/;

export const SOURCE_SUFFIX: Record<StreamId, string> = {
    current: '.hdf',
    forecast: '.tar'
};

/**
 * Extract the 14-digit UTC timestamp from a radar or forecast member name.
 */
export function parseCompactTimestamp(name: string): string | null {
    const match = name.match(COMPACT_TIMESTAMP);
    if (!match) return null;
    return compactToIso(match[1], match[2]);
}

/**
 * Extract the issuance time from a forecast bundle name ("YYYYMMDD.HHMM").
 */
export function parseBundleTimestamp(name: string): string | null {
    const match = name.match(BUNDLE_TIMESTAMP);
    if (!match) return null;
    return compactToIso(match[1], match[2]);
}

/**
 * The "_ftNN" label of a forecast member, if present.
 */
export function parseLeadLabel(name: string): number | null {
    const match = name.match(LEAD_LABEL);
    if (!match) return null;
    return parseInt(match[1], 10);
}

/**
 * Turn a listing entry into a source identifier, or null if the name does
 * not follow the stream's convention.
 */
export function parseSourceName(stream: StreamId, name: string): SourceFileId | null {
    if (!name.toLowerCase().endsWith(SOURCE_SUFFIX[stream])) return null;
    const timestamp = stream === 'forecast'
        ? parseBundleTimestamp(name) ?? parseCompactTimestamp(name)
        : parseCompactTimestamp(name);
    if (!timestamp) return null;
    return { stream, name, timestamp };
}

// =============================================================================
// Artifacts
// =============================================================================

export interface ArtifactKeyParts {
    timestamp: string;
    leadMinutes?: number;
    variant: ColormapVariant;
    scale: number;
}

export function artifactKey(parts: ArtifactKeyParts): string {
    const lead = parts.leadMinutes !== undefined ? `_ft${parts.leadMinutes.toString().padStart(2, '0')}` : '';
    const density = parts.scale > 1 ? `_${parts.scale}x` : '';
    return `${timestampStub(parts.timestamp)}${lead}_${parts.variant}${density}.png`;
}

function isVariant(value: string): value is ColormapVariant {
    return COLORMAP_VARIANTS.some((v) => v === value);
}

/**
 * Inverse of `artifactKey`. Unrelated files in the output directory yield null.
 */
export function parseArtifactKey(stream: StreamId, key: string): RenderedArtifact | null {
    const match = key.match(ARTIFACT_NAME);
    if (!match) return null;
    const [, datePart, timePart, lead, variant, scale] = match;
    if (!isVariant(variant)) return null;
    const timestamp = compactToIso(datePart, timePart);
    if (!timestamp) return null;

    const artifact: RenderedArtifact = {
        key,
        stream,
        scale: scale ? parseInt(scale, 10) : 1,
        variant,
        timestamp,
        state: 'published'
    };
    if (lead !== undefined) artifact.leadMinutes = parseInt(lead, 10);
    return artifact;
}

/**
 * Render key used for in-flight exclusion: one job per (stream, timestamp[, lead]).
 */
export function renderKey(id: Pick<SourceFileId, 'stream' | 'timestamp' | 'leadMinutes'>): string {
    return id.leadMinutes !== undefined
        ? `${id.stream}:${id.timestamp}:${id.leadMinutes}`
        : `${id.stream}:${id.timestamp}`;
}
