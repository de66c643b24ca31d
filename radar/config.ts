/**
 * Radar Composite CDN — Configuration
 *
 * One immutable value, validated once at startup and passed to every component.
 */

import path from 'path';
import { z } from 'zod';
import type { StreamId } from './types';

const CURRENT_LISTING_URL = 'https://opendata.chmi.cz/meteorology/weather/radar/composite/maxz/hdf5/';
const FORECAST_LISTING_URL = 'https://opendata.chmi.cz/meteorology/weather/radar/composite/fct_maxz/hdf5/';

const StreamConfigSchema = z.object({
    enabled: z.boolean(),
    listingUrl: z.string().url(),
    /** Downloaded source files */
    dataDir: z.string().min(1),
    /** Published artifacts (served read-only by the static server) */
    outputDir: z.string().min(1),
    /** Newest listing entries considered per cycle */
    trackLimit: z.number().int().positive(),
    /** Newest timestamps kept in the output directory (current stream only) */
    maxPublished: z.number().int().nonnegative()
});

export const RadarConfigSchema = z.object({
    pollIntervalMs: z.number().int().positive().default(300_000),
    quickCheckIntervalMs: z.number().int().positive().default(3_000),
    /** 0 disables quick polling */
    quickCheckLimit: z.number().int().nonnegative().default(90),
    workerPoolSize: z.number().int().positive().max(64).default(4),
    retry: z.object({
        attempts: z.number().int().positive().max(10).default(4),
        baseDelayMs: z.number().int().nonnegative().default(2_000),
        maxDelayMs: z.number().int().nonnegative().default(30_000)
    }).default({}),
    requestTimeoutMs: z.number().int().positive().default(30_000),
    notFoundCooldownMs: z.number().int().nonnegative().default(30 * 60_000),
    /** Pixel densities published per artifact: standard, doubled */
    scales: z.tuple([z.literal(1), z.number().int().min(2).max(8)]).default([1, 2]),
    shutdownGraceMs: z.number().int().nonnegative().default(20_000),
    streams: z.object({
        current: StreamConfigSchema.default({
            enabled: true,
            listingUrl: CURRENT_LISTING_URL,
            dataDir: 'data/radar',
            outputDir: 'data/output',
            trackLimit: 12,
            maxPublished: 600
        }),
        forecast: StreamConfigSchema.default({
            enabled: true,
            listingUrl: FORECAST_LISTING_URL,
            dataDir: 'data/radar_forecast',
            outputDir: 'data/output_forecast',
            trackLimit: 3,
            maxPublished: 0
        })
    }).default({}),
    forecast: z.object({
        leadTimes: z.array(z.number().int().positive()).min(1).default([10, 20, 30, 40, 50, 60]),
        /** Prior issuances kept after a newer one is fully published */
        retainIssuances: z.number().int().nonnegative().default(0)
    }).default({}),
    server: z.object({
        host: z.string().default('0.0.0.0'),
        port: z.number().int().min(0).max(65_535).default(8080)
    }).default({})
}).refine((c) => c.retry.maxDelayMs >= c.retry.baseDelayMs, {
    message: 'retry.maxDelayMs must be >= retry.baseDelayMs',
    path: ['retry', 'maxDelayMs']
});

type DeepReadonly<T> = T extends (infer U)[]
    ? readonly DeepReadonly<U>[]
    : T extends object
        ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
        : T;

export type RadarConfig = DeepReadonly<z.infer<typeof RadarConfigSchema>>;
export type StreamConfig = RadarConfig['streams'][StreamId];
export type RetryConfig = RadarConfig['retry'];

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object') {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Validate raw input, apply defaults, resolve directories against `baseDir`
 * and freeze the result. Throws a ZodError describing every invalid field.
 */
export function parseConfig(input: unknown, baseDir = process.cwd()): RadarConfig {
    const parsed = RadarConfigSchema.parse(input ?? {});
    for (const stream of Object.values(parsed.streams)) {
        stream.dataDir = path.resolve(baseDir, stream.dataDir);
        stream.outputDir = path.resolve(baseDir, stream.outputDir);
    }
    return deepFreeze(parsed);
}

// =============================================================================
// Environment
// =============================================================================

export interface RadarEnv {
    /** Full JSON config; individual variables below override it */
    RADAR_CONFIG_JSON?: string;
    RADAR_POLL_INTERVAL_MS?: string;
    RADAR_WORKERS?: string;
    RADAR_RETRY_ATTEMPTS?: string;
    /** Comma-separated subset of "current,forecast" */
    RADAR_STREAMS?: string;
    RADAR_DATA_DIR?: string;
    PORT?: string;
}

function parseIntegerVar(name: string, raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const n = Number(raw);
    if (!Number.isInteger(n)) {
        throw new Error(`Invalid ${name}: expected an integer, got "${raw}"`);
    }
    return n;
}

function parseJsonObject(raw: string | undefined): Record<string, unknown> {
    if (!raw || raw.trim() === '') return {};
    const value: unknown = JSON.parse(raw);
    if (!isRecord(value)) {
        throw new Error('Invalid RADAR_CONFIG_JSON: expected a JSON object');
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function childRecord(parent: Record<string, unknown>, key: string): Record<string, unknown> {
    const existing = parent[key];
    const child = isRecord(existing) ? { ...existing } : {};
    parent[key] = child;
    return child;
}

/**
 * Build the config from environment variables.
 */
export function loadConfigFromEnv(env: RadarEnv = process.env, baseDir = process.cwd()): RadarConfig {
    const raw = parseJsonObject(env.RADAR_CONFIG_JSON);

    const pollIntervalMs = parseIntegerVar('RADAR_POLL_INTERVAL_MS', env.RADAR_POLL_INTERVAL_MS);
    if (pollIntervalMs !== undefined) raw.pollIntervalMs = pollIntervalMs;

    const workers = parseIntegerVar('RADAR_WORKERS', env.RADAR_WORKERS);
    if (workers !== undefined) raw.workerPoolSize = workers;

    const attempts = parseIntegerVar('RADAR_RETRY_ATTEMPTS', env.RADAR_RETRY_ATTEMPTS);
    if (attempts !== undefined) childRecord(raw, 'retry').attempts = attempts;

    const port = parseIntegerVar('PORT', env.PORT);
    if (port !== undefined) childRecord(raw, 'server').port = port;

    const dataRoot = env.RADAR_DATA_DIR?.trim();
    const enabled = env.RADAR_STREAMS
        ? new Set(env.RADAR_STREAMS.split(',').map((s) => s.trim()).filter(Boolean))
        : null;

    if (dataRoot || enabled) {
        const streams = childRecord(raw, 'streams');
        for (const id of ['current', 'forecast'] as const) {
            if (!isRecord(streams[id])) {
                streams[id] = { ...RadarConfigSchema.parse({}).streams[id] };
            }
            const stream = childRecord(streams, id);
            if (enabled) stream.enabled = enabled.has(id);
            if (dataRoot) {
                stream.dataDir = path.join(dataRoot, id === 'current' ? 'radar' : 'radar_forecast');
                stream.outputDir = path.join(dataRoot, id === 'current' ? 'output' : 'output_forecast');
            }
        }
    }

    return parseConfig(raw, baseDir);
}
