/**
 * Shared fixtures for radar tests.
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import { parseConfig, type RadarConfig } from '../config';
import { CorruptDataError, FormatError, RenderError } from '../errors';
import type { FetchImpl } from '../ingest/fetcher';
import type { Logger } from '../log';
import { MAX_Z_CONTRACT, MemoryOdimSource, ODIM_DATA_PATH, decodeComposite, type AttributeValue } from '../odim';
import type { CycleReport, ProductContract, ReflectivityGrid, StreamCycleReport } from '../types';
import { emptyStreamReport } from '../types';

export const CURRENT_LISTING = 'https://radar.test/maxz/';
export const FORECAST_LISTING = 'https://radar.test/fct_maxz/';

/** Small grid with the real product bounds */
export const TEST_CONTRACT: ProductContract = {
    ...MAX_Z_CONTRACT,
    product: 'TEST',
    width: 4,
    height: 3
};

export async function makeTempDir(prefix = 'radar-test-'): Promise<string> {
    return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export function testConfig(
    baseDir: string,
    overrides: Record<string, unknown> = {},
    streams: { current?: Record<string, unknown>; forecast?: Record<string, unknown> } = {}
): RadarConfig {
    return parseConfig({
        retry: { attempts: 2, baseDelayMs: 10, maxDelayMs: 20 },
        streams: {
            current: {
                enabled: true,
                listingUrl: CURRENT_LISTING,
                dataDir: 'radar',
                outputDir: 'output',
                trackLimit: 12,
                maxPublished: 600,
                ...streams.current
            },
            forecast: {
                enabled: true,
                listingUrl: FORECAST_LISTING,
                dataDir: 'radar_forecast',
                outputDir: 'output_forecast',
                trackLimit: 3,
                maxPublished: 0,
                ...streams.forecast
            }
        },
        ...overrides
    }, baseDir);
}

export const CALIBRATION = { gain: 0.5, offset: -32, nodata: 255, undetect: 0 } as const;

/** Raw value that decodes to `dbz` with CALIBRATION */
export function rawFor(dbz: number): number {
    return (dbz - CALIBRATION.offset) / CALIBRATION.gain;
}

export interface OdimFixture {
    contract?: ProductContract;
    date?: string;
    time?: string;
    /** Raw value per cell; defaults to undetect everywhere */
    raw?: (index: number) => number;
    groups?: Record<string, Record<string, AttributeValue> | undefined>;
    shape?: number[];
}

export function makeOdimSource(fixture: OdimFixture = {}): MemoryOdimSource {
    const contract = fixture.contract ?? MAX_Z_CONTRACT;
    const size = contract.width * contract.height;
    const values = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
        values[i] = fixture.raw ? fixture.raw(i) : CALIBRATION.undetect;
    }

    const groups: Record<string, Record<string, AttributeValue>> = {
        what: { date: fixture.date ?? '20250913', time: fixture.time ?? '162500', object: 'COMP' },
        where: {
            LL_lon: contract.bounds.west,
            UR_lon: contract.bounds.east,
            LL_lat: contract.bounds.south,
            UR_lat: contract.bounds.north,
            xsize: contract.width,
            ysize: contract.height,
            projdef: '+proj=merc +lat_ts=0 +lon_0=0 +k=1 +x_0=0 +y_0=0 +ellps=WGS84'
        },
        'dataset1/what': { product: 'MAX' },
        'dataset1/data1/what': { ...CALIBRATION, quantity: 'DBZH' }
    };
    for (const [name, attrs] of Object.entries(fixture.groups ?? {})) {
        if (attrs === undefined) {
            delete groups[name];
        } else {
            groups[name] = attrs;
        }
    }

    return new MemoryOdimSource(groups, {
        [ODIM_DATA_PATH]: { shape: fixture.shape ?? [contract.height, contract.width], values }
    });
}

/**
 * Decoder stand-in driven by the downloaded file's text:
 * "corrupt" → CorruptDataError, "format" → FormatError, "flaky" → RenderError,
 * "dbz:<n>" → every cell at n dBZ, anything else → 42 dBZ everywhere.
 */
export function fakeDecode(contract: ProductContract = TEST_CONTRACT) {
    return vi.fn(async (filePath: string, _contract: ProductContract, leadMinutes?: number): Promise<ReflectivityGrid> => {
        const text = (await readFile(filePath, 'utf8')).trim();
        if (text === 'corrupt') throw new CorruptDataError(`Unreadable ${path.basename(filePath)}`);
        if (text === 'format') throw new FormatError(`Bad shape in ${path.basename(filePath)}`);
        if (text === 'flaky') throw new RenderError(`Transient failure in ${path.basename(filePath)}`);
        const dbz = text.startsWith('dbz:') ? Number(text.slice(4)) : 42;
        return decodeComposite(makeOdimSource({ contract, raw: () => rawFor(dbz) }), contract, leadMinutes);
    });
}

export function listingHtml(names: readonly string[]): string {
    const links = names.map((n) => `<a href="${n}">${n}</a>`).join('\n');
    return `<html><body><a href="../">../</a>\n${links}</body></html>`;
}

/**
 * Fetch stand-in serving listings and files from in-memory maps. Files that
 * are absent answer 404.
 */
export function fakeRemote(listings: Record<string, () => readonly string[]>, files: Record<string, string>) {
    return vi.fn<FetchImpl>(async (url: string) => {
        const listing = listings[url];
        if (listing) return new Response(listingHtml(listing()));
        const name = decodeURIComponent(url.slice(url.lastIndexOf('/') + 1));
        const body = files[name];
        if (body === undefined) return new Response('not found', { status: 404, statusText: 'Not Found' });
        return new Response(body);
    });
}

export function recordingLogger(): Logger & { lines: string[] } {
    const lines: string[] = [];
    const push = (level: string) => (message: string) => {
        lines.push(`${level} ${message}`);
    };
    return { lines, debug: push('debug'), info: push('info'), warn: push('warn'), error: push('error') };
}

export function makeCycleReport(discovered: number): CycleReport {
    const stream: StreamCycleReport = { ...emptyStreamReport('current'), discovered };
    return {
        startedAt: '2025-09-13T16:25:00.000Z',
        finishedAt: '2025-09-13T16:25:01.000Z',
        streams: [stream],
        errors: []
    };
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}
