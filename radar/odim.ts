/**
 * Radar Composite CDN — ODIM HDF5 Decoder
 *
 * Reads composites that follow the OPERA Data Information Model:
 *
 *   /what                 date, time
 *   /where                LL_lon, LL_lat, UR_lon, UR_lat, xsize, ysize, projdef
 *   /dataset1/data1/what  gain, offset, nodata, undetect
 *   /dataset1/data1/data  quantized values, shape [ysize, xsize]
 *
 * Decoding is split in two: `readOdimFile` snapshots the container (the only
 * part that touches HDF5), `decodeComposite` turns a snapshot into a grid and
 * is a pure function of it.
 */

import { readFile } from 'fs/promises';
import { CorruptDataError, FilesystemError, FormatError, RenderError, errorMessage } from './errors';
import { compactToIso } from './time';
import type { GeoBounds, ProductContract, ReflectivityGrid } from './types';

// =============================================================================
// Product Contract
// =============================================================================

/** Maximum reflectivity composite of the Czech radar network */
export const MAX_Z_CONTRACT: ProductContract = {
    product: 'MAX_Z',
    width: 598,
    height: 378,
    bounds: { west: 11.267, east: 19.624, south: 48.047, north: 51.458 },
    minValue: -32.0,
    maxValue: 61.5
};

const BOUNDS_TOLERANCE_DEG = 1e-3;

/** Latitude limit of spherical Web Mercator (EPSG:3857) */
export const WEB_MERCATOR_MAX_LAT = 85.05112878;

// =============================================================================
// Container Snapshot
// =============================================================================

export type AttributeValue = string | number;

export interface OdimDataset {
    shape: readonly number[];
    values: ArrayLike<number>;
}

/**
 * Read-only view of the parts of a container the decoder needs.
 */
export interface OdimSource {
    /** Attributes of a group, or null when the group is absent */
    attributes(group: string): Readonly<Record<string, AttributeValue>> | null;
    dataset(path: string): OdimDataset | null;
}

export const ODIM_GROUPS = ['what', 'where', 'dataset1/what', 'dataset1/data1/what'] as const;
export const ODIM_DATA_PATH = 'dataset1/data1/data';

/**
 * In-memory container snapshot.
 */
export class MemoryOdimSource implements OdimSource {
    constructor(
        private readonly groups: Readonly<Record<string, Readonly<Record<string, AttributeValue>>>>,
        private readonly datasets: Readonly<Record<string, OdimDataset>>
    ) { }

    attributes(group: string): Readonly<Record<string, AttributeValue>> | null {
        return this.groups[group] ?? null;
    }

    dataset(path: string): OdimDataset | null {
        return this.datasets[path] ?? null;
    }
}

const HDF5_SIGNATURE = [0x89, 0x48, 0x44, 0x46, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * HDF5 superblocks sit at offset 0, 512, 1024, 2048, … (user block sizes).
 */
export function hasHdf5Signature(bytes: Uint8Array): boolean {
    for (let offset = 0; offset + HDF5_SIGNATURE.length <= bytes.length; offset = offset === 0 ? 512 : offset * 2) {
        if (HDF5_SIGNATURE.every((b, i) => bytes[offset + i] === b)) return true;
    }
    return false;
}

function normalizeAttribute(value: unknown): AttributeValue | null {
    if (typeof value === 'string' || typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    if (ArrayBuffer.isView(value) && !(value instanceof DataView)) {
        const first: unknown = Reflect.get(value, 0);
        return normalizeAttribute(first);
    }
    if (Array.isArray(value) && value.length === 1) return normalizeAttribute(value[0]);
    return null;
}

function toNumericArray(value: unknown): ArrayLike<number> | null {
    if (
        value instanceof Uint8Array || value instanceof Int8Array ||
        value instanceof Uint16Array || value instanceof Int16Array ||
        value instanceof Uint32Array || value instanceof Int32Array ||
        value instanceof Float32Array || value instanceof Float64Array
    ) {
        return value;
    }
    return null;
}

async function loadHdf5() {
    try {
        const { default: h5wasm } = await import('h5wasm/node');
        await h5wasm.ready;
        return h5wasm;
    } catch (error) {
        throw new RenderError(`HDF5 reader unavailable: ${errorMessage(error)}`, { cause: error });
    }
}

/**
 * Open an ODIM container with h5wasm and snapshot its required groups.
 * A container h5wasm cannot open or read raises CorruptDataError; a file that
 * cannot be read from disk raises FilesystemError and stays retryable. A
 * missing group is left for `decodeComposite` to report as a FormatError.
 */
export async function readOdimFile(path: string): Promise<OdimSource> {
    let bytes: Uint8Array;
    try {
        bytes = await readFile(path);
    } catch (error) {
        throw new FilesystemError(`Cannot read ${path}: ${errorMessage(error)}`, path, { cause: error });
    }
    if (!hasHdf5Signature(bytes)) {
        throw new CorruptDataError(`Not an HDF5 container: ${path}`);
    }

    const h5wasm = await loadHdf5();

    let file: InstanceType<typeof h5wasm.File>;
    try {
        file = new h5wasm.File(path, 'r');
    } catch (error) {
        throw new CorruptDataError(`Cannot open HDF5 container ${path}: ${errorMessage(error)}`, { cause: error });
    }

    try {
        const groups: Record<string, Record<string, AttributeValue>> = {};
        for (const name of ODIM_GROUPS) {
            const entity = file.get(name);
            if (!(entity instanceof h5wasm.Group)) continue;
            const attrs: Record<string, AttributeValue> = {};
            for (const [key, attribute] of Object.entries(entity.attrs)) {
                const value = normalizeAttribute(attribute.value);
                if (value !== null) attrs[key] = value;
            }
            groups[name] = attrs;
        }

        const datasets: Record<string, OdimDataset> = {};
        const data = file.get(ODIM_DATA_PATH);
        if (data instanceof h5wasm.Dataset) {
            const values = toNumericArray(data.value);
            if (values) {
                datasets[ODIM_DATA_PATH] = { shape: data.shape ?? [], values };
            }
        }

        return new MemoryOdimSource(groups, datasets);
    } catch (error) {
        throw new CorruptDataError(`Cannot read HDF5 container ${path}: ${errorMessage(error)}`, { cause: error });
    } finally {
        file.close();
    }
}

// =============================================================================
// Decoding
// =============================================================================

function requireGroup(source: OdimSource, group: string): Readonly<Record<string, AttributeValue>> {
    const attrs = source.attributes(group);
    if (!attrs) throw new FormatError(`Missing group /${group}`);
    return attrs;
}

function requireNumber(attrs: Readonly<Record<string, AttributeValue>>, group: string, name: string): number {
    const raw = attrs[name];
    const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new FormatError(`Missing or non-numeric attribute /${group}.${name}`);
    }
    return value;
}

function requireString(attrs: Readonly<Record<string, AttributeValue>>, group: string, name: string): string {
    const raw = attrs[name];
    if (raw === undefined) throw new FormatError(`Missing attribute /${group}.${name}`);
    const value = String(raw).trim();
    if (!value) throw new FormatError(`Empty attribute /${group}.${name}`);
    return value;
}

/**
 * Calibration attributes may sit on the data group or be inherited from
 * higher levels of the hierarchy.
 */
function requireCalibration(source: OdimSource, name: string): number {
    for (const group of ['dataset1/data1/what', 'dataset1/what', 'what']) {
        const attrs = source.attributes(group);
        if (attrs && attrs[name] !== undefined) return requireNumber(attrs, group, name);
    }
    throw new FormatError(`Missing calibration attribute ${name}`);
}

export function assertWebMercatorCompatible(bounds: GeoBounds): void {
    const { west, east, south, north } = bounds;
    if (!(west < east) || !(south < north)) {
        throw new FormatError(`Degenerate bounds: lon [${west}, ${east}] lat [${south}, ${north}]`);
    }
    if (west < -180 || east > 180) {
        throw new FormatError(`Longitude outside [-180, 180]: [${west}, ${east}]`);
    }
    if (south < -WEB_MERCATOR_MAX_LAT || north > WEB_MERCATOR_MAX_LAT) {
        throw new FormatError(`Latitude outside Web Mercator range: [${south}, ${north}]`);
    }
}

function checkContract(contract: ProductContract, width: number, height: number, bounds: GeoBounds): void {
    if (width !== contract.width || height !== contract.height) {
        throw new FormatError(
            `Grid ${width}x${height} does not match ${contract.product} contract ${contract.width}x${contract.height}`
        );
    }
    for (const edge of ['west', 'east', 'south', 'north'] as const) {
        if (Math.abs(bounds[edge] - contract.bounds[edge]) > BOUNDS_TOLERANCE_DEG) {
            throw new FormatError(
                `Bounds ${edge}=${bounds[edge]} does not match ${contract.product} contract ${contract.bounds[edge]}`
            );
        }
    }
}

/**
 * Convert a container snapshot into a physical reflectivity grid:
 * dBZ = raw * gain + offset, with nodata/undetect cells marked missing.
 */
export function decodeComposite(
    source: OdimSource,
    contract: ProductContract = MAX_Z_CONTRACT,
    leadMinutes?: number
): ReflectivityGrid {
    const what = requireGroup(source, 'what');
    const date = requireString(what, 'what', 'date');
    const time = requireString(what, 'what', 'time');
    const timestamp = compactToIso(date, time);
    if (!timestamp) {
        throw new FormatError(`Invalid /what date/time: ${date} ${time}`);
    }

    const where = requireGroup(source, 'where');
    const width = requireNumber(where, 'where', 'xsize');
    const height = requireNumber(where, 'where', 'ysize');
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new FormatError(`Invalid grid size ${width}x${height}`);
    }
    const bounds: GeoBounds = {
        west: requireNumber(where, 'where', 'LL_lon'),
        east: requireNumber(where, 'where', 'UR_lon'),
        south: requireNumber(where, 'where', 'LL_lat'),
        north: requireNumber(where, 'where', 'UR_lat')
    };
    const projection = requireString(where, 'where', 'projdef');

    checkContract(contract, width, height, bounds);
    assertWebMercatorCompatible(bounds);

    const gain = requireCalibration(source, 'gain');
    const offset = requireCalibration(source, 'offset');
    const nodata = requireCalibration(source, 'nodata');
    const undetect = requireCalibration(source, 'undetect');

    const data = source.dataset(ODIM_DATA_PATH);
    if (!data) throw new FormatError(`Missing dataset /${ODIM_DATA_PATH}`);
    const [rows, cols] = data.shape;
    if (data.shape.length !== 2 || rows !== height || cols !== width) {
        throw new FormatError(`Dataset shape [${data.shape.join(', ')}] does not match [${height}, ${width}]`);
    }
    if (data.values.length !== width * height) {
        throw new FormatError(`Dataset holds ${data.values.length} values, expected ${width * height}`);
    }

    const size = width * height;
    const values = new Float32Array(size);
    const missing = new Uint8Array(size);
    let clampedCells = 0;
    for (let i = 0; i < size; i++) {
        const raw = data.values[i];
        if (raw === nodata || raw === undetect || !Number.isFinite(raw)) {
            missing[i] = 1;
            continue;
        }
        const dbz = raw * gain + offset;
        if (dbz < contract.minValue || dbz > contract.maxValue) clampedCells++;
        values[i] = Math.min(contract.maxValue, Math.max(contract.minValue, dbz));
    }

    const grid: ReflectivityGrid = {
        product: contract.product,
        width,
        height,
        values,
        missing,
        bounds,
        projection,
        timestamp,
        clampedCells
    };
    if (leadMinutes !== undefined) grid.leadMinutes = leadMinutes;
    return grid;
}

/**
 * Read and decode one file.
 */
export async function decodeRadarFile(
    path: string,
    contract: ProductContract = MAX_Z_CONTRACT,
    leadMinutes?: number
): Promise<ReflectivityGrid> {
    const source = await readOdimFile(path);
    return decodeComposite(source, contract, leadMinutes);
}
