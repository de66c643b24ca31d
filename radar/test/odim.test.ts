import { describe, it, expect, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import path from 'path';
import { CorruptDataError, FilesystemError, FormatError, isQuarantineError } from '../errors';
import {
    MAX_Z_CONTRACT,
    assertWebMercatorCompatible,
    decodeComposite,
    decodeRadarFile,
    hasHdf5Signature,
    readOdimFile
} from '../odim';
import { CALIBRATION, TEST_CONTRACT, makeOdimSource, makeTempDir, rawFor, removeDir } from './helpers';

const WIDTH = MAX_Z_CONTRACT.width;

describe('decodeComposite', () => {
    it('produces a grid matching the product contract', () => {
        const grid = decodeComposite(makeOdimSource());
        expect(grid.width).toBe(598);
        expect(grid.height).toBe(378);
        expect(grid.values).toHaveLength(598 * 378);
        expect(grid.bounds).toEqual({ west: 11.267, east: 19.624, south: 48.047, north: 51.458 });
        expect(grid.timestamp).toBe('2025-09-13T16:25:00.000Z');
        expect(grid.projection).toContain('+proj=merc');
        expect(grid.leadMinutes).toBeUndefined();
    });

    it('applies gain and offset', () => {
        const grid = decodeComposite(makeOdimSource({ raw: (i) => (i === 5 ? rawFor(42) : 1) }));
        expect(grid.values[5]).toBe(42);
        expect(grid.missing[5]).toBe(0);
        expect(grid.values[6]).toBe(-31.5);
    });

    it('marks nodata and undetect cells missing', () => {
        const grid = decodeComposite(makeOdimSource({
            raw: (i) => (i === 0 ? CALIBRATION.nodata : i === 1 ? CALIBRATION.undetect : rawFor(20))
        }));
        expect(grid.missing[0]).toBe(1);
        expect(grid.missing[1]).toBe(1);
        expect(grid.missing[2]).toBe(0);
        expect(grid.values[2]).toBe(20);
    });

    it('clamps values into the physical range', () => {
        const grid = decodeComposite(makeOdimSource({ raw: () => 254 }));
        expect(grid.values[0]).toBe(61.5);
    });

    it('counts the cells it clamps', () => {
        const source = makeOdimSource({
            contract: TEST_CONTRACT,
            raw: (i) => (i < 2 ? 254 : i === 2 ? CALIBRATION.nodata : rawFor(42))
        });
        const grid = decodeComposite(source, TEST_CONTRACT);
        expect(grid.clampedCells).toBe(2);
        expect(grid.values[1]).toBe(61.5);
        expect(grid.values[3]).toBe(42);

        expect(decodeComposite(makeOdimSource({ contract: TEST_CONTRACT }), TEST_CONTRACT).clampedCells).toBe(0);
    });

    it('keeps every non-missing value within [-32, 61.5]', () => {
        const grid = decodeComposite(makeOdimSource({ raw: (i) => i % 256 }));
        for (let i = 0; i < grid.values.length; i++) {
            if (grid.missing[i]) continue;
            expect(grid.values[i]).toBeGreaterThanOrEqual(-32);
            expect(grid.values[i]).toBeLessThanOrEqual(61.5);
        }
    });

    it('carries the lead time when given', () => {
        expect(decodeComposite(makeOdimSource(), MAX_Z_CONTRACT, 30).leadMinutes).toBe(30);
    });

    it('inherits calibration from the dataset group', () => {
        const grid = decodeComposite(makeOdimSource({
            raw: () => 100,
            groups: {
                'dataset1/data1/what': { quantity: 'DBZH' },
                'dataset1/what': { gain: 1, offset: -40, nodata: 255, undetect: 0 }
            }
        }));
        expect(grid.values[WIDTH]).toBe(60);
    });

    it('rejects a missing group', () => {
        expect(() => decodeComposite(makeOdimSource({ groups: { where: undefined } })))
            .toThrow(new FormatError('Missing group /where'));
    });

    it('rejects a missing calibration attribute', () => {
        expect(() => decodeComposite(makeOdimSource({ groups: { 'dataset1/data1/what': { gain: 0.5, offset: -32, nodata: 255 } } })))
            .toThrow(FormatError);
    });

    it('rejects grids that differ from the contract', () => {
        const where = {
            LL_lon: 11.267, UR_lon: 19.624, LL_lat: 48.047, UR_lat: 51.458,
            xsize: 600, ysize: 378, projdef: '+proj=merc'
        };
        expect(() => decodeComposite(makeOdimSource({ groups: { where } }))).toThrow(FormatError);
        expect(() => decodeComposite(makeOdimSource({ groups: { where: { ...where, xsize: 598, UR_lat: 52 } } })))
            .toThrow(FormatError);
    });

    it('rejects a data shape that disagrees with the declared size', () => {
        expect(() => decodeComposite(makeOdimSource({ shape: [598, 378] }))).toThrow(FormatError);
    });

    it('rejects an invalid date', () => {
        expect(() => decodeComposite(makeOdimSource({ date: '20251340' }))).toThrow(FormatError);
    });
});

describe('assertWebMercatorCompatible', () => {
    it('accepts the product bounds', () => {
        expect(() => assertWebMercatorCompatible(MAX_Z_CONTRACT.bounds)).not.toThrow();
    });

    it('rejects polar, inverted or out-of-range bounds', () => {
        expect(() => assertWebMercatorCompatible({ west: 0, east: 10, south: 80, north: 89 })).toThrow(FormatError);
        expect(() => assertWebMercatorCompatible({ west: 10, east: 0, south: 40, north: 50 })).toThrow(FormatError);
        expect(() => assertWebMercatorCompatible({ west: -190, east: 0, south: 40, north: 50 })).toThrow(FormatError);
    });
});

/**
 * Write a small ODIM composite with the HDF5 library itself.
 */
async function writeOdimFile(file: string, raw: Uint8Array, options: { withWhere?: boolean } = {}): Promise<void> {
    const { default: h5wasm } = await import('h5wasm/node');
    await h5wasm.ready;
    const { bounds, width, height } = TEST_CONTRACT;

    const f = new h5wasm.File(file, 'w');
    try {
        const what = f.create_group('what');
        what.create_attribute('object', 'COMP');
        what.create_attribute('date', '20250913');
        what.create_attribute('time', '162500');

        if (options.withWhere ?? true) {
            const where = f.create_group('where');
            where.create_attribute('LL_lon', bounds.west);
            where.create_attribute('UR_lon', bounds.east);
            where.create_attribute('LL_lat', bounds.south);
            where.create_attribute('UR_lat', bounds.north);
            where.create_attribute('xsize', width);
            where.create_attribute('ysize', height);
            where.create_attribute('projdef', '+proj=merc +lat_ts=0 +lon_0=0 +k=1 +x_0=0 +y_0=0 +ellps=WGS84');
        }

        f.create_group('dataset1');
        f.create_group('dataset1/what').create_attribute('product', 'MAX');
        f.create_group('dataset1/data1');
        const calibration = f.create_group('dataset1/data1/what');
        calibration.create_attribute('quantity', 'DBZH');
        calibration.create_attribute('gain', CALIBRATION.gain);
        calibration.create_attribute('offset', CALIBRATION.offset);
        calibration.create_attribute('nodata', CALIBRATION.nodata);
        calibration.create_attribute('undetect', CALIBRATION.undetect);

        f.create_dataset({ name: 'dataset1/data1/data', data: raw, shape: [height, width] });
    } finally {
        f.close();
    }
}

describe('container access', () => {
    let dir = '';

    afterEach(async () => {
        if (dir) await removeDir(dir);
        dir = '';
    });

    it('recognizes the HDF5 signature at the start or after a user block', () => {
        const signature = [0x89, 0x48, 0x44, 0x46, 0x0d, 0x0a, 0x1a, 0x0a];
        const atStart = new Uint8Array(64);
        atStart.set(signature, 0);
        const afterBlock = new Uint8Array(1024);
        afterBlock.set(signature, 512);

        expect(hasHdf5Signature(atStart)).toBe(true);
        expect(hasHdf5Signature(afterBlock)).toBe(true);
        expect(hasHdf5Signature(new TextEncoder().encode('definitely not hdf5'))).toBe(false);
    });

    it('reports files without an HDF5 signature as corrupt data', async () => {
        dir = await makeTempDir();
        const garbage = path.join(dir, 'T_PABV22_C_OKPR_20250913162500.hdf');
        await writeFile(garbage, 'garbage bytes');

        await expect(readOdimFile(garbage)).rejects.toBeInstanceOf(CorruptDataError);
        await expect(decodeRadarFile(garbage)).rejects.toBeInstanceOf(CorruptDataError);
    });

    it('decodes a composite written by the HDF5 library', async () => {
        dir = await makeTempDir();
        const file = path.join(dir, 'T_PABV22_C_OKPR_20250913162500.hdf');
        const raw = new Uint8Array(12).fill(rawFor(42));
        raw[0] = CALIBRATION.nodata;
        raw[1] = CALIBRATION.undetect;
        await writeOdimFile(file, raw);

        const grid = await decodeRadarFile(file, TEST_CONTRACT);

        expect(grid.product).toBe('TEST');
        expect([grid.width, grid.height]).toEqual([4, 3]);
        expect(grid.timestamp).toBe('2025-09-13T16:25:00.000Z');
        expect(grid.bounds).toEqual(TEST_CONTRACT.bounds);
        expect(grid.projection).toContain('+proj=merc');
        expect(Array.from(grid.missing)).toEqual([1, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
        expect(Array.from(grid.values.slice(2))).toEqual(Array(10).fill(42));
        expect(grid.clampedCells).toBe(0);
    });

    it('leaves a missing group in a real container to the decoder', async () => {
        dir = await makeTempDir();
        const file = path.join(dir, 'T_PABV22_C_OKPR_20250913162500.hdf');
        await writeOdimFile(file, new Uint8Array(12).fill(rawFor(42)), { withWhere: false });

        const source = await readOdimFile(file);

        expect(source.attributes('where')).toBeNull();
        expect(source.attributes('what')).toEqual({ object: 'COMP', date: '20250913', time: '162500' });
        expect(() => decodeComposite(source, TEST_CONTRACT)).toThrow(new FormatError('Missing group /where'));
    });

    it('keeps files it cannot read from disk retryable', async () => {
        dir = await makeTempDir();
        const error = await readOdimFile(path.join(dir, 'missing.hdf')).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(FilesystemError);
        expect(isQuarantineError(error)).toBe(false);
    });
});
