/**
 * Radar Composite CDN — Raster Rendering
 *
 * Flat color bands, no interpolation. The doubled variant replicates every
 * grid cell into an exact scale×scale block, so band edges stay hard.
 */

import { PNG } from 'pngjs';
import { RenderError, errorMessage } from './errors';
import { colorForValue } from './palette';
import type { ColorBandTable, ColormapVariant, GeoBounds, ReflectivityGrid, RgbaRaster } from './types';

export function renderRaster(grid: ReflectivityGrid, table: ColorBandTable, scale = 1): RgbaRaster {
    if (!Number.isInteger(scale) || scale < 1) {
        throw new RenderError(`Invalid scale ${scale}`);
    }
    const outWidth = grid.width * scale;
    const outHeight = grid.height * scale;
    const data = new Uint8Array(outWidth * outHeight * 4);

    for (let row = 0; row < grid.height; row++) {
        for (let col = 0; col < grid.width; col++) {
            const cell = row * grid.width + col;
            const color = colorForValue(grid.values[cell], grid.missing[cell] === 1, table);
            if (color[3] === 0) continue;

            for (let dy = 0; dy < scale; dy++) {
                const rowStart = ((row * scale + dy) * outWidth + col * scale) * 4;
                for (let dx = 0; dx < scale; dx++) {
                    data.set(color, rowStart + dx * 4);
                }
            }
        }
    }

    return { width: outWidth, height: outHeight, data };
}

/**
 * Encode an RGBA raster as a truecolor-with-alpha PNG.
 */
export function encodePng(raster: RgbaRaster): Buffer {
    try {
        const png = new PNG({ width: raster.width, height: raster.height });
        png.data = Buffer.from(raster.data.buffer, raster.data.byteOffset, raster.data.byteLength);
        return PNG.sync.write(png, { colorType: 6 });
    } catch (error) {
        throw new RenderError(`PNG encoding failed: ${errorMessage(error)}`, { cause: error });
    }
}

export interface RenderedVariant {
    scale: number;
    variant: ColormapVariant;
    png: Buffer;
}

/**
 * Every (scale, colormap) combination from one decoded grid.
 */
export function renderVariants(
    grid: ReflectivityGrid,
    scales: readonly number[],
    tables: readonly ColorBandTable[]
): RenderedVariant[] {
    const out: RenderedVariant[] = [];
    for (const table of tables) {
        for (const scale of scales) {
            out.push({ scale, variant: table.variant, png: encodePng(renderRaster(grid, table, scale)) });
        }
    }
    return out;
}

// =============================================================================
// Geographic Alignment
// =============================================================================

/**
 * Corner coordinates in MapLibre ImageSource order:
 * [[W, N], [E, N], [E, S], [W, S]]
 */
export function imageCorners(bounds: GeoBounds): [[number, number], [number, number], [number, number], [number, number]] {
    return [
        [bounds.west, bounds.north],
        [bounds.east, bounds.north],
        [bounds.east, bounds.south],
        [bounds.west, bounds.south]
    ];
}

/**
 * North-west corner of a grid cell, linear in both axes.
 */
export function cellToLonLat(grid: Pick<ReflectivityGrid, 'width' | 'height' | 'bounds'>, col: number, row: number): [number, number] {
    const { west, east, south, north } = grid.bounds;
    return [
        west + (col / grid.width) * (east - west),
        north - (row / grid.height) * (north - south)
    ];
}
