/**
 * Radar Composite CDN — Color Band Tables
 *
 * Both tables share boundaries: band i covers [4 + 4i, 8 + 4i) dBZ and the
 * last band is open-ended. Values below 4 dBZ are transparent.
 */

import type { ColorBandTable, ColormapVariant, Rgba } from './types';

export const BAND_THRESHOLD_DBZ = 4;
export const BAND_WIDTH_DBZ = 4;

export const TRANSPARENT: Rgba = [0, 0, 0, 0];

const STANDARD_HEX = [
    '#390071', '#3001A9', '#0200FB', '#076CBC', '#00A400',
    '#00BB03', '#36D700', '#9CDD07', '#E0DC01', '#FBB200',
    '#F78600', '#FF5400', '#FE0100', '#A40003', '#FCFCFC'
] as const;

const CONTRAST_HEX = [
    '#00E5FF', '#00B8D4', '#0091EA', '#2962FF', '#00C853',
    '#64DD17', '#AEEA00', '#FFFF00', '#FFD600', '#FFAB00',
    '#FF6D00', '#FF1744', '#D50000', '#AA00FF', '#FFFFFF'
] as const;

/**
 * "#FBB200" → [251, 178, 0, 255]
 */
export function parseHexColor(hex: string): Rgba {
    const match = /^#?([0-9a-f]{6})$/i.exec(hex);
    if (!match) throw new Error(`Invalid hex color: ${hex}`);
    const n = parseInt(match[1], 16);
    return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff, 255];
}

function buildTable(variant: ColormapVariant, hexes: readonly string[]): ColorBandTable {
    return Object.freeze({
        variant,
        threshold: BAND_THRESHOLD_DBZ,
        bandWidth: BAND_WIDTH_DBZ,
        colors: Object.freeze(hexes.map(parseHexColor))
    });
}

export const COLOR_TABLES: Readonly<Record<ColormapVariant, ColorBandTable>> = Object.freeze({
    standard: buildTable('standard', STANDARD_HEX),
    contrast: buildTable('contrast', CONTRAST_HEX)
});

/**
 * Band index for a dBZ value, or -1 when it renders transparent.
 * Boundary values belong to the higher band.
 */
export function bandIndex(value: number, table: ColorBandTable): number {
    if (!Number.isFinite(value) || value < table.threshold) return -1;
    const index = Math.floor((value - table.threshold) / table.bandWidth);
    return Math.min(index, table.colors.length - 1);
}

export function colorForValue(value: number, missing: boolean, table: ColorBandTable): Rgba {
    if (missing) return TRANSPARENT;
    const index = bandIndex(value, table);
    return index < 0 ? TRANSPARENT : table.colors[index];
}
