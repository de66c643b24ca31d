import { describe, it, expect } from 'vitest';
import { TRANSPARENT, COLOR_TABLES, bandIndex, colorForValue, parseHexColor } from '../palette';

const standard = COLOR_TABLES.standard;

describe('color bands', () => {
    it('renders values below 4 dBZ transparent', () => {
        expect(bandIndex(3.99, standard)).toBe(-1);
        expect(bandIndex(-32, standard)).toBe(-1);
        expect(colorForValue(3.99, false, standard)).toEqual(TRANSPARENT);
    });

    it('puts boundary values in the higher band', () => {
        expect(bandIndex(4, standard)).toBe(0);
        expect(bandIndex(7.99, standard)).toBe(0);
        expect(bandIndex(8, standard)).toBe(1);
    });

    it('maps 42 dBZ to #FBB200 in the standard table', () => {
        expect(bandIndex(42, standard)).toBe(9);
        expect(colorForValue(42, false, standard)).toEqual([251, 178, 0, 255]);
    });

    it('keeps the last band open-ended', () => {
        expect(bandIndex(61.5, standard)).toBe(14);
        expect(bandIndex(500, standard)).toBe(14);
    });

    it('treats missing and non-finite values as transparent', () => {
        expect(colorForValue(50, true, standard)).toEqual(TRANSPARENT);
        expect(bandIndex(Number.NaN, standard)).toBe(-1);
        expect(bandIndex(Number.POSITIVE_INFINITY, standard)).toBe(-1);
    });

    it('shares boundaries between both tables', () => {
        const contrast = COLOR_TABLES.contrast;
        expect(contrast.colors).toHaveLength(standard.colors.length);
        expect([contrast.threshold, contrast.bandWidth]).toEqual([standard.threshold, standard.bandWidth]);
        for (const value of [3.9, 4, 7.9, 8, 59.9, 60, 95]) {
            expect(bandIndex(value, contrast)).toBe(bandIndex(value, standard));
        }
    });

    it('uses only opaque colors', () => {
        for (const table of Object.values(COLOR_TABLES)) {
            expect(table.colors.every((c) => c[3] === 255)).toBe(true);
        }
    });

    it('parses hex colors', () => {
        expect(parseHexColor('#FBB200')).toEqual([251, 178, 0, 255]);
        expect(parseHexColor('00a400')).toEqual([0, 164, 0, 255]);
        expect(() => parseHexColor('#FFF')).toThrow('Invalid hex color');
    });
});
