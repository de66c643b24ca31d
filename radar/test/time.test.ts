import { describe, it, expect } from 'vitest';
import { compactToIso, minutesBetween, msUntilNextBoundary, timestampStub } from '../time';

describe('time utilities', () => {
    it('computes the delay to the next interval boundary', () => {
        expect(msUntilNextBoundary(0, 300_000)).toBe(300_000);
        expect(msUntilNextBoundary(299_000, 300_000)).toBe(1_000);
        expect(msUntilNextBoundary(300_001, 300_000)).toBe(299_999);
    });

    it('converts compact UTC parts to ISO', () => {
        expect(compactToIso('20250913', '162500')).toBe('2025-09-13T16:25:00.000Z');
        expect(compactToIso('20250913', '1625')).toBe('2025-09-13T16:25:00.000Z');
        expect(compactToIso('20250230', '1200')).toBeNull();
        expect(compactToIso('2025091', '1200')).toBeNull();
    });

    it('formats timestamp stubs and minute differences', () => {
        expect(timestampStub('2025-09-13T16:25:00.000Z')).toBe('20250913_1625');
        expect(minutesBetween('2025-09-28T22:25:00.000Z', '2025-09-28T23:25:00.000Z')).toBe(60);
        expect(minutesBetween('2025-09-28T22:25:00.000Z', '2025-09-28T22:15:00.000Z')).toBe(-10);
    });
});
