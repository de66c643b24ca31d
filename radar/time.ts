/**
 * Radar Composite CDN — Time Utilities
 */

/**
 * Milliseconds from `nowMs` until the next multiple of `intervalMs` (UTC epoch).
 * Returns `intervalMs` when `nowMs` sits exactly on a boundary.
 */
export function msUntilNextBoundary(nowMs: number, intervalMs: number): number {
    const next = (Math.floor(nowMs / intervalMs) + 1) * intervalMs;
    return next - nowMs;
}

/**
 * Build an ISO timestamp from compact UTC parts ("20250913", "162500").
 * Returns null for anything that is not a real calendar time.
 */
export function compactToIso(datePart: string, timePart: string): string | null {
    if (!/^\d{8}$/.test(datePart) || !/^\d{4}(\d{2})?$/.test(timePart)) return null;
    const seconds = timePart.length === 6 ? timePart.slice(4, 6) : '00';
    const iso = `${datePart.slice(0, 4)}-${datePart.slice(4, 6)}-${datePart.slice(6, 8)}T` +
        `${timePart.slice(0, 2)}:${timePart.slice(2, 4)}:${seconds}.000Z`;
    const parsed = new Date(iso);
    if (!Number.isFinite(parsed.getTime()) || parsed.toISOString() !== iso) return null;
    return iso;
}

/**
 * "2025-09-13T16:25:00.000Z" → "20250913_1625"
 */
export function timestampStub(iso: string): string {
    const d = new Date(iso);
    const pad = (n: number) => n.toString().padStart(2, '0');
    return `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
        `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}`;
}

/**
 * Whole minutes from `fromIso` to `toIso` (rounded).
 */
export function minutesBetween(fromIso: string, toIso: string): number {
    return Math.round((new Date(toIso).getTime() - new Date(fromIso).getTime()) / 60_000);
}
