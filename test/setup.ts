/**
 * Vitest Global Test Setup
 *
 * - Ensures fetch is available (Node 18+ native); tests stub it per case
 * - Keeps debug logging off unless explicitly requested
 * - Restores timers, mocks and stubbed globals after every test
 */

import { afterEach, vi } from 'vitest';

if (typeof globalThis.fetch === 'undefined') {
    throw new Error('fetch is not available. Ensure Node 18+ is used.');
}

process.env.RADAR_DEBUG ??= '0';

afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
});
