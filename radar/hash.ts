/**
 * Radar Composite CDN — BLAKE3 Hashing Utilities
 *
 * Fetched source files are fingerprinted in the manifest; a local copy is
 * reused only while it still matches its fingerprint.
 */

import { blake3 } from '@noble/hashes/blake3.js';

/**
 * Compute BLAKE3 hash and return as lowercase hex string.
 */
export function hashHex(data: Uint8Array): string {
    return toHex(blake3(data));
}

/**
 * Convert Uint8Array to lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map((b) => b.toString(16).padStart(2, '0'))
        .join('');
}
