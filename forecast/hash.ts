/**
 * Municipal Forecast Pipeline — BLAKE3 Hashing Utilities
 *
 * Row identity for deduplication is the BLAKE3 hash of the row's canonical bytes.
 */

import { blake3 } from '@noble/hashes/blake3';

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
