/**
 * Vitest Global Test Setup
 */

// Ensure fetch is available (Node 18+ has native fetch)
if (typeof globalThis.fetch === 'undefined') {
    throw new Error('fetch is not available. Ensure Node 18+ is used.');
}
