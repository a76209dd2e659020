/**
 * Municipal Forecast Pipeline — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types and errors
export * from './types';
export * from './errors';

// Cleaning stages
export * from './table';
export * from './translate';
export * from './convert';
export * from './schema';
export * from './status';
export * from './outliers';
export * from './dedupe';

// Orchestrator
export * from './clean';

// Reporting
export * from './summary';
