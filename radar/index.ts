/**
 * Radar Composite CDN — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types
export * from './types';
export * from './errors';

// Configuration & logging
export * from './config';
export * from './log';

// Decoding & rendering
export * from './odim';
export * from './palette';
export * from './render';

// Naming, storage, manifest
export * from './naming';
export * from './storage';
export * from './manifest';
export * from './hash';
export * from './time';

// Ingest
export * from './ingest/fetcher';
export * from './ingest/pool';
export * from './ingest/locks';
export * from './ingest/render-job';
export * from './ingest/pipeline';
export * from './ingest/forecast';
export * from './ingest/scheduler';

// Service
export * from './service';
