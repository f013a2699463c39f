/**
 * Root entrypoint: re-exports the client, transports, resources and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';

export * from './error/index.js';
