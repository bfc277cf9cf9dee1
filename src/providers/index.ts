/**
 * Providers Module
 *
 * Feature extractors behind interfaces so a stage service can be given any
 * implementation (tests pass in-memory fakes).
 */

export * from './interfaces/index.js';
export * from './implementations/index.js';
