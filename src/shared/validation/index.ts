/**
 * Validation Module
 *
 * Zod schemas and validation helpers for input files and persisted runs.
 */

export * from './validator';
export * from './schemas';
