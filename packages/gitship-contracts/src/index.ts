/**
 * gitship contracts
 *
 * Zod schemas, inferred types and configuration shared by core and CLI.
 *
 * @module @gitship/contracts
 */

export * from './schema';
export * from './types';
export * from './env';
