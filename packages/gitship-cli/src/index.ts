/**
 * gitship CLI
 *
 * @module @gitship/cli
 */

export * from './cli';
export * from './cli/commands/flags';
