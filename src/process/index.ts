/**
 * @fileoverview Process module - running external commands and finding
 * the executables behind them.
 *
 * @module process
 */

export * from './types';
export * from './cancellation';
export * from './invocation';
export * from './outputSplitter';
export * from './result';
export * from './processHelpers';
export * from './processRunner';
export * from './executableLocator';
