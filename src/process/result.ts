/**
 * @fileoverview Helpers for reading {@link ExecutionResult} values.
 *
 * @module process/result
 */

import type { ExecutionResult } from './types';

/**
 * True when the process ran to completion with one of the accepted codes.
 */
export function succeeded(result: ExecutionResult, successExitCodes: readonly number[] = [0]): boolean {
  return !result.timedOut
    && !result.cancelled
    && result.spawnError === undefined
    && result.exitCode !== null
    && successExitCodes.includes(result.exitCode);
}

/**
 * First stdout item, trimmed, or undefined when there is none.
 */
export function firstStdoutLine(result: ExecutionResult): string | undefined {
  const first = result.stdout[0];
  return first === undefined ? undefined : first.trim();
}

/**
 * All stdout items joined with newlines.
 */
export function allStdout(result: ExecutionResult): string {
  return result.stdout.join('\n');
}
