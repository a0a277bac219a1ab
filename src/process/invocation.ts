/**
 * @fileoverview Construction and validation of {@link CommandInvocation} values.
 *
 * @module process/invocation
 */

import { InvalidInvocationError } from '../core/errors';
import type { CommandInvocation } from './types';

export interface InvocationOptions {
  environment?: Record<string, string>;
  workingDirectory?: string;
  timeoutMs?: number;
}

/**
 * Throw {@link InvalidInvocationError} unless the invocation can be spawned.
 */
export function validateInvocation(invocation: CommandInvocation): void {
  if (typeof invocation.executable !== 'string' || invocation.executable.trim().length === 0) {
    throw new InvalidInvocationError('Executable must be a non-empty string');
  }
  if (!Array.isArray(invocation.args)) {
    throw new InvalidInvocationError(`Arguments of '${invocation.executable}' must be an array`);
  }
  invocation.args.forEach((arg, index) => {
    if (typeof arg !== 'string') {
      throw new InvalidInvocationError(`Argument ${index} of '${invocation.executable}' is not a string`);
    }
    if (arg.includes('\0')) {
      throw new InvalidInvocationError(`Argument ${index} of '${invocation.executable}' contains a NUL byte`);
    }
  });
  for (const [name, value] of Object.entries(invocation.environment)) {
    if (name.length === 0 || name.includes('=') || typeof value !== 'string') {
      throw new InvalidInvocationError(`Invalid environment entry '${name}' for '${invocation.executable}'`);
    }
  }
  if (!Number.isFinite(invocation.timeoutMs) || invocation.timeoutMs < 0) {
    throw new InvalidInvocationError(`Timeout of '${invocation.executable}' must be a non-negative number`);
  }
  if (invocation.workingDirectory !== undefined && invocation.workingDirectory.length === 0) {
    throw new InvalidInvocationError(`Working directory of '${invocation.executable}' must not be empty`);
  }
}

/**
 * Build a frozen, validated invocation.
 *
 * @example
 * ```typescript
 * const inv = createInvocation('git', ['status', '--porcelain=v1'], {
 *   workingDirectory: '/work/repo',
 *   timeoutMs: 5000,
 * });
 * ```
 */
export function createInvocation(
  executable: string,
  args: readonly string[] = [],
  options: InvocationOptions = {},
): CommandInvocation {
  const invocation: CommandInvocation = {
    executable,
    args: Object.freeze([...args]),
    environment: Object.freeze({ ...options.environment }),
    workingDirectory: options.workingDirectory,
    timeoutMs: options.timeoutMs ?? 0,
  };
  validateInvocation(invocation);
  return Object.freeze(invocation);
}

/**
 * Render an invocation as a single line for logs.
 */
export function describeInvocation(invocation: CommandInvocation): string {
  const quote = (arg: string): string => (/[\s"']/.test(arg) || arg.length === 0 ? JSON.stringify(arg) : arg);
  return [invocation.executable, ...invocation.args].map(quote).join(' ');
}
