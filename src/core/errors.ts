/**
 * @fileoverview Error types raised by the toolwright services.
 *
 * Ordinary outcomes of running a tool (not installed, timed out, cancelled,
 * non-zero exit) are reported as values. The classes here cover programming
 * errors, bad configuration, and operations whose contract requires the
 * command to succeed.
 *
 * @module core/errors
 */

import type { ExecutionResult } from '../process/types';

/**
 * Base class for every error this package throws.
 */
export class ToolwrightError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A command invocation was constructed with invalid values.
 */
export class InvalidInvocationError extends ToolwrightError {}

/**
 * The configuration file could not be read or failed schema validation.
 */
export class ConfigurationError extends ToolwrightError {
  constructor(message: string, readonly details: readonly string[] = []) {
    super(details.length > 0 ? `${message}\n  - ${details.join('\n  - ')}` : message);
  }
}

/**
 * A file change lies outside the repository root it was reported against.
 */
export class ChangePathOutsideRepositoryError extends ToolwrightError {
  constructor(readonly changePath: string, readonly repositoryRoot: string) {
    super(`Change path '${changePath}' is not inside repository '${repositoryRoot}'`);
  }
}

/**
 * A git command that had to succeed did not.
 */
export class GitCommandError extends ToolwrightError {
  constructor(readonly command: string, readonly result: ExecutionResult) {
    super(`git ${command} ${describeFailure(result)}`);
  }
}

/**
 * Loading a tool model (repository status, build model) failed.
 */
export class ModelLoadError extends ToolwrightError {
  constructor(message: string, readonly result?: ExecutionResult) {
    super(result ? `${message}: ${describeFailure(result)}` : message);
  }
}

/**
 * An operation referenced a task identifier the engine never issued.
 */
export class UnknownTaskError extends ToolwrightError {
  constructor(readonly taskId: string) {
    super(`Unknown task: ${taskId}`);
  }
}

/**
 * Summarize why a result is not a success, for error messages.
 */
export function describeFailure(result: ExecutionResult): string {
  if (result.timedOut) {
    return `timed out after ${result.durationMs}ms`;
  }
  if (result.cancelled) {
    return 'was cancelled';
  }
  if (result.spawnError !== undefined) {
    return `could not be started: ${result.spawnError}`;
  }
  const detail = result.stderr.find(line => line.trim().length > 0);
  return detail ? `failed with exit code ${result.exitCode}: ${detail}` : `failed with exit code ${result.exitCode}`;
}
