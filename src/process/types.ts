/**
 * @fileoverview Value types shared by the process layer.
 *
 * @module process/types
 */

import type { CancellationToken } from './cancellation';

/**
 * How captured output is split before it reaches the result and callbacks.
 *
 * - `lines`: split on `\n` and `\r`, empty lines dropped
 * - `records`: split on NUL, empty records dropped (for `-z` output)
 * - `whole`: one item per stream holding everything the stream produced
 */
export type CaptureMode = 'lines' | 'records' | 'whole';

export type OutputStream = 'stdout' | 'stderr';

/**
 * A fully described external command. Frozen by {@link createInvocation}.
 */
export interface CommandInvocation {
  readonly executable: string;
  readonly args: readonly string[];
  /** Overlay applied on top of the runner's base environment. */
  readonly environment: Readonly<Record<string, string>>;
  readonly workingDirectory?: string;
  /** Milliseconds before the process tree is terminated; 0 disables the limit. */
  readonly timeoutMs: number;
}

/**
 * Outcome of one {@link CommandInvocation}.
 *
 * At most one of `timedOut` and `cancelled` is true; when neither is, the
 * process exited on its own (or never started, see `spawnError`).
 */
export interface ExecutionResult {
  /** Exit code, or null when the process was ended by a signal or never started. */
  readonly exitCode: number | null;
  readonly stdout: readonly string[];
  readonly stderr: readonly string[];
  readonly timedOut: boolean;
  readonly cancelled: boolean;
  readonly durationMs: number;
  /** Set when the executable could not be started. */
  readonly spawnError?: string;
}

/**
 * Per-call options for {@link ProcessRunner.run}.
 */
export interface RunOptions {
  cancellation?: CancellationToken;
  /** Defaults to `lines`. */
  captureMode?: CaptureMode;
  /** Deliver stderr into stdout, in arrival order. */
  mergeOutput?: boolean;
  onStdout?: (item: string) => void;
  onStderr?: (item: string) => void;
  /** Called once the child process exists. */
  onSpawn?: (pid: number) => void;
}
