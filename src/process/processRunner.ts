/**
 * @fileoverview Process runner - spawn, capture, time out, cancel.
 *
 * {@link ProcessRunner.run} always resolves with an {@link ExecutionResult}.
 * Non-zero exits, timeouts, cancellation and executables that fail to start
 * are reported on the result; only an invalid invocation throws.
 *
 * Output is decoded and split while it streams, so callers see lines as
 * they arrive and a killed process still yields every complete line read
 * before termination.
 *
 * @module process/processRunner
 */

import type { SpawnOptions } from 'child_process';
import { Readable } from 'stream';
import type { ChildProcessLike, IProcessSpawner } from '../interfaces/IProcessSpawner';
import { DefaultProcessSpawner } from '../interfaces/IProcessSpawner';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import type { Disposable } from './cancellation';
import { describeInvocation, validateInvocation } from './invocation';
import { OutputSplitter } from './outputSplitter';
import { ProcessTreeTerminator, type ProcessTerminator } from './processHelpers';
import type { CommandInvocation, ExecutionResult, RunOptions } from './types';

/** Delay between the polite and the forced termination signal. */
export const DEFAULT_KILL_GRACE_MS = 5000;

/** How long output may stay open after the process itself has exited. */
export const DEFAULT_EXIT_DRAIN_MS = 2000;

export interface ProcessRunnerOptions {
  spawner?: IProcessSpawner;
  terminator?: ProcessTerminator;
  logger?: ILogger;
  killGraceMs?: number;
  /**
   * Wait after `exit` for the output pipes to close. A background
   * descendant can hold them open long after the process is gone.
   */
  exitDrainMs?: number;
  platform?: NodeJS.Platform;
  /** Environment every invocation's overlay is applied to (default: process.env). */
  baseEnvironment?: Record<string, string | undefined>;
}

type Outcome = 'exited' | 'timedOut' | 'cancelled';

/** Stop reading pipes that a background descendant keeps open. */
function releaseOutput(child: ChildProcessLike): void {
  for (const stream of [child.stdout, child.stderr]) {
    if (stream instanceof Readable) {
      stream.destroy();
    }
  }
}

/**
 * Runs external commands.
 *
 * @example
 * ```typescript
 * const runner = new ProcessRunner();
 * const result = await runner.run(createInvocation('git', ['--version'], { timeoutMs: 5000 }));
 * if (succeeded(result)) {
 *   console.log(result.stdout[0]);
 * }
 * ```
 */
export class ProcessRunner {
  private readonly spawner: IProcessSpawner;
  private readonly terminator: ProcessTerminator;
  private readonly log: ILogger;
  private readonly killGraceMs: number;
  private readonly exitDrainMs: number;
  private readonly platform: NodeJS.Platform;
  private readonly baseEnvironment: Record<string, string | undefined>;

  constructor(options: ProcessRunnerOptions = {}) {
    this.spawner = options.spawner ?? new DefaultProcessSpawner();
    this.platform = options.platform ?? process.platform;
    this.log = options.logger ?? Logger.for('process');
    this.terminator = options.terminator ?? new ProcessTreeTerminator(this.spawner, this.platform, this.log);
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.exitDrainMs = options.exitDrainMs ?? DEFAULT_EXIT_DRAIN_MS;
    this.baseEnvironment = options.baseEnvironment ?? process.env;
  }

  /**
   * Run an invocation to completion.
   *
   * @throws InvalidInvocationError synchronously when the invocation is malformed
   */
  run(invocation: CommandInvocation, options: RunOptions = {}): Promise<ExecutionResult> {
    validateInvocation(invocation);

    const startedAt = Date.now();
    const description = describeInvocation(invocation);

    if (options.cancellation?.isCancellationRequested) {
      this.log.debug(`Not starting cancelled command: ${description}`);
      return Promise.resolve({
        exitCode: null,
        stdout: [],
        stderr: [],
        timedOut: false,
        cancelled: true,
        durationMs: 0,
      });
    }

    return new Promise<ExecutionResult>((resolve) => {
      const stdout: string[] = [];
      const stderr: string[] = [];
      const mode = options.captureMode ?? 'lines';

      const deliverStdout = (item: string): void => {
        stdout.push(item);
        this.safeCallback(options.onStdout, item);
      };
      const deliverStderr = (item: string): void => {
        if (options.mergeOutput) {
          deliverStdout(item);
          return;
        }
        stderr.push(item);
        this.safeCallback(options.onStderr, item);
      };

      const stdoutSplitter = new OutputSplitter(mode, deliverStdout);
      // Diagnostics are line oriented even when stdout holds NUL records.
      const stderrSplitter = new OutputSplitter(mode === 'whole' ? 'whole' : 'lines', deliverStderr);

      let outcome: Outcome = 'exited';
      let settled = false;
      let spawnError: string | undefined;
      let timeoutTimer: NodeJS.Timeout | undefined;
      let graceTimer: NodeJS.Timeout | undefined;
      let drainTimer: NodeJS.Timeout | undefined;
      let cancellation: Disposable | undefined;
      let child: ChildProcessLike | undefined;

      const finish = (exitCode: number | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timeoutTimer) { clearTimeout(timeoutTimer); }
        if (graceTimer) { clearTimeout(graceTimer); }
        if (drainTimer) { clearTimeout(drainTimer); }
        cancellation?.dispose();
        stdoutSplitter.end();
        stderrSplitter.end();

        const result: ExecutionResult = {
          exitCode: outcome === 'exited' ? exitCode : null,
          stdout,
          stderr,
          timedOut: outcome === 'timedOut',
          cancelled: outcome === 'cancelled',
          durationMs: Date.now() - startedAt,
          ...(spawnError !== undefined ? { spawnError } : {}),
        };
        this.log.debug(`Finished: ${description}`, {
          exitCode: result.exitCode,
          timedOut: result.timedOut,
          cancelled: result.cancelled,
          durationMs: result.durationMs,
        });
        resolve(result);
      };

      const terminate = (reason: Exclude<Outcome, 'exited'>): void => {
        // First of timeout and cancellation wins; the flags stay exclusive.
        if (settled || outcome !== 'exited' || !child) {
          return;
        }
        outcome = reason;
        const target = child;
        this.log.info(`${reason === 'timedOut' ? 'Timed out' : 'Cancelled'}, terminating: ${description}`);
        this.requestTermination(target, false);
        graceTimer = setTimeout(() => this.requestTermination(target, true), this.killGraceMs);
      };

      try {
        child = this.spawner.spawn(invocation.executable, invocation.args, this.spawnOptions(invocation));
      } catch (error) {
        spawnError = error instanceof Error ? error.message : String(error);
        stderr.push(spawnError);
        finish(null);
        return;
      }

      child.stdout?.on('data', (chunk: Buffer | string) => stdoutSplitter.push(chunk));
      child.stderr?.on('data', (chunk: Buffer | string) => stderrSplitter.push(chunk));

      child.on('error', (error) => {
        if (settled) {
          return;
        }
        if (child?.pid === undefined) {
          spawnError = error.message;
          stderr.push(error.message);
          this.log.warn(`Failed to start: ${description}`, error);
          finish(null);
          return;
        }
        this.log.warn(`Process error: ${description}`, error);
      });

      child.on('close', (code) => finish(code));

      child.on('exit', (code) => {
        if (settled || drainTimer) {
          return;
        }
        const exited = child;
        drainTimer = setTimeout(() => {
          this.log.debug(`Output still open ${this.exitDrainMs}ms after exit, detaching: ${description}`);
          if (exited) {
            releaseOutput(exited);
          }
          finish(code);
        }, this.exitDrainMs);
      });

      if (child.pid !== undefined) {
        this.log.debug(`Spawned pid ${child.pid}: ${description}`);
        this.safeCallback(options.onSpawn, child.pid);
      }

      if (invocation.timeoutMs > 0) {
        timeoutTimer = setTimeout(() => terminate('timedOut'), invocation.timeoutMs);
      }
      if (options.cancellation) {
        cancellation = options.cancellation.onCancellationRequested(() => terminate('cancelled'));
      }
    });
  }

  private spawnOptions(invocation: CommandInvocation): SpawnOptions {
    return {
      cwd: invocation.workingDirectory,
      env: { ...this.baseEnvironment, ...invocation.environment },
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
      shell: false,
      // Own process group on POSIX so the whole tree can be signalled.
      detached: this.platform !== 'win32',
    };
  }

  private requestTermination(child: ChildProcessLike, force: boolean): void {
    this.terminator.terminate(child, force).catch((error: unknown) => {
      this.log.warn(`Termination (${force ? 'forced' : 'polite'}) failed for pid ${child.pid ?? '?'}`, error);
    });
  }

  private safeCallback<T>(callback: ((value: T) => void) | undefined, value: T): void {
    if (!callback) {
      return;
    }
    try {
      callback(value);
    } catch (error) {
      this.log.error('Output callback threw', error);
    }
  }
}
