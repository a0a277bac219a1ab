/**
 * @fileoverview Task execution engine.
 *
 * Owns the lifecycle of every submitted invocation: assigns the identifier,
 * drives the state machine in {@link VALID_TRANSITIONS}, and publishes
 * status, progress, output and error events. It also owns the tool's model:
 * refreshes are single-flight and the last good model is cached.
 *
 * ## Event order per task
 *
 * ```
 * status(queued) → status(starting) → status(running)
 *   → output* / progress*  (in the order lines arrive)
 *   → status(completed)
 *   | error → status(failed)
 *   | status(cancelled)
 * ```
 *
 * @module tasks/taskExecutionEngine
 */

import { v4 as uuidv4 } from 'uuid';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import { ModelLoadError, ToolwrightError, UnknownTaskError } from '../core/errors';
import { CancellationTokenSource, type CancellationToken } from '../process/cancellation';
import { validateInvocation } from '../process/invocation';
import type { ProcessRunner } from '../process/processRunner';
import { succeeded } from '../process/result';
import type { ExecutionResult, OutputStream } from '../process/types';
import { ListenerRegistry } from './listenerRegistry';
import { ModelCache } from './modelCache';
import { SingleFlight } from './singleFlight';
import { TaskEventBus, type SubscribeOptions } from './taskEvents';
import {
  isTerminalState,
  isValidTransition,
  type ModelListener,
  type ProgressMarker,
  type TaskEvent,
  type TaskEventListener,
  type TaskHandle,
  type TaskRequest,
  type TaskResult,
  type TaskState,
  type TerminalTaskState,
} from './types';

/** Default number of submitted requests remembered for re-running. */
export const DEFAULT_RECENT_REQUEST_LIMIT = 10;

/** Default number of finished tasks whose state stays queryable. */
export const DEFAULT_FINISHED_TASK_LIMIT = 100;

/** Default limit for one model load. */
export const DEFAULT_MODEL_TIMEOUT_MS = 3 * 60 * 1000;

/**
 * Loads the tool's model. The token is cancelled when the load times out
 * or the engine is disposed.
 */
export type ModelLoader<TModel> = (token: CancellationToken) => Promise<TModel>;

export interface TaskExecutionEngineOptions<TModel> {
  runner: ProcessRunner;
  loadModel?: ModelLoader<TModel>;
  modelTimeoutMs?: number;
  recentRequestLimit?: number;
  /** Finished tasks kept for {@link TaskExecutionEngine.getState}; older ones are forgotten. */
  finishedTaskLimit?: number;
  logger?: ILogger;
}

interface TaskRecord {
  readonly id: string;
  readonly request: TaskRequest;
  state: TaskState;
  readonly cancellation: CancellationTokenSource;
  lastFraction: number;
  readonly completion: Promise<TaskResult>;
  resolve(result: TaskResult): void;
}

function messageKey(state: TaskState): string {
  return `task.${state}`;
}

function clampFraction(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

function failureMessage(result: ExecutionResult): string {
  if (result.spawnError !== undefined) {
    return `Failed to start: ${result.spawnError}`;
  }
  if (result.timedOut) {
    return `Timed out after ${result.durationMs}ms`;
  }
  const lastError = [...result.stderr].reverse().find(line => line.trim().length > 0);
  return lastError
    ? `Exited with code ${result.exitCode}: ${lastError.trim()}`
    : `Exited with code ${result.exitCode}`;
}

/** Call the loader; a synchronous throw becomes a rejected load. */
function startLoad<TModel>(loader: ModelLoader<TModel>, token: CancellationToken): Promise<TModel> {
  try {
    return loader(token);
  } catch (error) {
    return Promise.reject(error);
  }
}

/**
 * Runs tasks for one external tool and keeps that tool's model.
 *
 * @example
 * ```typescript
 * const engine = new TaskExecutionEngine<BuildModel>({ runner, loadModel: token => loadBuildModel(token) });
 * engine.subscribe(event => console.log(event.kind, event.state));
 * const handle = engine.submit({ title: 'build', invocation });
 * const result = await handle.completion;
 * ```
 */
export class TaskExecutionEngine<TModel> {
  private readonly runner: ProcessRunner;
  private readonly log: ILogger;
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly events: TaskEventBus;
  private readonly modelListeners: ListenerRegistry<ModelListener<TModel>>;
  private readonly cache = new ModelCache<TModel>();
  private readonly refresh: SingleFlight<TModel>;
  private readonly loadModel: ModelLoader<TModel> | undefined;
  private readonly modelTimeoutMs: number;
  private readonly recentRequestLimit: number;
  private readonly recent: TaskRequest[] = [];
  private readonly finishedTaskLimit: number;
  private readonly finished: string[] = [];
  private readonly modelLoads = new Set<CancellationTokenSource>();
  private disposed = false;

  constructor(options: TaskExecutionEngineOptions<TModel>) {
    this.runner = options.runner;
    this.log = options.logger ?? Logger.for('tasks');
    this.loadModel = options.loadModel;
    this.modelTimeoutMs = options.modelTimeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    this.recentRequestLimit = options.recentRequestLimit ?? DEFAULT_RECENT_REQUEST_LIMIT;
    this.finishedTaskLimit = Math.max(0, options.finishedTaskLimit ?? DEFAULT_FINISHED_TASK_LIMIT);
    this.events = new TaskEventBus(this.log);
    this.modelListeners = new ListenerRegistry<ModelListener<TModel>>(this.log);
    this.refresh = new SingleFlight(() => this.performRefresh());
  }

  // ─── Submission ──────────────────────────────────────────────────────────

  /**
   * Queue a task and return immediately. Execution starts on a later turn
   * of the event loop.
   *
   * @throws InvalidInvocationError when the request's invocation is malformed
   */
  submit(request: TaskRequest): TaskHandle {
    if (this.disposed) {
      throw new ToolwrightError('Task engine has been disposed');
    }
    validateInvocation(request.invocation);

    let resolve: (result: TaskResult) => void = () => undefined;
    const completion = new Promise<TaskResult>((r) => { resolve = r; });
    const record: TaskRecord = {
      id: uuidv4(),
      request,
      state: 'queued',
      cancellation: new CancellationTokenSource(),
      lastFraction: 0,
      completion,
      resolve,
    };
    this.tasks.set(record.id, record);
    this.remember(request);

    this.log.debug(`Queued task ${record.id}: ${request.title}`);
    this.emitStatus(record);

    setImmediate(() => {
      this.dispatch(record).catch((error: unknown) => {
        this.log.error(`Task ${record.id} crashed`, error);
        this.finish(record, 'failed', undefined, error instanceof Error ? error.message : String(error));
      });
    });

    return this.handleFor(record);
  }

  private async dispatch(record: TaskRecord): Promise<void> {
    if (record.state !== 'queued') {
      return;
    }
    this.transition(record, 'starting');

    const { request } = record;
    const result = await this.runner.run(request.invocation, {
      cancellation: record.cancellation.token,
      captureMode: request.captureMode ?? 'lines',
      mergeOutput: request.mergeOutput,
      onSpawn: () => { this.transition(record, 'running'); },
      onStdout: (line) => this.handleOutput(record, 'stdout', line),
      onStderr: (line) => this.handleOutput(record, 'stderr', line),
    });

    if (result.cancelled) {
      this.finish(record, 'cancelled', result);
      return;
    }
    if (succeeded(result, request.successExitCodes ?? [0])) {
      if (record.state === 'starting') {
        this.transition(record, 'running');
      }
      this.finish(record, 'completed', result);
      return;
    }
    this.finish(record, 'failed', result, failureMessage(result));
  }

  private handleOutput(record: TaskRecord, stream: OutputStream, text: string): void {
    this.publish({ kind: 'output', taskId: record.id, state: record.state, timestamp: Date.now(), stream, text });

    const parser = record.request.progressParser;
    if (!parser) {
      return;
    }
    let marker: ProgressMarker | undefined;
    try {
      marker = parser(text, stream);
    } catch (error) {
      this.log.warn(`Progress parser threw for task ${record.id}`, error);
      return;
    }
    if (!marker) {
      return;
    }

    // Progress never moves backwards within a task.
    const reported = marker.fraction === undefined ? record.lastFraction : clampFraction(marker.fraction);
    const fraction = Math.max(record.lastFraction, reported);
    record.lastFraction = fraction;
    this.publish({
      kind: 'progress',
      taskId: record.id,
      state: record.state,
      timestamp: Date.now(),
      messageKey: marker.messageKey,
      args: marker.args ?? [],
      fraction,
    });
  }

  private finish(record: TaskRecord, state: TerminalTaskState, result?: ExecutionResult, errorMessage?: string): void {
    if (isTerminalState(record.state)) {
      return;
    }
    if (state === 'failed') {
      this.publish({
        kind: 'error',
        taskId: record.id,
        state: record.state,
        timestamp: Date.now(),
        message: errorMessage ?? 'Task failed',
      });
    }
    if (!this.transition(record, state)) {
      return;
    }
    this.log.info(`Task ${record.id} ${state}: ${record.request.title}`, errorMessage ? { error: errorMessage } : undefined);
    record.resolve({
      taskId: record.id,
      state,
      exitCode: result?.exitCode ?? null,
      stdout: result?.stdout ?? [],
      stderr: result?.stderr ?? [],
      timedOut: result?.timedOut ?? false,
      durationMs: result?.durationMs ?? 0,
      ...(state === 'failed' ? { errorMessage: errorMessage ?? 'Task failed' } : {}),
    });
    this.retire(record);
  }

  /** Keep the newest finished records; handles keep their own completion. */
  private retire(record: TaskRecord): void {
    this.finished.push(record.id);
    while (this.finished.length > this.finishedTaskLimit) {
      const oldest = this.finished.shift();
      if (oldest !== undefined) {
        this.tasks.delete(oldest);
      }
    }
  }

  private transition(record: TaskRecord, to: TaskState): boolean {
    if (!isValidTransition(record.state, to)) {
      this.log.warn(`Ignoring invalid transition ${record.state} -> ${to} for task ${record.id}`);
      return false;
    }
    record.state = to;
    this.emitStatus(record);
    return true;
  }

  private emitStatus(record: TaskRecord): void {
    this.publish({
      kind: 'status',
      taskId: record.id,
      state: record.state,
      timestamp: Date.now(),
      messageKey: messageKey(record.state),
      args: [record.request.title],
    });
  }

  private publish(event: TaskEvent): void {
    this.events.publish(event);
  }

  private handleFor(record: TaskRecord): TaskHandle {
    return Object.freeze({
      id: record.id,
      request: record.request,
      state: () => record.state,
      completion: record.completion,
    });
  }

  private remember(request: TaskRequest): void {
    if (this.recentRequestLimit <= 0) {
      return;
    }
    this.recent.unshift(request);
    if (this.recent.length > this.recentRequestLimit) {
      this.recent.length = this.recentRequestLimit;
    }
  }

  // ─── Control ─────────────────────────────────────────────────────────────

  /**
   * Request cancellation.
   *
   * A queued task is cancelled on the spot; a starting or running task has
   * its process tree terminated and becomes `cancelled` once it is gone.
   *
   * @returns false when the task was already terminal
   * @throws UnknownTaskError for identifiers this engine never issued or
   *   has forgotten (finished tasks beyond `finishedTaskLimit`)
   */
  cancel(taskId: string): boolean {
    const record = this.requireRecord(taskId);
    if (isTerminalState(record.state)) {
      return false;
    }
    if (record.state === 'queued') {
      this.finish(record, 'cancelled');
      return true;
    }
    record.cancellation.cancel();
    return true;
  }

  /**
   * @throws UnknownTaskError for identifiers this engine never issued or
   *   has forgotten (finished tasks beyond `finishedTaskLimit`)
   */
  getState(taskId: string): TaskState {
    return this.requireRecord(taskId).state;
  }

  /**
   * Tasks that have not reached a terminal state, in submission order.
   */
  getRunningTasks(): TaskHandle[] {
    return [...this.tasks.values()]
      .filter(record => !isTerminalState(record.state))
      .map(record => this.handleFor(record));
  }

  /**
   * Cancel every non-terminal task.
   *
   * @returns How many tasks were asked to stop
   */
  stopAllRunningTasks(): number {
    let stopped = 0;
    for (const handle of this.getRunningTasks()) {
      if (this.cancel(handle.id)) {
        stopped++;
      }
    }
    return stopped;
  }

  /**
   * Most recently submitted requests, newest first.
   */
  getRecentRequests(): readonly TaskRequest[] {
    return [...this.recent];
  }

  private requireRecord(taskId: string): TaskRecord {
    const record = this.tasks.get(taskId);
    if (!record) {
      throw new UnknownTaskError(taskId);
    }
    return record;
  }

  // ─── Events ──────────────────────────────────────────────────────────────

  /**
   * Observe task events from now on. Past events are not replayed.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: TaskEventListener, options?: SubscribeOptions): () => void {
    return this.events.subscribe(listener, options);
  }

  unsubscribe(listener: TaskEventListener): boolean {
    return this.events.unsubscribe(listener);
  }

  // ─── Model ───────────────────────────────────────────────────────────────

  /**
   * Get the tool's model.
   *
   * Without `force`: shares a refresh that is already in flight, otherwise
   * returns the cached model, otherwise starts a refresh. With `force`: a
   * refresh that starts now or, when one is running, right after it; never
   * two loads at once.
   */
  refreshModel(force = false): Promise<TModel> {
    if (!this.loadModel) {
      return Promise.reject(new ModelLoadError('No model loader is configured'));
    }
    if (force) {
      return this.refresh.rerun();
    }
    const shared = this.refresh.current;
    if (shared) {
      return shared;
    }
    const cached = this.cache.get();
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }
    return this.refresh.join();
  }

  /**
   * The last successfully loaded model, without waiting.
   */
  getCachedModel(): TModel | undefined {
    return this.cache.get();
  }

  addModelListener(listener: ModelListener<TModel>): void {
    this.modelListeners.add(listener, undefined);
  }

  removeModelListener(listener: ModelListener<TModel>): boolean {
    return this.modelListeners.remove(listener);
  }

  private async performRefresh(): Promise<TModel> {
    const loader = this.loadModel;
    if (!loader) {
      throw new ModelLoadError('No model loader is configured');
    }
    const source = new CancellationTokenSource();
    this.modelLoads.add(source);
    this.modelListeners.forEach(listener => listener.reloadStarted?.());

    let timer: NodeJS.Timeout | undefined;
    try {
      const loading = startLoad(loader, source.token);
      // A load abandoned by the timeout may still settle later.
      loading.catch((error: unknown) => this.log.debug('Model load settled with an error', error));
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          source.cancel();
          reject(new ModelLoadError(`Model load timed out after ${this.modelTimeoutMs}ms`));
        }, this.modelTimeoutMs);
      });

      const model = await Promise.race([loading, timeout]);
      this.cache.swap(model);
      this.log.debug('Model refreshed', { version: this.cache.version });
      this.modelListeners.forEach(listener => listener.reloadSucceeded?.(model));
      return model;
    } catch (error) {
      const failure = error instanceof Error ? error : new ModelLoadError(String(error));
      this.log.warn('Model refresh failed', failure);
      this.modelListeners.forEach(listener => listener.reloadFailed?.(failure));
      throw failure;
    } finally {
      clearTimeout(timer);
      this.modelLoads.delete(source);
    }
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────

  /**
   * Cancel running tasks and model loads, and drop every listener.
   * Later submissions throw.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.stopAllRunningTasks();
    for (const source of this.modelLoads) {
      source.cancel();
    }
    this.events.clear();
    this.modelListeners.clear();
  }
}
