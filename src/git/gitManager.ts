/**
 * @fileoverview Git manager - repository status and network operations for
 * one working directory.
 *
 * Status is the model of a {@link TaskExecutionEngine}: refreshes are
 * single-flight and the last good status is cached. Fetch, pull and push
 * run as engine tasks, so they publish progress and can be cancelled; the
 * status is refreshed after each one completes.
 *
 * @module git/gitManager
 */

import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import { ModelLoadError } from '../core/errors';
import type { CancellationToken } from '../process/cancellation';
import type { ProcessRunner } from '../process/processRunner';
import { ListenerRegistry } from '../tasks/listenerRegistry';
import { TaskExecutionEngine } from '../tasks/taskExecutionEngine';
import type { TaskEventListener, TaskHandle } from '../tasks/types';
import type { SubscribeOptions } from '../tasks/taskEvents';
import { changeListsEqual } from './fileChange';
import type { GitClient, GitRepository } from './gitClient';
import { fetchCommand, pullCommand, pushCommand, type CommitRequest } from './gitCommands';
import type { GitIdentity } from './identity';
import { createGitProgressParser, type GitNetworkOperation } from './progressParser';
import type { GitRemote, GitUpstream } from './remoteParser';
import type { RepositoryStatus } from './statusParser';

/** Default period of automatic status refreshes. */
export const DEFAULT_AUTO_REFRESH_INTERVAL_MS = 5000;

export type StatusListener = (status: RepositoryStatus | undefined) => void;

export interface GitManagerOptions {
  client: GitClient;
  runner: ProcessRunner;
  autoRefreshIntervalMs?: number;
  /** Upper bound for one status load, on top of the command's own timeout. */
  statusTimeoutMs?: number;
  logger?: ILogger;
}

function statusEqual(a: RepositoryStatus | undefined, b: RepositoryStatus | undefined): boolean {
  if (a === b) {
    return true;
  }
  if (!a || !b) {
    return false;
  }
  return a.repositoryRoot === b.repositoryRoot
    && a.branch === b.branch
    && a.upstream === b.upstream
    && a.ahead === b.ahead
    && a.behind === b.behind
    && changeListsEqual(a.changes, b.changes);
}

export class GitManager {
  private readonly client: GitClient;
  private readonly log: ILogger;
  private readonly engine: TaskExecutionEngine<RepositoryStatus>;
  private readonly statusListeners: ListenerRegistry<StatusListener>;
  private autoRefreshIntervalMs: number;
  private autoRefreshTimer: NodeJS.Timeout | undefined;
  private repository: GitRepository | undefined;
  private identity: GitIdentity | undefined;
  private lastFetchAt: number | undefined;
  private lastNotified: RepositoryStatus | undefined;
  private disposed = false;

  constructor(options: GitManagerOptions) {
    this.client = options.client;
    this.log = options.logger ?? Logger.for('git');
    this.autoRefreshIntervalMs = options.autoRefreshIntervalMs ?? DEFAULT_AUTO_REFRESH_INTERVAL_MS;
    this.statusListeners = new ListenerRegistry<StatusListener>(this.log);
    this.engine = new TaskExecutionEngine<RepositoryStatus>({
      runner: options.runner,
      loadModel: (token) => this.loadStatus(token),
      modelTimeoutMs: options.statusTimeoutMs,
      logger: this.log,
    });
    this.engine.addModelListener({
      reloadSucceeded: (status) => this.publishStatus(status),
    });
  }

  // ─── Repository ──────────────────────────────────────────────────────────

  /**
   * Look for a work tree at `directory`. When one is found its status is
   * loaded; when none is, auto refresh stops and listeners get undefined.
   */
  async detectRepository(directory: string): Promise<GitRepository | undefined> {
    const repository = await this.client.detectRepository(directory);
    this.repository = repository;
    if (!repository) {
      this.log.info(`No git repository at ${directory}`);
      this.stopAutoRefresh();
      this.publishStatus(undefined);
      return undefined;
    }
    this.log.info(`Git repository detected at ${repository.root}`);
    await this.refreshStatus();
    return repository;
  }

  isActive(): boolean {
    return this.repository !== undefined;
  }

  getRepository(): GitRepository | undefined {
    return this.repository;
  }

  // ─── Status ──────────────────────────────────────────────────────────────

  /**
   * Load a fresh status. Concurrent calls share one queued refresh; git
   * status never runs twice at once.
   */
  refreshStatus(): Promise<RepositoryStatus> {
    return this.engine.refreshModel(true);
  }

  /** The last loaded status, without waiting. */
  getStatus(): RepositoryStatus | undefined {
    const status = this.engine.getCachedModel();
    return status && status.repositoryRoot === this.repository?.root ? status : undefined;
  }

  /**
   * Observe status changes. Refreshes that produce an equal status are not
   * reported.
   *
   * @returns A function that removes the listener
   */
  onStatusChanged(listener: StatusListener): () => void {
    this.statusListeners.add(listener, undefined);
    return () => { this.statusListeners.remove(listener); };
  }

  /**
   * Refresh now and then periodically. A configured interval of 0 disables
   * the timer; an explicit interval must be positive.
   */
  startAutoRefresh(intervalMs?: number): void {
    if (intervalMs !== undefined) {
      if (!(intervalMs > 0)) {
        throw new RangeError('Auto refresh interval must be positive');
      }
      this.autoRefreshIntervalMs = intervalMs;
      this.stopAutoRefresh();
    }
    if (this.autoRefreshTimer || this.disposed) {
      return;
    }
    if (!(this.autoRefreshIntervalMs > 0)) {
      this.log.debug('Auto refresh is disabled');
      return;
    }
    this.log.debug(`Auto refresh every ${this.autoRefreshIntervalMs}ms`);
    this.autoRefreshTimer = setInterval(() => this.autoRefresh(), this.autoRefreshIntervalMs);
    this.autoRefresh();
  }

  stopAutoRefresh(): void {
    if (this.autoRefreshTimer) {
      clearInterval(this.autoRefreshTimer);
      this.autoRefreshTimer = undefined;
    }
  }

  isAutoRefreshing(): boolean {
    return this.autoRefreshTimer !== undefined;
  }

  private autoRefresh(): void {
    if (!this.repository) {
      return;
    }
    this.refreshStatus().catch((error: unknown) => {
      this.log.warn('Automatic status refresh failed', error);
    });
  }

  private async loadStatus(token: CancellationToken): Promise<RepositoryStatus> {
    const repository = this.repository;
    if (!repository) {
      throw new ModelLoadError('No git repository has been detected');
    }
    return this.client.getStatus(repository, token);
  }

  private publishStatus(status: RepositoryStatus | undefined): void {
    if (statusEqual(this.lastNotified, status)) {
      return;
    }
    this.lastNotified = status;
    this.statusListeners.forEach(listener => listener(status));
  }

  // ─── Network Operations ──────────────────────────────────────────────────

  /**
   * Start `git fetch --prune`. Resolves the status again once it completes.
   *
   * @returns The task, or undefined when no repository is active
   */
  fetch(): TaskHandle | undefined {
    return this.submitNetworkTask('fetch');
  }

  pull(): TaskHandle | undefined {
    return this.submitNetworkTask('pull');
  }

  push(): TaskHandle | undefined {
    return this.submitNetworkTask('push');
  }

  /** When the last fetch completed, in epoch milliseconds. */
  getLastFetchTime(): number | undefined {
    return this.lastFetchAt;
  }

  private submitNetworkTask(operation: GitNetworkOperation): TaskHandle | undefined {
    const repository = this.repository;
    if (!repository) {
      this.log.warn(`Ignoring ${operation}: no git repository`);
      return undefined;
    }
    const builders = { fetch: fetchCommand, pull: pullCommand, push: pushCommand };
    const handle = this.engine.submit({
      title: `git ${operation}`,
      invocation: builders[operation](this.client.context, repository.root),
      progressParser: createGitProgressParser(operation),
    });

    handle.completion
      .then(async (result) => {
        if (result.state !== 'completed') {
          return;
        }
        if (operation === 'fetch') {
          this.lastFetchAt = Date.now();
        }
        await this.refreshStatus();
      })
      .catch((error: unknown) => {
        this.log.warn(`Status refresh after git ${operation} failed`, error);
      });
    return handle;
  }

  // ─── Local Operations ────────────────────────────────────────────────────

  async stage(paths: readonly string[]): Promise<void> {
    await this.client.stage(this.requireRepository(), paths);
    await this.refreshStatus();
  }

  async unstage(paths: readonly string[]): Promise<void> {
    await this.client.unstage(this.requireRepository(), paths);
    await this.refreshStatus();
  }

  async commit(request: CommitRequest): Promise<void> {
    await this.client.commit(this.requireRepository(), request);
    await this.refreshStatus();
  }

  async getRemotes(): Promise<GitRemote[]> {
    return this.repository ? this.client.getRemotes(this.repository) : [];
  }

  async getUpstream(): Promise<GitUpstream | undefined> {
    return this.repository ? this.client.getUpstream(this.repository) : undefined;
  }

  async loadIdentity(): Promise<GitIdentity> {
    this.identity = await this.client.getIdentity(this.repository);
    return this.identity;
  }

  getIdentity(): GitIdentity | undefined {
    return this.identity;
  }

  private requireRepository(): GitRepository {
    if (!this.repository) {
      throw new ModelLoadError('No git repository has been detected');
    }
    return this.repository;
  }

  // ─── Tasks ───────────────────────────────────────────────────────────────

  subscribe(listener: TaskEventListener, options?: SubscribeOptions): () => void {
    return this.engine.subscribe(listener, options);
  }

  cancel(taskId: string): boolean {
    return this.engine.cancel(taskId);
  }

  getRunningTasks(): TaskHandle[] {
    return this.engine.getRunningTasks();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.stopAutoRefresh();
    this.engine.dispose();
    this.statusListeners.clear();
  }
}
