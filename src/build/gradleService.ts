/**
 * @fileoverview Gradle service - build tasks and the build model of one
 * project directory.
 *
 * Tasks run through a {@link TaskExecutionEngine} whose model is the
 * {@link BuildModel}: the Gradle version plus every project and task that
 * `tasks --all` reports. The executable is resolved on first use, in this
 * order:
 *
 * 1. the configured path
 * 2. the project's wrapper (`gradlew`, `gradlew.bat` on Windows) when
 *    wrapper use is enabled and the file exists
 * 3. `gradle` found by the {@link ExecutableLocator}
 *
 * When nothing is found the bare name `gradle` is used, so the task fails
 * with a start error rather than the call throwing.
 *
 * @module build/gradleService
 */

import * as path from 'path';
import type { IFileSystem } from '../interfaces/IFileSystem';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import { ModelLoadError } from '../core/errors';
import type { CancellationToken } from '../process/cancellation';
import type { ExecutableLocator } from '../process/executableLocator';
import { createInvocation } from '../process/invocation';
import type { ProcessRunner } from '../process/processRunner';
import { succeeded } from '../process/result';
import type { CaptureMode, ExecutionResult } from '../process/types';
import { TaskExecutionEngine } from '../tasks/taskExecutionEngine';
import type { SubscribeOptions } from '../tasks/taskEvents';
import type { ModelListener, TaskEventListener, TaskHandle, TaskRequest } from '../tasks/types';
import { buildArguments } from './buildArguments';
import { allocateFreePort, type PortAllocator } from './freePort';
import { parseHelpOptions } from './helpParser';
import { buildProgressParser } from './progressParser';
import { parseGradleVersion, parseTasksReport } from './tasksReportParser';
import type { BuildModel, BuildTaskDescriptor } from './types';

export const DEFAULT_BUILD_RECENT_REQUEST_LIMIT = 10;
export const DEFAULT_BUILD_MODEL_TIMEOUT_MS = 3 * 60 * 1000;

const GRADLE_TOOL = 'gradle';

export interface GradleServiceOptions {
  projectDir: string;
  runner: ProcessRunner;
  locator: ExecutableLocator;
  fileSystem: IFileSystem;
  /** Explicit executable; skips wrapper and locator. */
  executablePath?: string;
  /** Prefer the project's wrapper script (default true). */
  useWrapper?: boolean;
  modelTimeoutMs?: number;
  /** Limit for each build task; 0 (default) runs without one. */
  taskTimeoutMs?: number;
  recentRequestLimit?: number;
  probeTimeoutMs?: number;
  platform?: NodeJS.Platform;
  allocatePort?: PortAllocator;
  logger?: ILogger;
}

export class GradleService {
  private readonly projectDir: string;
  private readonly runner: ProcessRunner;
  private readonly locator: ExecutableLocator;
  private readonly fileSystem: IFileSystem;
  private readonly configuredExecutable: string | undefined;
  private readonly useWrapper: boolean;
  private readonly taskTimeoutMs: number;
  private readonly probeTimeoutMs: number | undefined;
  private readonly platform: NodeJS.Platform;
  private readonly allocatePort: PortAllocator;
  private readonly log: ILogger;
  private readonly engine: TaskExecutionEngine<BuildModel>;
  private readonly descriptors = new WeakMap<TaskRequest, BuildTaskDescriptor>();
  private readonly debugPorts = new Map<string, number>();
  private executable: Promise<string> | undefined;
  private helpOptions: Promise<Map<string, string>> | undefined;

  constructor(options: GradleServiceOptions) {
    this.projectDir = options.projectDir;
    this.runner = options.runner;
    this.locator = options.locator;
    this.fileSystem = options.fileSystem;
    this.configuredExecutable = options.executablePath;
    this.useWrapper = options.useWrapper ?? true;
    this.taskTimeoutMs = options.taskTimeoutMs ?? 0;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.platform = options.platform ?? process.platform;
    this.allocatePort = options.allocatePort ?? allocateFreePort;
    this.log = options.logger ?? Logger.for('build');
    this.engine = new TaskExecutionEngine<BuildModel>({
      runner: options.runner,
      loadModel: (token) => this.loadModel(token),
      modelTimeoutMs: options.modelTimeoutMs ?? DEFAULT_BUILD_MODEL_TIMEOUT_MS,
      recentRequestLimit: options.recentRequestLimit ?? DEFAULT_BUILD_RECENT_REQUEST_LIMIT,
      logger: this.log,
    });
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  // ─── Executable ──────────────────────────────────────────────────────────

  /**
   * The executable every Gradle command uses. Resolved once; later calls
   * share the first answer.
   */
  resolveExecutable(): Promise<string> {
    if (!this.executable) {
      this.executable = this.findExecutable();
    }
    return this.executable;
  }

  private async findExecutable(): Promise<string> {
    if (this.configuredExecutable) {
      this.log.debug(`Using configured Gradle executable ${this.configuredExecutable}`);
      return this.configuredExecutable;
    }
    if (this.useWrapper) {
      const wrapper = path.join(this.projectDir, this.platform === 'win32' ? 'gradlew.bat' : 'gradlew');
      if (await this.fileSystem.isFileAsync(wrapper)) {
        this.log.debug(`Using Gradle wrapper ${wrapper}`);
        return wrapper;
      }
    }
    const located = await this.locator.locate(GRADLE_TOOL, this.probeTimeoutMs);
    if (located) {
      return located;
    }
    this.log.warn(`No Gradle executable found for ${this.projectDir}; falling back to '${GRADLE_TOOL}'`);
    return GRADLE_TOOL;
  }

  // ─── Tasks ───────────────────────────────────────────────────────────────

  /**
   * Start a build task. Debug tasks get a free port first; the build waits
   * there for a debugger.
   */
  async runTask(descriptor: BuildTaskDescriptor): Promise<TaskHandle> {
    const executable = await this.resolveExecutable();
    const debugPort = descriptor.debug ? await this.allocatePort() : undefined;
    const request: TaskRequest = {
      title: descriptor.taskPath,
      invocation: createInvocation(executable, buildArguments(descriptor, debugPort), {
        environment: { ...descriptor.environment },
        workingDirectory: this.projectDir,
        timeoutMs: this.taskTimeoutMs,
      }),
      progressParser: buildProgressParser,
    };
    this.descriptors.set(request, descriptor);

    const handle = this.engine.submit(request);
    if (debugPort !== undefined) {
      this.debugPorts.set(handle.id, debugPort);
      this.log.info(`${descriptor.taskPath} waits for a debugger on port ${debugPort}`);
      // completion never rejects
      void handle.completion.then(() => this.debugPorts.delete(handle.id));
    }
    return handle;
  }

  /** Port a running debug task listens on. */
  getDebugPort(taskId: string): number | undefined {
    return this.debugPorts.get(taskId);
  }

  cancel(taskId: string): boolean {
    return this.engine.cancel(taskId);
  }

  getRunningTasks(): TaskHandle[] {
    return this.engine.getRunningTasks();
  }

  stopAllRunningTasks(): number {
    return this.engine.stopAllRunningTasks();
  }

  /** Descriptors of the latest submissions, newest first. */
  getRecentRequests(): BuildTaskDescriptor[] {
    const recent: BuildTaskDescriptor[] = [];
    for (const request of this.engine.getRecentRequests()) {
      const descriptor = this.descriptors.get(request);
      if (descriptor) {
        recent.push(descriptor);
      }
    }
    return recent;
  }

  subscribe(listener: TaskEventListener, options?: SubscribeOptions): () => void {
    return this.engine.subscribe(listener, options);
  }

  // ─── Model ───────────────────────────────────────────────────────────────

  refreshModel(force = false): Promise<BuildModel> {
    return this.engine.refreshModel(force);
  }

  getCachedModel(): BuildModel | undefined {
    return this.engine.getCachedModel();
  }

  addModelListener(listener: ModelListener<BuildModel>): void {
    this.engine.addModelListener(listener);
  }

  removeModelListener(listener: ModelListener<BuildModel>): boolean {
    return this.engine.removeModelListener(listener);
  }

  private async loadModel(token: CancellationToken): Promise<BuildModel> {
    const version = await this.runQuery(['--version'], 'Could not read the Gradle version', token);
    const gradleVersion = parseGradleVersion(version.stdout);
    if (!gradleVersion) {
      throw new ModelLoadError('Gradle did not report its version');
    }
    const report = await this.runQuery(['tasks', '--all', '--console=plain'], 'Could not list Gradle tasks', token);
    const projects = parseTasksReport(report.stdout, path.basename(this.projectDir));
    this.log.debug(`Build model loaded: Gradle ${gradleVersion}, ${projects.length} project(s)`);
    return Object.freeze({ gradleVersion, rootDir: this.projectDir, projects: Object.freeze(projects) });
  }

  private async runQuery(
    args: string[],
    failure: string,
    token?: CancellationToken,
    captureMode: CaptureMode = 'lines',
  ): Promise<ExecutionResult> {
    const executable = await this.resolveExecutable();
    const result = await this.runner.run(
      createInvocation(executable, args, { workingDirectory: this.projectDir }),
      { cancellation: token, captureMode },
    );
    if (!succeeded(result)) {
      throw new ModelLoadError(failure, result);
    }
    return result;
  }

  // ─── Command-Line Options ────────────────────────────────────────────────

  /**
   * Options listed by `--help`, mapped to their descriptions. Loaded once;
   * a failed load is retried on the next call.
   */
  getCommandLineOptions(): Promise<Map<string, string>> {
    if (!this.helpOptions) {
      // Whole capture keeps the blank lines that end a description.
      this.helpOptions = this.runQuery(['--help'], 'Could not read Gradle options', undefined, 'whole')
        .then(result => parseHelpOptions(result.stdout.join('')));
      this.helpOptions.catch(() => { this.helpOptions = undefined; });
    }
    return this.helpOptions;
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────

  dispose(): void {
    this.engine.dispose();
    this.debugPorts.clear();
  }
}
