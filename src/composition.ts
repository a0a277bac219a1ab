/**
 * @fileoverview Composition root - DI container wiring for the tool services.
 *
 * Creates a {@link ServiceContainer} with all production service implementations
 * registered. This is the single place where concrete classes meet their interfaces
 * and where configuration keys are read.
 *
 * ## Dependency Graph
 *
 * ```
 * IEnvironment     ──→ DefaultEnvironment     (singleton)
 * IFileSystem      ──→ DefaultFileSystem      (singleton)
 * IConfigProvider  ──→ FileConfigProvider     (singleton, uses IEnvironment, IFileSystem)
 *   └─ used by: Logger and every service factory below
 *
 * IProcessSpawner  ──→ DefaultProcessSpawner  (singleton)
 * ProcessRunner    ──→ ProcessRunner          (singleton, uses IProcessSpawner)
 * ExecutableLocator ─→ ExecutableLocator      (singleton, uses ProcessRunner)
 *
 * GitClient        ──→ GitClient              (singleton, uses ProcessRunner)
 * GitManager       ──→ GitManager             (singleton, uses GitClient)
 * GradleService    ──→ GradleService          (singleton, uses ProcessRunner, ExecutableLocator)
 * ```
 *
 * @module composition
 */

import { ServiceContainer } from './core/container';
import * as Tokens from './core/tokens';
import { FileConfigProvider } from './core/config';
import { DefaultFileSystem } from './core/defaultFileSystem';
import { Logger } from './core/logger';
import type { IConfigProvider } from './interfaces/IConfigProvider';
import { DefaultEnvironment, type IEnvironment } from './interfaces/IEnvironment';
import type { IFileSystem } from './interfaces/IFileSystem';
import { DefaultProcessSpawner, type IProcessSpawner } from './interfaces/IProcessSpawner';
import { DEFAULT_PROBE_TIMEOUT_MS, ExecutableLocator } from './process/executableLocator';
import { DEFAULT_KILL_GRACE_MS, ProcessRunner } from './process/processRunner';
import { GitClient } from './git/gitClient';
import { DEFAULT_GIT_TIMEOUTS } from './git/gitCommands';
import { DEFAULT_AUTO_REFRESH_INTERVAL_MS, GitManager } from './git/gitManager';
import {
  DEFAULT_BUILD_MODEL_TIMEOUT_MS,
  DEFAULT_BUILD_RECENT_REQUEST_LIMIT,
  GradleService,
} from './build/gradleService';

/**
 * Overrides for {@link createContainer}; anything left out gets the
 * production implementation.
 */
export interface CompositionOptions {
  /** Directory holding the git work tree and the Gradle project (default: cwd). */
  workspaceDir?: string;
  /** Explicit configuration file; without one `toolwright.config.json` is optional. */
  configFile?: string;
  config?: IConfigProvider;
  environment?: IEnvironment;
  fileSystem?: IFileSystem;
  spawner?: IProcessSpawner;
}

/**
 * The services a host works with, owned as one unit.
 */
export interface ToolServices {
  readonly config: IConfigProvider;
  readonly locator: ExecutableLocator;
  readonly runner: ProcessRunner;
  readonly git: GitManager;
  readonly build: GradleService;
  /** Stop auto refresh and cancel every running task. */
  dispose(): void;
}

/** Configured value, or undefined for an unset or empty string. */
function optionalString(config: IConfigProvider, section: string, key: string): string | undefined {
  const value = config.getConfig(section, key, '');
  return value.length > 0 ? value : undefined;
}

/**
 * Create and wire the production DI container.
 *
 * @throws ConfigurationError (on first resolve of the config provider) when
 *   the configuration file is unreadable or invalid
 */
export function createContainer(options: CompositionOptions = {}): ServiceContainer {
  const container = new ServiceContainer();

  // ─── Host Abstractions ───────────────────────────────────────────────
  container.registerSingleton(Tokens.IEnvironment, () => options.environment ?? new DefaultEnvironment());

  container.registerSingleton(Tokens.IFileSystem, () => options.fileSystem ?? new DefaultFileSystem());

  container.registerSingleton(Tokens.IConfigProvider, (c) => {
    if (options.config) {
      return options.config;
    }
    const environment = c.resolve(Tokens.IEnvironment);
    return FileConfigProvider.load({
      filePath: options.configFile,
      cwd: options.workspaceDir ?? environment.cwd(),
      env: environment.env,
      fileSystem: c.resolve(Tokens.IFileSystem),
    });
  });

  // ─── Logger ──────────────────────────────────────────────────────────
  // Installs the process-wide logger so every Logger.for() reads the
  // configured level and debug switches.
  container.registerSingleton(Tokens.Logger, (c) => Logger.initialize(c.resolve(Tokens.IConfigProvider)));

  // ─── Process Layer ───────────────────────────────────────────────────
  container.registerSingleton(Tokens.IProcessSpawner, () => options.spawner ?? new DefaultProcessSpawner());

  container.registerSingleton(Tokens.ProcessRunner, (c) => {
    const config = c.resolve(Tokens.IConfigProvider);
    const environment = c.resolve(Tokens.IEnvironment);
    return new ProcessRunner({
      spawner: c.resolve(Tokens.IProcessSpawner),
      killGraceMs: config.getConfig('process', 'killGraceMs', DEFAULT_KILL_GRACE_MS),
      platform: environment.platform,
      baseEnvironment: environment.env,
    });
  });

  container.registerSingleton(Tokens.ExecutableLocator, (c) => new ExecutableLocator({
    runner: c.resolve(Tokens.ProcessRunner),
    fileSystem: c.resolve(Tokens.IFileSystem),
    environment: c.resolve(Tokens.IEnvironment),
  }));

  // ─── Git ─────────────────────────────────────────────────────────────
  container.registerSingleton(Tokens.GitClient, (c) => {
    const config = c.resolve(Tokens.IConfigProvider);
    return new GitClient({
      runner: c.resolve(Tokens.ProcessRunner),
      executable: optionalString(config, 'git', 'executablePath'),
      timeouts: {
        statusMs: config.getConfig('git', 'statusTimeoutMs', DEFAULT_GIT_TIMEOUTS.statusMs),
        networkMs: config.getConfig('git', 'networkTimeoutMs', DEFAULT_GIT_TIMEOUTS.networkMs),
        pushMs: config.getConfig('git', 'pushTimeoutMs', DEFAULT_GIT_TIMEOUTS.pushMs),
      },
    });
  });

  container.registerSingleton(Tokens.GitManager, (c) => new GitManager({
    client: c.resolve(Tokens.GitClient),
    runner: c.resolve(Tokens.ProcessRunner),
    autoRefreshIntervalMs: c.resolve(Tokens.IConfigProvider)
      .getConfig('git', 'autoRefreshIntervalMs', DEFAULT_AUTO_REFRESH_INTERVAL_MS),
  }));

  // ─── Build ───────────────────────────────────────────────────────────
  container.registerSingleton(Tokens.GradleService, (c) => {
    const config = c.resolve(Tokens.IConfigProvider);
    const environment = c.resolve(Tokens.IEnvironment);
    return new GradleService({
      projectDir: options.workspaceDir ?? environment.cwd(),
      runner: c.resolve(Tokens.ProcessRunner),
      locator: c.resolve(Tokens.ExecutableLocator),
      fileSystem: c.resolve(Tokens.IFileSystem),
      executablePath: optionalString(config, 'build', 'executablePath'),
      useWrapper: config.getConfig('build', 'useWrapper', true),
      modelTimeoutMs: config.getConfig('build', 'modelTimeoutMs', DEFAULT_BUILD_MODEL_TIMEOUT_MS),
      taskTimeoutMs: config.getConfig('build', 'taskTimeoutMs', 0),
      recentRequestLimit: config.getConfig('build', 'recentRequestLimit', DEFAULT_BUILD_RECENT_REQUEST_LIMIT),
      probeTimeoutMs: config.getConfig('locator', 'probeTimeoutMs', DEFAULT_PROBE_TIMEOUT_MS),
      platform: environment.platform,
    });
  });

  return container;
}

/**
 * Resolve the tool services from a fresh container. Without a configured
 * git executable, git is located first.
 *
 * @example
 * ```typescript
 * const services = await createToolServices({ workspaceDir: '/work/demo' });
 * await services.git.detectRepository('/work/demo');
 * services.git.startAutoRefresh();
 * // ...
 * services.dispose();
 * ```
 */
export async function createToolServices(options: CompositionOptions = {}): Promise<ToolServices> {
  const container = createContainer(options);
  const config = container.resolve(Tokens.IConfigProvider);
  container.resolve(Tokens.Logger);
  const log = Logger.for('services');

  const locator = container.resolve(Tokens.ExecutableLocator);
  const client = container.resolve(Tokens.GitClient);
  if (!optionalString(config, 'git', 'executablePath')) {
    const probeTimeoutMs = config.getConfig('locator', 'probeTimeoutMs', DEFAULT_PROBE_TIMEOUT_MS);
    const located = await locator.locate('git', probeTimeoutMs);
    if (located) {
      client.setExecutable(located);
    } else {
      log.warn('git was not found; git operations will fail to start');
    }
  }

  const git = container.resolve(Tokens.GitManager);
  const build = container.resolve(Tokens.GradleService);
  let disposed = false;
  return {
    config,
    locator,
    runner: container.resolve(Tokens.ProcessRunner),
    git,
    build,
    dispose: () => {
      if (disposed) {
        return;
      }
      disposed = true;
      git.dispose();
      build.dispose();
      log.debug('Tool services disposed');
    },
  };
}
