/**
 * @fileoverview Centralized logging system with per-component debug control.
 *
 * Console-backed logger whose level threshold and per-component debug
 * switches come from an {@link IConfigProvider}. Debug output for a component
 * is written when the global level is `debug` or the component's switch
 * (`logging.debug.<component>`) is on.
 *
 * Components:
 * - process: process runner and tree termination
 * - locator: executable discovery
 * - tasks: task execution engine and model refresh
 * - git: git client and manager
 * - build: Gradle service
 * - tree: change tree building
 * - config: configuration loading
 * - services: composition root and lifecycle
 *
 * @example
 * ```typescript
 * import { Logger } from './core/logger';
 *
 * const log = Logger.for('git');
 * log.info('Repository detected', { root: '/work/repo' });
 * log.debug('Status output', { lines: 12 });
 * log.error('Push failed', error);
 * ```
 *
 * @module core/logger
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { ILogger, LogLevel } from '../interfaces/ILogger';

export type { LogLevel } from '../interfaces/ILogger';

/**
 * Components that can have logging enabled
 */
export type LogComponent = 'process' | 'locator' | 'tasks' | 'git' | 'build' | 'tree' | 'config' | 'services';

/** Configuration section holding the level threshold. */
export const LOGGING_SECTION = 'logging';
/** Key of the level threshold inside {@link LOGGING_SECTION}. */
export const LOGGING_LEVEL_KEY = 'level';
/** Configuration section holding one boolean per {@link LogComponent}. */
export const LOGGING_DEBUG_SECTION = 'logging.debug';

const LOG_COMPONENTS: readonly LogComponent[] = ['process', 'locator', 'tasks', 'git', 'build', 'tree', 'config', 'services'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function emptyDebugConfig(): Record<LogComponent, boolean> {
  return {
    process: false,
    locator: false,
    tasks: false,
    git: false,
    build: false,
    tree: false,
    config: false,
    services: false,
  };
}

/**
 * Centralized logger with per-component debug control.
 *
 * One instance is installed process-wide through {@link Logger.initialize};
 * component loggers created before that write through a console-only
 * fallback at the `info` threshold.
 */
export class Logger {
  private static instance: Logger | undefined;
  private static fallback: Logger | undefined;

  private level: LogLevel = 'info';
  private debugConfig: Record<LogComponent, boolean> = emptyDebugConfig();
  private configProvider: IConfigProvider | undefined;

  constructor(configProvider?: IConfigProvider) {
    if (configProvider) {
      this.setConfigProvider(configProvider);
    }
  }

  /**
   * Install the process-wide logger. Replaces any previous instance.
   */
  static initialize(configProvider?: IConfigProvider): Logger {
    Logger.instance = new Logger(configProvider);
    return Logger.instance;
  }

  /**
   * Drop the process-wide logger so later calls use the console fallback.
   */
  static reset(): void {
    Logger.instance = undefined;
    Logger.fallback = undefined;
  }

  /**
   * The installed logger, or the shared console fallback.
   */
  static current(): Logger {
    if (Logger.instance) {
      return Logger.instance;
    }
    if (!Logger.fallback) {
      Logger.fallback = new Logger();
    }
    return Logger.fallback;
  }

  /**
   * Create a component-scoped logger.
   */
  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  /**
   * Swap the configuration source and reload level and debug switches.
   */
  setConfigProvider(configProvider: IConfigProvider): void {
    this.configProvider = configProvider;
    this.loadConfig();
  }

  private loadConfig(): void {
    const config = this.configProvider;
    if (!config) {
      return;
    }

    const level = config.getConfig<string>(LOGGING_SECTION, LOGGING_LEVEL_KEY, 'info');
    this.level = isLogLevel(level) ? level : 'info';

    const debugConfig = emptyDebugConfig();
    for (const component of LOG_COMPONENTS) {
      debugConfig[component] = config.getConfig<boolean>(LOGGING_DEBUG_SECTION, component, false);
    }
    this.debugConfig = debugConfig;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Check if debug logging is enabled for a component.
   */
  isDebugEnabled(component: LogComponent, threshold: LogLevel = this.level): boolean {
    return threshold === 'debug' || this.debugConfig[component];
  }

  private shouldWrite(level: LogLevel, component: LogComponent, threshold: LogLevel): boolean {
    if (level === 'debug') {
      return this.isDebugEnabled(component, threshold);
    }
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  private formatMessage(level: LogLevel, component: LogComponent, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase();
    return `[${timestamp}] [${levelStr}] [Toolwright:${component}] ${message}`;
  }

  /**
   * Write a log entry. Structured data is passed to the console untouched.
   *
   * @param threshold - Level threshold to apply instead of the logger's own
   */
  log(level: LogLevel, component: LogComponent, message: string, data?: unknown, threshold: LogLevel = this.level): void {
    if (!this.shouldWrite(level, component, threshold)) {
      return;
    }

    const line = this.formatMessage(level, component, message);
    const consoleFn = level === 'error' ? console.error :
                      level === 'warn' ? console.warn :
                      level === 'debug' ? console.debug :
                      console.log;
    if (data === undefined) {
      consoleFn(line);
    } else {
      consoleFn(line, data);
    }
  }

  debug(component: LogComponent, message: string, data?: unknown): void {
    this.log('debug', component, message, data);
  }

  info(component: LogComponent, message: string, data?: unknown): void {
    this.log('info', component, message, data);
  }

  warn(component: LogComponent, message: string, data?: unknown): void {
    this.log('warn', component, message, data);
  }

  error(component: LogComponent, message: string, data?: unknown): void {
    this.log('error', component, message, data);
  }
}

/**
 * Component-scoped logger.
 *
 * Resolves the process-wide {@link Logger} on every call, so loggers created
 * at module load pick up a later {@link Logger.initialize}. A level set here
 * overrides the shared threshold for this component logger only.
 */
export class ComponentLogger implements ILogger {
  private levelOverride: LogLevel | undefined;

  constructor(private readonly component: LogComponent) {}

  private write(level: LogLevel, message: string, data: unknown): void {
    const logger = Logger.current();
    logger.log(level, this.component, message, data, this.levelOverride ?? logger.getLevel());
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  isDebugEnabled(): boolean {
    const logger = Logger.current();
    return logger.isDebugEnabled(this.component, this.levelOverride ?? logger.getLevel());
  }

  setLevel(level: LogLevel): void {
    this.levelOverride = level;
  }

  getLevel(): LogLevel {
    return this.levelOverride ?? Logger.current().getLevel();
  }
}
