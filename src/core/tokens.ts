/**
 * @fileoverview Service tokens for dependency injection container.
 * 
 * Each token carries the type of the service registered under it, so
 * `container.resolve(Tokens.GitManager)` is typed without a type argument.
 * 
 * @module core/tokens
 */

import type * as I from '../interfaces';
import type { ExecutableLocator as ExecutableLocatorService } from '../process/executableLocator';
import type { ProcessRunner as ProcessRunnerService } from '../process/processRunner';
import type { GitClient as GitClientService } from '../git/gitClient';
import type { GitManager as GitManagerService } from '../git/gitManager';
import type { GradleService as GradleServiceClass } from '../build/gradleService';
import type { Logger as LoggerService } from './logger';
import { ServiceToken } from './container';

// ─── Host Abstractions ─────────────────────────────────────────────────────

/**
 * Token for IConfigProvider service.
 * Provides `section.key` configuration lookups.
 */
export const IConfigProvider = new ServiceToken<I.IConfigProvider>('IConfigProvider');

/**
 * Token for IFileSystem service.
 */
export const IFileSystem = new ServiceToken<I.IFileSystem>('IFileSystem');

/**
 * Token for IEnvironment service.
 * Provides environment variables, platform and directories.
 */
export const IEnvironment = new ServiceToken<I.IEnvironment>('IEnvironment');

/**
 * Token for IProcessSpawner service.
 */
export const IProcessSpawner = new ServiceToken<I.IProcessSpawner>('IProcessSpawner');

/**
 * Token for the process-wide Logger, configured from IConfigProvider.
 */
export const Logger = new ServiceToken<LoggerService>('Logger');

// ─── Tool Services ─────────────────────────────────────────────────────────

export const ProcessRunner = new ServiceToken<ProcessRunnerService>('ProcessRunner');

export const ExecutableLocator = new ServiceToken<ExecutableLocatorService>('ExecutableLocator');

export const GitClient = new ServiceToken<GitClientService>('GitClient');

export const GitManager = new ServiceToken<GitManagerService>('GitManager');

export const GradleService = new ServiceToken<GradleServiceClass>('GradleService');
