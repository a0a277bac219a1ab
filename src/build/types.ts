/**
 * @fileoverview Build tool request and model types.
 *
 * @module build/types
 */

import { InvalidInvocationError } from '../core/errors';

// ─── Requests ──────────────────────────────────────────────────────────────

/**
 * How the build tool renders its console output.
 */
export type ConsoleMode = 'rich' | 'plain' | 'quiet';

/**
 * One build task to run, with its options. Immutable.
 */
export interface BuildTaskDescriptor {
  /** Fully-qualified task path, e.g. `:app:build`. */
  readonly taskPath: string;
  readonly additionalArgs: readonly string[];
  readonly systemProperties: Readonly<Record<string, string>>;
  /** Overlay on the process environment. */
  readonly environment: Readonly<Record<string, string>>;
  readonly offline: boolean;
  readonly refreshDependencies: boolean;
  /** Wait for a debugger on a free port before running. */
  readonly debug: boolean;
  readonly consoleMode: ConsoleMode;
}

export type BuildTaskOptions = Partial<Omit<BuildTaskDescriptor, 'taskPath'>>;

/**
 * Build a descriptor with defaults: no extra arguments or properties,
 * online, plain console.
 *
 * @throws InvalidInvocationError for a blank task path or a system property
 * name containing `=`
 */
export function createBuildTaskDescriptor(taskPath: string, options: BuildTaskOptions = {}): BuildTaskDescriptor {
  const trimmed = taskPath.trim();
  if (trimmed.length === 0) {
    throw new InvalidInvocationError('Build task path must not be blank');
  }
  const systemProperties = { ...options.systemProperties };
  for (const name of Object.keys(systemProperties)) {
    if (name.length === 0 || name.includes('=')) {
      throw new InvalidInvocationError(`Invalid system property name '${name}'`);
    }
  }
  return Object.freeze({
    taskPath: trimmed,
    additionalArgs: Object.freeze([...(options.additionalArgs ?? [])]),
    systemProperties: Object.freeze(systemProperties),
    environment: Object.freeze({ ...options.environment }),
    offline: options.offline ?? false,
    refreshDependencies: options.refreshDependencies ?? false,
    debug: options.debug ?? false,
    consoleMode: options.consoleMode ?? 'plain',
  });
}

// ─── Model ─────────────────────────────────────────────────────────────────

export interface BuildTaskModel {
  /** Full path, e.g. `:app:compileJava`. */
  readonly path: string;
  readonly name: string;
  /** Group heading the task was listed under, e.g. `Build`. */
  readonly group: string;
  readonly description: string;
}

export interface BuildProjectModel {
  /** Project path; `:` for the root project. */
  readonly path: string;
  readonly name: string;
  readonly tasks: readonly BuildTaskModel[];
}

/**
 * What the build tool reports about a project directory.
 */
export interface BuildModel {
  readonly gradleVersion: string;
  readonly rootDir: string;
  /** Root project first, then subprojects in the order they were first seen. */
  readonly projects: readonly BuildProjectModel[];
}

export function findTask(model: BuildModel, taskPath: string): BuildTaskModel | undefined {
  for (const project of model.projects) {
    const task = project.tasks.find(candidate => candidate.path === taskPath);
    if (task) {
      return task;
    }
  }
  return undefined;
}
