/**
 * @fileoverview Build module - Gradle tasks and the build model.
 *
 * ## Usage
 *
 * ```typescript
 * import * as build from './build';
 *
 * const gradle = new build.GradleService({ projectDir, runner, locator, fileSystem });
 * const model = await gradle.refreshModel();
 * const handle = await gradle.runTask(build.createBuildTaskDescriptor(':app:test', { offline: true }));
 * ```
 *
 * @module build
 */

// =============================================================================
// Model and Parsers
// =============================================================================

export * from './types';
export * from './buildArguments';
export * from './tasksReportParser';
export * from './helpParser';
export * from './progressParser';

// =============================================================================
// Service
// =============================================================================

export * from './freePort';
export * from './gradleService';
