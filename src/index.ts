/**
 * @fileoverview Public entry point.
 *
 * ## Usage
 *
 * ```typescript
 * import { createToolServices, createBuildTaskDescriptor } from 'toolwright';
 *
 * const services = await createToolServices({ workspaceDir: '/work/demo' });
 * await services.git.detectRepository('/work/demo');
 * const handle = await services.build.runTask(createBuildTaskDescriptor(':app:test'));
 * ```
 *
 * @module toolwright
 */

// =============================================================================
// Infrastructure
// =============================================================================

export * from './interfaces';
export * from './core/errors';
export { Logger, ComponentLogger, type LogComponent } from './core/logger';
export { FileConfigProvider, InMemoryConfigProvider, DEFAULT_CONFIG_FILE } from './core/config';
export { DefaultFileSystem } from './core/defaultFileSystem';
export { ServiceContainer, ServiceToken } from './core/container';
export * as Tokens from './core/tokens';

// =============================================================================
// Tools
// =============================================================================

export * from './process';
export * from './tasks';
export * from './git';
export * from './build';

// =============================================================================
// Composition
// =============================================================================

export { createContainer, createToolServices, type CompositionOptions, type ToolServices } from './composition';
