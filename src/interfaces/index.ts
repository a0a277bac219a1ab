/**
 * @fileoverview Central export for all interfaces.
 * 
 * Import interfaces from this module for convenience:
 * ```typescript
 * import { ILogger, IProcessSpawner } from './interfaces';
 * ```
 * 
 * @module interfaces
 */

export * from './ILogger';
export * from './IConfigProvider';
export * from './IEnvironment';
export * from './IFileSystem';
export * from './IProcessSpawner';
