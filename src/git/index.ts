/**
 * @fileoverview Git module - status, change tree and repository operations.
 *
 * ## Architecture
 *
 * - `gitCommands` describes every git command as an invocation
 * - `gitClient` runs them through the process runner and parses the output
 * - `gitManager` keeps the repository status as an engine model and runs
 *   fetch, pull and push as tasks
 * - The parsers and `changeTree` are pure and usable on their own
 *
 * ## Usage
 *
 * ```typescript
 * import * as git from './git';
 *
 * const manager = new git.GitManager({ client: new git.GitClient({ runner }), runner });
 * await manager.detectRepository(workspaceDir);
 * const tree = new git.ChangeTreeBuilder().build(root, manager.getStatus()?.changes ?? []);
 * ```
 *
 * @module git
 */

// =============================================================================
// Model and Parsers
// =============================================================================

export * from './fileChange';
export * from './statusParser';
export * from './changeTree';
export * from './progressParser';
export * from './remoteParser';
export * from './diffParser';
export * from './numstatParser';
export * from './commitParser';
export * from './identity';

// =============================================================================
// Commands and Services
// =============================================================================

export * from './gitCommands';
export * from './gitClient';
export * from './gitManager';
