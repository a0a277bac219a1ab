/**
 * @fileoverview Change tree construction.
 *
 * Groups a flat change list into directories below a "changes root". After
 * the grouping pass, every directory whose only child is a single directory
 * is merged with it, so `src/main/java` with nothing else along the way is
 * one node labelled `src/main/java` rather than three nested ones.
 *
 * At each level directories come first, ordered lexicographically by their
 * relative path, followed by files in input order.
 *
 * @module git/changeTree
 */

import * as path from 'path';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import { ChangePathOutsideRepositoryError } from '../core/errors';
import { changeListsEqual, type FileChange } from './fileChange';

export interface FileNode {
  readonly kind: 'file';
  /** Relative path from the repository root, `/` separated. */
  readonly relativePath: string;
  readonly name: string;
  readonly change: FileChange;
}

export interface DirectoryNode {
  readonly kind: 'directory';
  /** Relative path of the deepest directory this node stands for. */
  readonly relativePath: string;
  /** Display label; collapsed chains join their segments with `/`. */
  readonly label: string;
  /** Absolute path of the deepest directory. */
  readonly path: string;
  /** Every change at or below this directory, in input order. */
  readonly changes: readonly FileChange[];
  readonly children: readonly ChangeTreeNode[];
}

export type ChangeTreeNode = DirectoryNode | FileNode;

export interface ChangesRootNode {
  readonly kind: 'changesRoot';
  readonly changes: readonly FileChange[];
  readonly children: readonly ChangeTreeNode[];
}

export interface ChangeTreeRoot {
  readonly kind: 'root';
  readonly repositoryRoot: string;
  readonly changesRoot: ChangesRootNode;
}

export type ChangeTreeResult =
  | { readonly kind: 'empty' }
  | { readonly kind: 'tree'; readonly root: ChangeTreeRoot };

interface DraftDirectory {
  relativePath: string;
  label: string;
  changes: FileChange[];
  directories: Map<string, DraftDirectory>;
  files: FileNode[];
}

function draftDirectory(relativePath: string, label: string): DraftDirectory {
  return { relativePath, label, changes: [], directories: new Map(), files: [] };
}

function relativeSegments(repositoryRoot: string, change: FileChange): string[] {
  const relative = path.relative(repositoryRoot, change.path);
  const outside = relative.length === 0
    || relative === '..'
    || relative.startsWith(`..${path.sep}`)
    || path.isAbsolute(relative);
  if (outside) {
    throw new ChangePathOutsideRepositoryError(change.path, repositoryRoot);
  }
  return relative.split(path.sep).filter(segment => segment.length > 0);
}

function collapse(directory: DraftDirectory): DraftDirectory {
  let current = directory;
  while (current.files.length === 0 && current.directories.size === 1) {
    const [only] = current.directories.values();
    current = { ...only, label: `${current.label}/${only.label}` };
  }
  return current;
}

function byRelativePath(a: DraftDirectory, b: DraftDirectory): number {
  if (a.relativePath === b.relativePath) {
    return 0;
  }
  return a.relativePath < b.relativePath ? -1 : 1;
}

function finishChildren(repositoryRoot: string, parent: DraftDirectory): ChangeTreeNode[] {
  const directories = [...parent.directories.values()]
    .map(collapse)
    .sort(byRelativePath)
    .map((directory): DirectoryNode => Object.freeze({
      kind: 'directory',
      relativePath: directory.relativePath,
      label: directory.label,
      path: path.join(repositoryRoot, ...directory.relativePath.split('/')),
      changes: Object.freeze(directory.changes),
      children: Object.freeze(finishChildren(repositoryRoot, directory)),
    }));
  return [...directories, ...parent.files];
}

/**
 * Build a tree for one status snapshot, without caching.
 *
 * @throws ChangePathOutsideRepositoryError when a change is not below the root
 */
export function buildChangeTree(repositoryRoot: string, changes: readonly FileChange[]): ChangeTreeResult {
  if (changes.length === 0) {
    return { kind: 'empty' };
  }

  const top = draftDirectory('', '');
  for (const change of changes) {
    const segments = relativeSegments(repositoryRoot, change);
    const name = segments[segments.length - 1];
    let parent = top;
    for (const segment of segments.slice(0, -1)) {
      let directory = parent.directories.get(segment);
      if (!directory) {
        const relativePath = parent.relativePath ? `${parent.relativePath}/${segment}` : segment;
        directory = draftDirectory(relativePath, segment);
        parent.directories.set(segment, directory);
      }
      directory.changes.push(change);
      parent = directory;
    }
    const file: FileNode = { kind: 'file', relativePath: segments.join('/'), name, change };
    parent.files.push(Object.freeze(file));
  }

  const changesRoot: ChangesRootNode = Object.freeze({
    kind: 'changesRoot',
    changes: Object.freeze([...changes]),
    children: Object.freeze(finishChildren(repositoryRoot, top)),
  });
  return { kind: 'tree', root: Object.freeze({ kind: 'root', repositoryRoot, changesRoot }) };
}

/**
 * Builds change trees and skips the work when the input has not changed.
 *
 * @example
 * ```typescript
 * const builder = new ChangeTreeBuilder();
 * const result = builder.build(status.repositoryRoot, status.changes);
 * if (result.kind === 'empty') {
 *   showNoChanges();
 * }
 * ```
 */
export class ChangeTreeBuilder {
  private readonly log: ILogger;
  private last: { repositoryRoot: string; changes: readonly FileChange[]; result: ChangeTreeResult } | undefined;

  constructor(logger?: ILogger) {
    this.log = logger ?? Logger.for('tree');
  }

  /**
   * Build the tree for a snapshot. Returns the previous result object when
   * the root and the changes equal the last call's.
   *
   * @throws ChangePathOutsideRepositoryError when a change is not below the root
   */
  build(repositoryRoot: string, changes: readonly FileChange[]): ChangeTreeResult {
    const last = this.last;
    if (last && last.repositoryRoot === repositoryRoot && changeListsEqual(last.changes, changes)) {
      this.log.debug('Change list unchanged, keeping previous tree');
      return last.result;
    }
    const result = buildChangeTree(repositoryRoot, changes);
    this.last = { repositoryRoot, changes: [...changes], result };
    this.log.debug(`Built change tree for ${changes.length} change(s)`);
    return result;
  }

  /** Forget the last snapshot so the next build starts fresh. */
  reset(): void {
    this.last = undefined;
  }
}
