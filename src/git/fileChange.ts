/**
 * @fileoverview File change records and the predicates derived from their
 * two status codes.
 *
 * A change stores only what git reported: the path, the prior path for
 * renames and copies, and the index and work-tree status characters.
 * Everything else is computed from those two characters.
 *
 * @module git/fileChange
 */

/**
 * One side of a porcelain status pair.
 */
export type StatusCode = ' ' | 'M' | 'A' | 'D' | 'R' | 'C' | 'U' | '?';

export const STATUS_CODES: readonly StatusCode[] = [' ', 'M', 'A', 'D', 'R', 'C', 'U', '?'];

export function isStatusCode(value: string): value is StatusCode {
  return value.length === 1 && STATUS_CODES.some(code => code === value);
}

export interface FileChange {
  /** Absolute path of the file as it is now. */
  readonly path: string;
  /** Absolute path before a rename or copy. */
  readonly oldPath?: string;
  readonly indexStatus: StatusCode;
  readonly workTreeStatus: StatusCode;
}

/**
 * Primary classification of a change, in display priority order.
 */
export type ChangeKind =
  | 'conflict'
  | 'untracked'
  | 'renamed'
  | 'copied'
  | 'added'
  | 'deleted'
  | 'modified'
  | 'unchanged';

export function createFileChange(
  path: string,
  indexStatus: StatusCode,
  workTreeStatus: StatusCode,
  oldPath?: string,
): FileChange {
  return Object.freeze(oldPath === undefined
    ? { path, indexStatus, workTreeStatus }
    : { path, oldPath, indexStatus, workTreeStatus });
}

// ─── Predicates ────────────────────────────────────────────────────────────

function either(change: FileChange, code: StatusCode): boolean {
  return change.indexStatus === code || change.workTreeStatus === code;
}

export function isUntracked(change: FileChange): boolean {
  return change.indexStatus === '?' && change.workTreeStatus === '?';
}

/**
 * Unmerged: any `U`, or both sides added or both deleted.
 */
export function isConflict(change: FileChange): boolean {
  if (either(change, 'U')) {
    return true;
  }
  const pair = statusCodeOf(change);
  return pair === 'AA' || pair === 'DD';
}

export function isModified(change: FileChange): boolean {
  return either(change, 'M');
}

export function isAdded(change: FileChange): boolean {
  return either(change, 'A');
}

export function isDeleted(change: FileChange): boolean {
  return either(change, 'D');
}

export function isRenamed(change: FileChange): boolean {
  return either(change, 'R');
}

export function isCopied(change: FileChange): boolean {
  return either(change, 'C');
}

export function isUnchanged(change: FileChange): boolean {
  return change.indexStatus === ' ' && change.workTreeStatus === ' ';
}

export function isStaged(change: FileChange): boolean {
  return change.indexStatus !== ' ' && !isUntracked(change);
}

export function isUnstaged(change: FileChange): boolean {
  return change.workTreeStatus !== ' ' && !isUntracked(change);
}

/**
 * The kind a change is displayed as. Conflicts win over everything, then
 * untracked files, then the more specific edit kinds.
 */
export function classifyChange(change: FileChange): ChangeKind {
  if (isConflict(change)) { return 'conflict'; }
  if (isUntracked(change)) { return 'untracked'; }
  if (isRenamed(change)) { return 'renamed'; }
  if (isCopied(change)) { return 'copied'; }
  if (isAdded(change)) { return 'added'; }
  if (isDeleted(change)) { return 'deleted'; }
  if (isModified(change)) { return 'modified'; }
  return 'unchanged';
}

/**
 * The two status characters, e.g. `'R '` or `'??'`.
 */
export function statusCodeOf(change: FileChange): string {
  return `${change.indexStatus}${change.workTreeStatus}`;
}

export function fileChangesEqual(a: FileChange, b: FileChange): boolean {
  return a.path === b.path
    && a.oldPath === b.oldPath
    && a.indexStatus === b.indexStatus
    && a.workTreeStatus === b.workTreeStatus;
}

export function changeListsEqual(a: readonly FileChange[], b: readonly FileChange[]): boolean {
  return a.length === b.length && a.every((change, index) => fileChangesEqual(change, b[index]));
}
