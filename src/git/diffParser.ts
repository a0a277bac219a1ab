/**
 * @fileoverview Unified diff parsing.
 *
 * Turns `git diff --no-color` output into files, hunks and lines numbered
 * on both sides. Lines that fit nowhere are logged and skipped.
 *
 * @module git/diffParser
 */

import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';

export type DiffLineType = 'context' | 'addition' | 'deletion';

export interface DiffLine {
  type: DiffLineType;
  /** Line number in the old file; absent for additions. */
  oldLineNumber?: number;
  /** Line number in the new file; absent for deletions. */
  newLineNumber?: number;
  content: string;
  /** Followed by `\ No newline at end of file`. */
  noNewlineAtEnd: boolean;
}

export interface DiffHunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Text after the closing `@@`, usually the enclosing function. */
  sectionHeader: string;
  lines: DiffLine[];
}

export interface DiffFile {
  /** Absent for a new file. */
  oldPath?: string;
  /** Absent for a deleted file. */
  newPath?: string;
  binary: boolean;
  /** Extended header lines between `diff --git` and the first hunk. */
  headers: string[];
  hunks: DiffHunk[];
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@ ?(.*)$/;
const NO_NEWLINE = '\\ No newline at end of file';
const DEV_NULL = '/dev/null';

function stripPrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

function parseGitHeader(line: string): DiffFile {
  const body = line.slice('diff --git '.length);
  const split = body.indexOf(' b/');
  const oldPath = split >= 0 ? body.slice(0, split) : body;
  const newPath = split >= 0 ? body.slice(split + 1) : body;
  return {
    oldPath: stripPrefix(oldPath, 'a/'),
    newPath: stripPrefix(newPath, 'b/'),
    binary: false,
    headers: [],
    hunks: [],
  };
}

export function isNewFile(file: DiffFile): boolean {
  return file.oldPath === undefined;
}

export function isDeletedFile(file: DiffFile): boolean {
  return file.newPath === undefined;
}

/**
 * Parse a unified diff.
 *
 * @example
 * ```typescript
 * const [file] = parseDiff(result.stdout.join('\n'));
 * const added = file.hunks.flatMap(h => h.lines).filter(l => l.type === 'addition').length;
 * ```
 */
export function parseDiff(raw: string, logger?: ILogger): DiffFile[] {
  const log = logger ?? Logger.for('git');
  const files: DiffFile[] = [];
  let file: DiffFile | undefined;
  let hunk: DiffHunk | undefined;
  let oldLine = 0;
  let newLine = 0;

  for (const line of raw.split(/\r?\n/)) {
    if (line.startsWith('diff --git ')) {
      file = parseGitHeader(line);
      hunk = undefined;
      files.push(file);
      continue;
    }
    if (!file) {
      continue;
    }

    if (line.startsWith('@@ ')) {
      const match = HUNK_HEADER.exec(line);
      if (!match) {
        log.debug(`Skipping malformed hunk header: ${line}`);
        hunk = undefined;
        continue;
      }
      hunk = {
        oldStart: Number(match[1]),
        oldCount: match[2] === undefined ? 1 : Number(match[2]),
        newStart: Number(match[3]),
        newCount: match[4] === undefined ? 1 : Number(match[4]),
        sectionHeader: match[5].trim(),
        lines: [],
      };
      file.hunks.push(hunk);
      oldLine = hunk.oldStart;
      newLine = hunk.newStart;
      continue;
    }

    if (hunk) {
      const prefix = line.charAt(0);
      const content = line.slice(1);
      if (prefix === ' ') {
        hunk.lines.push({ type: 'context', oldLineNumber: oldLine++, newLineNumber: newLine++, content, noNewlineAtEnd: false });
      } else if (prefix === '+') {
        hunk.lines.push({ type: 'addition', newLineNumber: newLine++, content, noNewlineAtEnd: false });
      } else if (prefix === '-') {
        hunk.lines.push({ type: 'deletion', oldLineNumber: oldLine++, content, noNewlineAtEnd: false });
      } else if (line.startsWith(NO_NEWLINE)) {
        const previous = hunk.lines[hunk.lines.length - 1];
        if (previous) {
          previous.noNewlineAtEnd = true;
        }
      } else if (line.length > 0) {
        log.debug(`Skipping unrecognized diff line: ${line}`);
      }
      continue;
    }

    file.headers.push(line);
    if (line.startsWith('Binary files ') || line === 'GIT binary patch') {
      file.binary = true;
    } else if (line.startsWith('new file mode')) {
      file.oldPath = undefined;
    } else if (line.startsWith('deleted file mode')) {
      file.newPath = undefined;
    } else if (line.startsWith('--- ')) {
      const target = line.slice(4).trim();
      file.oldPath = target === DEV_NULL ? undefined : stripPrefix(target, 'a/');
    } else if (line.startsWith('+++ ')) {
      const target = line.slice(4).trim();
      file.newPath = target === DEV_NULL ? undefined : stripPrefix(target, 'b/');
    }
  }
  return files;
}
