/**
 * @fileoverview Porcelain v1 status parsing.
 *
 * Two input shapes are accepted:
 *
 * - text lines, `XY path` or `XY old -> new`, with C-style quoting for
 *   unusual paths (`git status --porcelain=v1`)
 * - NUL separated records, where a rename or copy is followed by a record
 *   holding the prior path (`git status --porcelain=v1 -b -z`)
 *
 * A line that does not fit either shape is skipped and counted; the rest of
 * the status is still returned.
 *
 * @module git/statusParser
 */

import * as path from 'path';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import { createFileChange, isStatusCode, type FileChange, type StatusCode } from './fileChange';

export const UNKNOWN_BRANCH = '(unknown)';
export const DETACHED_BRANCH = '(detached)';

/**
 * Snapshot of a working tree. Rebuilt on every refresh, never mutated.
 */
export interface RepositoryStatus {
  readonly repositoryRoot: string;
  readonly branch: string;
  readonly upstream?: string;
  readonly ahead: number;
  readonly behind: number;
  readonly changes: readonly FileChange[];
}

export interface BranchInfo {
  branch: string;
  upstream?: string;
  ahead: number;
  behind: number;
}

export interface StatusReport {
  status: RepositoryStatus;
  /** Lines or records that could not be parsed. */
  skipped: number;
}

const HEADER_PREFIX = '## ';
const RENAME_ARROW = ' -> ';

/**
 * Parse the text after `## ` in a branch header.
 *
 * ```
 * main...origin/main [ahead 1, behind 2]
 * HEAD (no branch)
 * No commits yet on main
 * ```
 */
export function parseBranchHeader(header: string): BranchInfo {
  let text = header.trim();
  if (text.startsWith(HEADER_PREFIX.trim())) {
    text = text.slice(2).trim();
  }

  const bracket = /\[([^\]]*)\]/.exec(text);
  const counts = bracket ? bracket[1] : '';
  const ahead = Number(/ahead (\d+)/.exec(counts)?.[1] ?? 0);
  const behind = Number(/behind (\d+)/.exec(counts)?.[1] ?? 0);

  for (const prefix of ['No commits yet on ', 'Initial commit on ']) {
    if (text.startsWith(prefix)) {
      const branch = text.slice(prefix.length).trim();
      return { branch: branch || UNKNOWN_BRANCH, ahead, behind };
    }
  }
  if (text.startsWith('HEAD (')) {
    return { branch: DETACHED_BRANCH, ahead, behind };
  }

  const head = bracket ? text.slice(0, bracket.index).trim() : text;
  const dots = head.indexOf('...');
  const branch = (dots >= 0 ? head.slice(0, dots) : head).split(' ')[0];
  const upstream = dots >= 0 ? head.slice(dots + 3).split(' ')[0] : '';
  return {
    branch: branch || UNKNOWN_BRANCH,
    ...(upstream ? { upstream } : {}),
    ahead,
    behind,
  };
}

const ESCAPES: Record<string, number> = {
  a: 0x07, b: 0x08, t: 0x09, n: 0x0a, v: 0x0b, f: 0x0c, r: 0x0d, '"': 0x22, '\\': 0x5c,
};

/**
 * Decode a C-style quoted path (`"caf\303\251.txt"`). Unquoted input is
 * returned as is.
 */
export function unquotePath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    return value;
  }
  const body = value.slice(1, -1);
  const bytes: number[] = [];
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\' || i === body.length - 1) {
      bytes.push(...Buffer.from(ch, 'utf8'));
      continue;
    }
    const next = body[i + 1];
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
    } else if (next in ESCAPES) {
      bytes.push(ESCAPES[next]);
      i += 1;
    } else {
      bytes.push(...Buffer.from(next, 'utf8'));
      i += 1;
    }
  }
  return Buffer.from(bytes).toString('utf8');
}

/**
 * Split `old -> new`, honouring quotes around either side.
 */
function splitRenamePaths(text: string): [string, string] | undefined {
  if (text.startsWith('"')) {
    let end = 1;
    while (end < text.length && !(text[end] === '"' && text[end - 1] !== '\\')) {
      end++;
    }
    const rest = text.slice(end + 1);
    if (!rest.startsWith(RENAME_ARROW)) {
      return undefined;
    }
    return [text.slice(0, end + 1), rest.slice(RENAME_ARROW.length)];
  }
  const arrow = text.indexOf(RENAME_ARROW);
  if (arrow < 0) {
    return undefined;
  }
  return [text.slice(0, arrow), text.slice(arrow + RENAME_ARROW.length)];
}

function readCodes(line: string): [StatusCode, StatusCode] | undefined {
  if (line.length < 4 || line[2] !== ' ') {
    return undefined;
  }
  const x = line[0];
  const y = line[1];
  return isStatusCode(x) && isStatusCode(y) ? [x, y] : undefined;
}

function expectsPriorPath(x: StatusCode, y: StatusCode): boolean {
  return x === 'R' || x === 'C' || y === 'R' || y === 'C';
}

/**
 * Parser bound to one repository root; reported paths are resolved against it.
 *
 * @example
 * ```typescript
 * const parser = new StatusParser('/work/repo');
 * parser.parse('R  old.txt -> new.txt');
 * // { path: '/work/repo/new.txt', oldPath: '/work/repo/old.txt', indexStatus: 'R', workTreeStatus: ' ' }
 * ```
 */
export class StatusParser {
  private readonly log: ILogger;

  constructor(readonly repositoryRoot: string, logger?: ILogger) {
    this.log = logger ?? Logger.for('git');
  }

  /**
   * Parse one text status line.
   *
   * @returns undefined for a malformed line or a branch header
   */
  parse(line: string): FileChange | undefined {
    const codes = readCodes(line);
    if (!codes) {
      return undefined;
    }
    const [x, y] = codes;
    const text = line.slice(3);
    if (expectsPriorPath(x, y)) {
      const pair = splitRenamePaths(text);
      if (pair) {
        return createFileChange(this.resolve(unquotePath(pair[1])), x, y, this.resolve(unquotePath(pair[0])));
      }
    }
    return createFileChange(this.resolve(unquotePath(text)), x, y);
  }

  /**
   * Parse every change line of text status output, in order.
   */
  parseAll(output: string): FileChange[] {
    return this.parseReport(output).status.changes.slice();
  }

  /**
   * Parse text status output, including an optional `## ` branch header.
   */
  parseReport(output: string): StatusReport {
    const changes: FileChange[] = [];
    let branch: BranchInfo = { branch: UNKNOWN_BRANCH, ahead: 0, behind: 0 };
    let skipped = 0;

    for (const line of output.split(/\r?\n/)) {
      if (line.length === 0) {
        continue;
      }
      if (line.startsWith(HEADER_PREFIX)) {
        branch = parseBranchHeader(line);
        continue;
      }
      const change = this.parse(line);
      if (change) {
        changes.push(change);
      } else {
        skipped++;
        this.log.debug(`Skipping malformed status line: ${JSON.stringify(line)}`);
      }
    }
    return this.report(branch, changes, skipped);
  }

  /**
   * Parse the records of `status --porcelain=v1 -b -z`.
   */
  parseRecords(records: readonly string[]): StatusReport {
    const changes: FileChange[] = [];
    let branch: BranchInfo = { branch: UNKNOWN_BRANCH, ahead: 0, behind: 0 };
    let skipped = 0;

    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      if (record.length === 0) {
        continue;
      }
      if (record.startsWith(HEADER_PREFIX)) {
        branch = parseBranchHeader(record);
        continue;
      }
      const codes = readCodes(record);
      if (!codes) {
        skipped++;
        this.log.debug(`Skipping malformed status record: ${JSON.stringify(record)}`);
        continue;
      }
      const [x, y] = codes;
      const current = this.resolve(record.slice(3));
      const prior = records[i + 1];
      if (expectsPriorPath(x, y) && prior !== undefined && prior.length > 0) {
        changes.push(createFileChange(current, x, y, this.resolve(prior)));
        i++;
      } else {
        changes.push(createFileChange(current, x, y));
      }
    }
    return this.report(branch, changes, skipped);
  }

  private report(branch: BranchInfo, changes: FileChange[], skipped: number): StatusReport {
    if (skipped > 0) {
      this.log.warn(`Skipped ${skipped} malformed status entr${skipped === 1 ? 'y' : 'ies'}`);
    }
    const status: RepositoryStatus = Object.freeze({
      repositoryRoot: this.repositoryRoot,
      ...branch,
      changes: Object.freeze(changes),
    });
    return { status, skipped };
  }

  private resolve(relativePath: string): string {
    return path.resolve(this.repositoryRoot, relativePath);
  }
}
