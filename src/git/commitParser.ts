/**
 * @fileoverview Parsing of paged `git log` output.
 *
 * The log is requested with {@link COMMIT_LOG_FORMAT}: fields separated by
 * NUL, commits terminated by an ASCII record separator.
 *
 * @module git/commitParser
 */

import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';

export const FIELD_SEPARATOR = '\u0000';
export const RECORD_SEPARATOR = '\u001e';

/** `--pretty=format:` value matching {@link parseCommitPage}. */
export const COMMIT_LOG_FORMAT = '%H%x00%h%x00%s%x00%an%x00%ae%x00%at%x00%cn%x00%ce%x00%ct%x00%P%x1e';

const FIELD_COUNT = 10;

export interface GitCommit {
  hash: string;
  shortHash: string;
  subject: string;
  authorName: string;
  authorEmail: string;
  /** Seconds since the epoch. */
  authorTimestamp: number;
  committerName: string;
  committerEmail: string;
  committerTimestamp: number;
  parentHashes: string[];
}

export interface CommitPage {
  commits: GitCommit[];
  /** Hash to continue from; set only when the page came back full. */
  nextCursor?: string;
}

function parseTimestamp(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid timestamp '${value}'`);
  }
  return Number(value);
}

function parseCommit(fields: readonly string[]): GitCommit {
  const [hash, shortHash, subject, authorName, authorEmail, authorTime, committerName, committerEmail, committerTime, parents] = fields;
  if (hash.trim().length === 0) {
    throw new Error('Commit hash is blank');
  }
  return {
    hash,
    shortHash: shortHash.trim() || hash.slice(0, 7),
    subject,
    authorName,
    authorEmail,
    authorTimestamp: parseTimestamp(authorTime),
    committerName,
    committerEmail,
    committerTimestamp: parseTimestamp(committerTime),
    parentHashes: parents.trim().length === 0 ? [] : parents.trim().split(/\s+/),
  };
}

/**
 * Parse one page of log output. Malformed entries are logged and skipped.
 *
 * @param limit - The page size that was requested
 */
export function parseCommitPage(content: string, limit: number, logger?: ILogger): CommitPage {
  const log = logger ?? Logger.for('git');
  const commits: GitCommit[] = [];

  for (const entry of content.split(RECORD_SEPARATOR)) {
    const trimmed = entry.replace(/^[\r\n]+/, '');
    if (trimmed.trim().length === 0) {
      continue;
    }
    const fields = trimmed.split(FIELD_SEPARATOR);
    if (fields.length < FIELD_COUNT) {
      log.warn(`Malformed commit entry with ${fields.length} fields`);
      continue;
    }
    try {
      commits.push(parseCommit(fields));
    } catch (error) {
      log.warn('Failed to parse commit entry', error);
    }
  }

  const last = commits[commits.length - 1];
  return commits.length === limit && last ? { commits, nextCursor: last.hash } : { commits };
}
