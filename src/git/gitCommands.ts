/**
 * @fileoverview Invocation builders for every git command the client runs.
 *
 * Builders only describe commands; {@link GitClient} runs them. Every
 * invocation disables interactive credential prompts so a command waiting
 * for input cannot hang until its timeout.
 *
 * @module git/gitCommands
 */

import { createInvocation } from '../process/invocation';
import type { CommandInvocation } from '../process/types';
import { COMMIT_LOG_FORMAT } from './commitParser';

export interface GitTimeouts {
  /** Local queries: status, rev-parse, config, remote. */
  statusMs: number;
  /** fetch and pull. */
  networkMs: number;
  pushMs: number;
  /** commit, diff and log. */
  historyMs: number;
}

export const DEFAULT_GIT_TIMEOUTS: Readonly<GitTimeouts> = Object.freeze({
  statusMs: 5000,
  networkMs: 30000,
  pushMs: 15000,
  historyMs: 10000,
});

/**
 * Executable and limits shared by all commands of one client.
 */
export interface GitCommandContext {
  executable: string;
  timeouts: GitTimeouts;
}

export type DiffMode = 'unstaged' | 'staged' | 'head';

export interface CommitRequest {
  message: string;
  /** Extra paragraph, passed as a second `-m`. */
  description?: string;
  amend?: boolean;
  signOff?: boolean;
  /** Limit the commit to these paths. */
  paths?: readonly string[];
}

export const GIT_ENVIRONMENT: Readonly<Record<string, string>> = Object.freeze({ GIT_TERMINAL_PROMPT: '0' });

function git(
  context: GitCommandContext,
  args: readonly string[],
  timeoutMs: number,
  workingDirectory?: string,
): CommandInvocation {
  return createInvocation(context.executable, args, { environment: GIT_ENVIRONMENT, workingDirectory, timeoutMs });
}

export function statusCommand(context: GitCommandContext, repositoryRoot: string): CommandInvocation {
  return git(context, ['status', '--porcelain=v1', '-b', '-z'], context.timeouts.statusMs, repositoryRoot);
}

export function isInsideWorkTreeCommand(context: GitCommandContext, directory: string): CommandInvocation {
  return git(context, ['rev-parse', '--is-inside-work-tree'], context.timeouts.statusMs, directory);
}

export function showTopLevelCommand(context: GitCommandContext, directory: string): CommandInvocation {
  return git(context, ['rev-parse', '--show-toplevel'], context.timeouts.statusMs, directory);
}

export function stageCommand(context: GitCommandContext, repositoryRoot: string, paths: readonly string[]): CommandInvocation {
  return git(context, ['add', '--', ...paths], context.timeouts.statusMs, repositoryRoot);
}

export function unstageCommand(context: GitCommandContext, repositoryRoot: string, paths: readonly string[]): CommandInvocation {
  return git(context, ['restore', '--staged', '--', ...paths], context.timeouts.statusMs, repositoryRoot);
}

export function commitCommand(context: GitCommandContext, repositoryRoot: string, request: CommitRequest): CommandInvocation {
  const args = ['commit', '-m', request.message];
  if (request.description && request.description.trim().length > 0) {
    args.push('-m', request.description);
  }
  if (request.amend) {
    args.push('--amend');
  }
  if (request.signOff) {
    args.push('--signoff');
  }
  if (request.paths && request.paths.length > 0) {
    args.push('--', ...request.paths);
  }
  return git(context, args, context.timeouts.historyMs, repositoryRoot);
}

export function fetchCommand(context: GitCommandContext, repositoryRoot: string): CommandInvocation {
  return git(context, ['fetch', '--prune', '--progress'], context.timeouts.networkMs, repositoryRoot);
}

export function pullCommand(context: GitCommandContext, repositoryRoot: string): CommandInvocation {
  return git(context, ['pull', '--ff-only', '--progress'], context.timeouts.networkMs, repositoryRoot);
}

export function pushCommand(context: GitCommandContext, repositoryRoot: string): CommandInvocation {
  return git(context, ['push', '--progress'], context.timeouts.pushMs, repositoryRoot);
}

export function remotesCommand(context: GitCommandContext, repositoryRoot: string): CommandInvocation {
  return git(context, ['remote', '-v'], context.timeouts.statusMs, repositoryRoot);
}

export function upstreamCommand(context: GitCommandContext, repositoryRoot: string): CommandInvocation {
  return git(context, ['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{u}'], context.timeouts.statusMs, repositoryRoot);
}

/**
 * `git config --get <key>`, scoped to a repository when one is given.
 */
export function configGetCommand(context: GitCommandContext, key: string, repositoryRoot?: string): CommandInvocation {
  return git(context, ['config', '--get', key], context.timeouts.statusMs, repositoryRoot);
}

export function versionCommand(context: GitCommandContext): CommandInvocation {
  return git(context, ['--version'], context.timeouts.statusMs);
}

export function diffCommand(
  context: GitCommandContext,
  repositoryRoot: string,
  filePath: string,
  mode: DiffMode = 'unstaged',
  contextLines = 3,
): CommandInvocation {
  const args = ['--no-pager', 'diff', '--no-color', `--unified=${contextLines}`];
  if (mode === 'staged') {
    args.push('--cached');
  } else if (mode === 'head') {
    args.push('HEAD');
  }
  args.push('--', filePath);
  return git(context, args, context.timeouts.historyMs, repositoryRoot);
}

/**
 * Added and deleted line counts of one commit.
 */
export function numstatCommand(context: GitCommandContext, repositoryRoot: string, commitHash: string): CommandInvocation {
  return git(context, ['--no-pager', 'show', '--pretty=format:', '--numstat', commitHash], context.timeouts.historyMs, repositoryRoot);
}

/**
 * One page of first-parent history, starting after `cursor` when given.
 */
export function logPageCommand(
  context: GitCommandContext,
  repositoryRoot: string,
  limit: number,
  cursor?: string,
): CommandInvocation {
  const args = [
    '--no-pager', 'log', '--first-parent',
    '-n', String(limit),
    `--pretty=format:${COMMIT_LOG_FORMAT}`,
  ];
  if (cursor && cursor.trim().length > 0) {
    args.push('--skip=1', cursor.trim());
  }
  return git(context, args, context.timeouts.historyMs, repositoryRoot);
}
