/**
 * @fileoverview Git client - runs git commands and parses their output.
 *
 * Operations whose contract needs the command to succeed throw
 * {@link GitCommandError}. Queries that git answers with a non-zero exit
 * when the value is simply absent (`config --get`, `@{u}`) return
 * undefined instead; they still throw on timeout and cancellation.
 *
 * @module git/gitClient
 */

import * as path from 'path';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import { GitCommandError } from '../core/errors';
import type { CancellationToken } from '../process/cancellation';
import type { ProcessRunner } from '../process/processRunner';
import { allStdout, firstStdoutLine, succeeded } from '../process/result';
import type { CaptureMode, CommandInvocation, ExecutionResult } from '../process/types';
import { parseCommitPage, type CommitPage } from './commitParser';
import { parseDiff, type DiffFile } from './diffParser';
import {
  DEFAULT_GIT_TIMEOUTS,
  commitCommand,
  configGetCommand,
  diffCommand,
  isInsideWorkTreeCommand,
  logPageCommand,
  numstatCommand,
  remotesCommand,
  showTopLevelCommand,
  stageCommand,
  statusCommand,
  unstageCommand,
  upstreamCommand,
  versionCommand,
  type CommitRequest,
  type DiffMode,
  type GitCommandContext,
  type GitTimeouts,
} from './gitCommands';
import { signingStatusFrom, type GitIdentity } from './identity';
import { parseNumstat, type NumstatEntry } from './numstatParser';
import { parseRemotes, parseUpstream, type GitRemote, type GitUpstream } from './remoteParser';
import { StatusParser, type RepositoryStatus } from './statusParser';

export interface GitRepository {
  /** Absolute path of the work tree's top level. */
  readonly root: string;
}

export interface GitClientOptions {
  runner: ProcessRunner;
  /** Path of the git executable (default: `git` on PATH). */
  executable?: string;
  timeouts?: Partial<GitTimeouts>;
  logger?: ILogger;
}

interface RunSettings {
  captureMode?: CaptureMode;
  cancellation?: CancellationToken;
}

export class GitClient {
  private readonly runner: ProcessRunner;
  private readonly log: ILogger;
  private readonly timeouts: GitTimeouts;
  private executable: string;

  constructor(options: GitClientOptions) {
    this.runner = options.runner;
    this.log = options.logger ?? Logger.for('git');
    this.timeouts = { ...DEFAULT_GIT_TIMEOUTS, ...options.timeouts };
    this.executable = options.executable ?? 'git';
  }

  /** Executable and timeouts used for every command. */
  get context(): GitCommandContext {
    return { executable: this.executable, timeouts: { ...this.timeouts } };
  }

  setExecutable(executable: string): void {
    this.executable = executable;
  }

  // ─── Repository ──────────────────────────────────────────────────────────

  /**
   * Find the work tree containing `directory`.
   *
   * @returns undefined when the directory is not inside a work tree or git
   * could not answer
   */
  async detectRepository(directory: string): Promise<GitRepository | undefined> {
    const inside = await this.runner.run(isInsideWorkTreeCommand(this.context, directory));
    if (!succeeded(inside)) {
      if (inside.timedOut || inside.cancelled) {
        this.log.warn(`Repository check did not finish for ${directory}`);
      }
      return undefined;
    }
    if (firstStdoutLine(inside)?.toLowerCase() !== 'true') {
      return undefined;
    }

    const topLevel = await this.runner.run(showTopLevelCommand(this.context, directory));
    const root = succeeded(topLevel) ? firstStdoutLine(topLevel) : undefined;
    if (!root) {
      this.log.warn(`Could not resolve the top level of ${directory}`);
      return undefined;
    }
    return { root: path.resolve(root) };
  }

  /**
   * Branch, ahead/behind counts and changes of the work tree.
   *
   * @throws GitCommandError when `git status` does not succeed
   */
  async getStatus(repository: GitRepository, cancellation?: CancellationToken): Promise<RepositoryStatus> {
    const result = await this.runRequired('status', statusCommand(this.context, repository.root), {
      captureMode: 'records',
      cancellation,
    });
    return new StatusParser(repository.root, this.log).parseRecords(result.stdout).status;
  }

  // ─── Index and Commits ───────────────────────────────────────────────────

  async stage(repository: GitRepository, paths: readonly string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    await this.runRequired('add', stageCommand(this.context, repository.root, paths));
  }

  async unstage(repository: GitRepository, paths: readonly string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    await this.runRequired('restore', unstageCommand(this.context, repository.root, paths));
  }

  async commit(repository: GitRepository, request: CommitRequest): Promise<void> {
    await this.runRequired('commit', commitCommand(this.context, repository.root, request));
    this.log.info(`Committed in ${repository.root}: ${request.message}`);
  }

  // ─── Remotes ─────────────────────────────────────────────────────────────

  async getRemotes(repository: GitRepository): Promise<GitRemote[]> {
    const result = await this.runRequired('remote', remotesCommand(this.context, repository.root));
    return parseRemotes(result.stdout);
  }

  /**
   * @returns undefined when the current branch tracks nothing
   */
  async getUpstream(repository: GitRepository): Promise<GitUpstream | undefined> {
    const result = await this.runOptional('rev-parse', upstreamCommand(this.context, repository.root));
    return result ? parseUpstream(allStdout(result)) : undefined;
  }

  // ─── History ─────────────────────────────────────────────────────────────

  async getDiff(repository: GitRepository, filePath: string, mode: DiffMode = 'unstaged'): Promise<DiffFile[]> {
    const result = await this.runRequired('diff', diffCommand(this.context, repository.root, filePath, mode), {
      captureMode: 'whole',
    });
    return parseDiff(allStdout(result), this.log);
  }

  async getNumstat(repository: GitRepository, commitHash: string): Promise<NumstatEntry[]> {
    const result = await this.runRequired('show', numstatCommand(this.context, repository.root, commitHash));
    return parseNumstat(result.stdout);
  }

  async getRecentCommits(repository: GitRepository, limit: number, cursor?: string): Promise<CommitPage> {
    const result = await this.runRequired('log', logPageCommand(this.context, repository.root, limit, cursor), {
      captureMode: 'whole',
    });
    return parseCommitPage(allStdout(result), limit, this.log);
  }

  // ─── Configuration ───────────────────────────────────────────────────────

  /**
   * @returns undefined when the key is not set
   */
  async getConfigValue(key: string, repository?: GitRepository): Promise<string | undefined> {
    const result = await this.runOptional('config', configGetCommand(this.context, key, repository?.root));
    const value = result ? firstStdoutLine(result) : undefined;
    return value ? value : undefined;
  }

  /**
   * @returns undefined when git cannot be run
   */
  async getVersion(): Promise<string | undefined> {
    const result = await this.runner.run(versionCommand(this.context));
    if (result.timedOut || result.cancelled) {
      throw new GitCommandError('--version', result);
    }
    return succeeded(result) ? firstStdoutLine(result) || undefined : undefined;
  }

  async getIdentity(repository?: GitRepository): Promise<GitIdentity> {
    const [userName, userEmail, gpgSign, gpgFormat, signingKey, program, version] = await Promise.all([
      this.getConfigValue('user.name', repository),
      this.getConfigValue('user.email', repository),
      this.getConfigValue('commit.gpgsign', repository),
      this.getConfigValue('gpg.format', repository),
      this.getConfigValue('user.signingkey', repository),
      this.getConfigValue('gpg.program', repository),
      this.getVersion(),
    ]);
    return {
      ...(userName ? { userName } : {}),
      ...(userEmail ? { userEmail } : {}),
      signing: signingStatusFrom(gpgSign, gpgFormat, signingKey, program),
      ...(version ? { version } : {}),
    };
  }

  // ─── Execution ───────────────────────────────────────────────────────────

  private async runRequired(command: string, invocation: CommandInvocation, settings: RunSettings = {}): Promise<ExecutionResult> {
    const result = await this.runner.run(invocation, settings);
    if (!succeeded(result)) {
      throw new GitCommandError(command, result);
    }
    return result;
  }

  /**
   * Resolve with the result on success and undefined on a plain non-zero
   * exit; throw when the command timed out, was cancelled or never started.
   */
  private async runOptional(command: string, invocation: CommandInvocation): Promise<ExecutionResult | undefined> {
    const result = await this.runner.run(invocation);
    if (result.timedOut || result.cancelled || result.spawnError !== undefined) {
      throw new GitCommandError(command, result);
    }
    return succeeded(result) ? result : undefined;
  }
}
