/**
 * @fileoverview Executable discovery across platforms.
 *
 * Lookup order:
 * 1. PATH probe: run `<tool> --version`; when it succeeds, resolve the
 *    backing file with `which` (POSIX) or `where` (Windows).
 * 2. Well-known install locations for the host OS family.
 *
 * A candidate qualifies when it exists, is a regular file and is executable.
 * A missing tool is reported as `undefined`, never thrown.
 *
 * @module process/executableLocator
 */

import * as path from 'path';
import type { IEnvironment } from '../interfaces/IEnvironment';
import type { IFileSystem } from '../interfaces/IFileSystem';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';
import { createInvocation } from './invocation';
import type { ProcessRunner } from './processRunner';
import { succeeded } from './result';

/** Default time allowed for each probe command. */
export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

const POSIX_PREFIXES = ['/usr/bin', '/usr/local/bin', '/opt/homebrew/bin', '/snap/bin'];

const WINDOWS_DRIVES = 'CDEFGHIJKLMNOPQRSTUVWXYZ'.split('');

/**
 * Install layout of one tool.
 */
interface ToolLayout {
  /** File names tried on Windows, in order. */
  windowsExecutables: string[];
  /** Directories under `Program Files` / `Program Files (x86)`. */
  programFilesDirs: string[];
  /** Scoop app name and the sub-directories of `current` holding binaries. */
  scoop: { app: string; dirs: string[] };
  /** Extra POSIX directories, `~` meaning the home directory. */
  posixDirs: string[];
}

const TOOL_LAYOUTS: Record<string, ToolLayout> = {
  git: {
    windowsExecutables: ['git.exe'],
    programFilesDirs: ['Git\\bin', 'Git\\cmd'],
    scoop: { app: 'git', dirs: ['bin', 'cmd'] },
    posixDirs: [],
  },
  gradle: {
    windowsExecutables: ['gradle.bat', 'gradle.exe'],
    programFilesDirs: ['Gradle\\bin'],
    scoop: { app: 'gradle', dirs: ['bin'] },
    posixDirs: ['/opt/gradle/bin', '~/.sdkman/candidates/gradle/current/bin'],
  },
};

function layoutFor(toolName: string): ToolLayout {
  const known = TOOL_LAYOUTS[toolName];
  if (known) {
    return known;
  }
  const titled = toolName.charAt(0).toUpperCase() + toolName.slice(1);
  return {
    windowsExecutables: [`${toolName}.exe`],
    programFilesDirs: [`${titled}\\bin`],
    scoop: { app: toolName, dirs: ['bin'] },
    posixDirs: [],
  };
}

export interface ExecutableLocatorOptions {
  runner: ProcessRunner;
  fileSystem: IFileSystem;
  environment: IEnvironment;
  logger?: ILogger;
}

/**
 * Finds the binary backing an external tool.
 */
function isBlank(toolName: string): boolean {
  return toolName.trim().length === 0;
}

export class ExecutableLocator {
  private readonly runner: ProcessRunner;
  private readonly fileSystem: IFileSystem;
  private readonly environment: IEnvironment;
  private readonly log: ILogger;

  constructor(options: ExecutableLocatorOptions) {
    this.runner = options.runner;
    this.fileSystem = options.fileSystem;
    this.environment = options.environment;
    this.log = options.logger ?? Logger.for('locator');
  }

  private get isWindows(): boolean {
    return this.environment.platform === 'win32';
  }

  /**
   * Locate a tool.
   *
   * When the PATH probe succeeds but no concrete file can be resolved and no
   * well-known location qualifies, the bare tool name is returned: the tool
   * runs, its file is just not visible.
   *
   * @returns Absolute path (or bare name, see above), or undefined when the tool is not installed
   *   or the name is blank
   */
  async locate(toolName: string, probeTimeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS): Promise<string | undefined> {
    if (isBlank(toolName)) {
      this.log.debug('Ignoring lookup of a blank tool name');
      return undefined;
    }
    const onPath = await this.probeOnPath(toolName, probeTimeoutMs);
    if (onPath.resolved) {
      this.log.info(`Found ${toolName} on PATH`, { path: onPath.resolved });
      return onPath.resolved;
    }

    for (const candidate of await this.candidatePaths(toolName)) {
      if (await this.fileSystem.isExecutableFileAsync(candidate)) {
        this.log.info(`Found ${toolName} at well-known location`, { path: candidate });
        return candidate;
      }
    }

    if (onPath.runnable) {
      this.log.info(`${toolName} runs from PATH but its file could not be resolved`);
      return toolName;
    }

    this.log.info(`${toolName} not found`);
    return undefined;
  }

  /**
   * Every qualifying file, PATH results first, without duplicates.
   */
  async locateAll(toolName: string, probeTimeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS): Promise<string[]> {
    if (isBlank(toolName)) {
      this.log.debug('Ignoring lookup of a blank tool name');
      return [];
    }
    const found: string[] = [];
    const add = (file: string): void => {
      if (!found.includes(file)) {
        found.push(file);
      }
    };

    const onPath = await this.probeOnPath(toolName, probeTimeoutMs);
    onPath.all.forEach(add);

    for (const candidate of await this.candidatePaths(toolName)) {
      if (await this.fileSystem.isExecutableFileAsync(candidate)) {
        add(candidate);
      }
    }
    return found;
  }

  /**
   * Well-known install locations for the host, in lookup order. Only
   * Windows drives whose root exists are enumerated.
   */
  async candidatePaths(toolName: string): Promise<string[]> {
    const layout = layoutFor(toolName);
    return this.isWindows ? this.windowsCandidates(layout) : this.posixCandidates(toolName, layout);
  }

  private async windowsCandidates(layout: ToolLayout): Promise<string[]> {
    const win = path.win32;
    const candidates: string[] = [];

    for (const drive of WINDOWS_DRIVES) {
      const root = `${drive}:\\`;
      if (!(await this.fileSystem.existsAsync(root))) {
        continue;
      }
      for (const programFiles of ['Program Files', 'Program Files (x86)']) {
        for (const dir of layout.programFilesDirs) {
          for (const exe of layout.windowsExecutables) {
            candidates.push(win.join(root, programFiles, dir, exe));
          }
        }
      }
      for (const exe of layout.windowsExecutables) {
        candidates.push(win.join(root, 'ProgramData', 'chocolatey', 'bin', exe));
      }
    }

    const home = this.environment.homedir();
    for (const exe of layout.windowsExecutables) {
      candidates.push(win.join(home, 'scoop', 'shims', exe));
    }
    for (const dir of layout.scoop.dirs) {
      for (const exe of layout.windowsExecutables) {
        candidates.push(win.join(home, 'scoop', 'apps', layout.scoop.app, 'current', dir, exe));
      }
    }
    return candidates;
  }

  private posixCandidates(toolName: string, layout: ToolLayout): string[] {
    const home = this.environment.homedir();
    return [...POSIX_PREFIXES, ...layout.posixDirs]
      .map(dir => (dir.startsWith('~/') ? path.posix.join(home, dir.slice(2)) : dir))
      .map(dir => path.posix.join(dir, toolName));
  }

  private async probeOnPath(
    toolName: string,
    probeTimeoutMs: number,
  ): Promise<{ runnable: boolean; resolved?: string; all: string[] }> {
    const probe = await this.runner.run(createInvocation(toolName, ['--version'], { timeoutMs: probeTimeoutMs }));
    if (!succeeded(probe)) {
      this.log.debug(`PATH probe failed for ${toolName}`, {
        exitCode: probe.exitCode,
        timedOut: probe.timedOut,
        spawnError: probe.spawnError,
      });
      return { runnable: false, all: [] };
    }

    const resolver = this.isWindows ? 'where' : 'which';
    const lookup = await this.runner.run(createInvocation(resolver, [toolName], { timeoutMs: probeTimeoutMs }));
    if (!succeeded(lookup)) {
      return { runnable: true, all: [] };
    }

    const all: string[] = [];
    for (const line of lookup.stdout) {
      const file = line.trim();
      if (file.length > 0 && await this.fileSystem.isExecutableFileAsync(file)) {
        all.push(file);
      }
    }
    return { runnable: true, resolved: all[0], all };
  }
}
