/**
 * @fileoverview Process utilities for tree termination.
 * 
 * Children spawned by the runner on POSIX lead their own process group, so
 * signalling the negated pid reaches every descendant. Windows has no
 * process groups; `taskkill /T` walks the tree instead.
 * 
 * @module process/processHelpers
 */

import type { ChildProcessLike, IProcessSpawner } from '../interfaces/IProcessSpawner';
import type { ILogger } from '../interfaces/ILogger';
import { Logger } from '../core/logger';

/**
 * Execute a command and return stdout as string.
 * 
 * @param timeoutMs - Timeout in milliseconds (default: 5000)
 * @throws Error if the command exits non-zero, fails to start, or times out
 */
export function execCommand(
  spawner: IProcessSpawner, 
  command: string, 
  args: string[], 
  timeoutMs = 5000
): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawner.spawn(command, args, {
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true
    });
    
    let stdout = '';
    let stderr = '';
    let killed = false;
    
    const timer = setTimeout(() => {
      killed = true;
      proc.kill('SIGTERM');
      reject(new Error(`Command timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    
    proc.stdout?.on('data', (data: Buffer | string) => { 
      stdout += data.toString(); 
    });
    
    proc.stderr?.on('data', (data: Buffer | string) => { 
      stderr += data.toString(); 
    });
    
    proc.on('close', (code) => {
      clearTimeout(timer);
      if (killed) {return;}
      
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(`Command failed with code ${code}: ${stderr}`));
      }
    });
    
    proc.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}

/**
 * Strategy for ending a child process together with its descendants.
 */
export interface ProcessTerminator {
  /**
   * @param force - false asks politely (SIGTERM), true kills (SIGKILL, taskkill /F)
   */
  terminate(child: ChildProcessLike, force: boolean): Promise<void>;
}

/**
 * Kill a process tree using platform-specific methods.
 * 
 * @param pid - Process ID (the group leader on POSIX)
 * @param force - Whether to force kill (default: false)
 * @param timeoutMs - Timeout for the taskkill call on Windows (default: 5000)
 * @returns true when the signal was delivered or the process was already gone
 */
export async function killProcessTree(
  spawner: IProcessSpawner,
  pid: number,
  force = false,
  timeoutMs = 5000,
  platform: NodeJS.Platform = process.platform,
  log: ILogger = Logger.for('process'),
): Promise<boolean> {
  if (platform === 'win32') {
    const args = force 
      ? ['/F', '/T', '/PID', String(pid)]
      : ['/T', '/PID', String(pid)];
    
    try {
      await execCommand(spawner, 'taskkill', args, timeoutMs);
      return true;
    } catch (e) {
      log.warn(`Failed to kill Windows process tree ${pid}`, e);
      return false;
    }
  }

  const signal = force ? 'SIGKILL' : 'SIGTERM';
  try {
    process.kill(-pid, signal);
    return true;
  } catch (e) {
    // Process group may already be gone
    if (e instanceof Error && 'code' in e && e.code === 'ESRCH') {
      return true;
    }
    log.warn(`Failed to signal process group ${pid}`, e);
    return false;
  }
}

/**
 * Default terminator: tree kill first, direct kill of the child as fallback.
 */
export class ProcessTreeTerminator implements ProcessTerminator {
  constructor(
    private readonly spawner: IProcessSpawner,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly log: ILogger = Logger.for('process'),
  ) {}

  async terminate(child: ChildProcessLike, force: boolean): Promise<void> {
    if (child.pid === undefined) {
      return;
    }
    const exited = child.exitCode !== null;
    // On POSIX the group outlives its leader; taskkill needs a live parent.
    if (exited && this.platform === 'win32') {
      return;
    }
    const delivered = await killProcessTree(this.spawner, child.pid, force, 5000, this.platform, this.log);
    if (!delivered && !exited) {
      child.kill(force ? 'SIGKILL' : 'SIGTERM');
    }
  }
}
