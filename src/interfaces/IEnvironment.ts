/**
 * @fileoverview Interface for environment abstraction.
 * 
 * Abstracts process.env, process.platform, process.cwd() and the user's home
 * directory so locator and runner code can be tested on any host.
 * 
 * @module interfaces/IEnvironment
 */

import * as os from 'os';

/**
 * Interface for accessing environment information.
 * 
 * @example
 * ```typescript
 * class ScoopShims {
 *   constructor(private readonly env: IEnvironment) {}
 *   
 *   directory(): string {
 *     return path.join(this.env.homedir(), 'scoop', 'shims');
 *   }
 * }
 * ```
 */
export interface IEnvironment {
  /** Environment variables (mirrors process.env) */
  readonly env: Record<string, string | undefined>;

  /** Platform identifier (mirrors process.platform) */
  readonly platform: NodeJS.Platform;

  /** Get the current working directory */
  cwd(): string;

  /** Get the current user's home directory */
  homedir(): string;
}

/**
 * Default environment that delegates to Node.js process globals.
 */
export class DefaultEnvironment implements IEnvironment {
  get env(): Record<string, string | undefined> {
    return process.env;
  }

  get platform(): NodeJS.Platform {
    return process.platform;
  }

  cwd(): string {
    return process.cwd();
  }

  homedir(): string {
    return os.homedir();
  }
}
