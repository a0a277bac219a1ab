/**
 * @fileoverview Interface for configuration access abstraction.
 * 
 * Keeps services independent of where settings come from (a JSON file,
 * environment variables, or an in-memory map in tests).
 * 
 * @module interfaces/IConfigProvider
 */

/**
 * Interface for reading configuration values.
 * 
 * @example
 * ```typescript
 * class StatusPoller {
 *   constructor(private readonly config: IConfigProvider) {}
 *   
 *   getInterval(): number {
 *     return this.config.getConfig('git', 'autoRefreshIntervalMs', 5000);
 *   }
 * }
 * ```
 */
export interface IConfigProvider {
  /**
   * Get a configuration value with a fallback default.
   * 
   * The stored value is returned only when its runtime type matches the
   * default's; anything else yields the default.
   * 
   * @param section - Configuration section, dot-separated for nesting (e.g. `logging.debug`)
   * @param key - Configuration key within the section
   * @param defaultValue - Default value if configuration is not set
   */
  getConfig<T>(section: string, key: string, defaultValue: T): T;
}
