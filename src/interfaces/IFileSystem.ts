/**
 * @fileoverview Interface for file system operations abstraction.
 * 
 * Covers the handful of probes the locator and services need, so tests can
 * describe a host's install layout without touching the real disk.
 * 
 * @module interfaces/IFileSystem
 */

/**
 * Interface for file system operations.
 * 
 * @example
 * ```typescript
 * class WrapperFinder {
 *   constructor(private readonly fs: IFileSystem) {}
 *   
 *   async hasWrapper(projectDir: string): Promise<boolean> {
 *     return this.fs.isExecutableFileAsync(path.join(projectDir, 'gradlew'));
 *   }
 * }
 * ```
 */
export interface IFileSystem {
  /** Check if a path exists (async). */
  existsAsync(filePath: string): Promise<boolean>;

  /** Check if a path exists synchronously. */
  existsSync(filePath: string): boolean;

  /** True when the path is a regular file (symlinks followed). */
  isFileAsync(filePath: string): Promise<boolean>;

  /**
   * True when the path is a regular file the current user may execute.
   * On Windows, where there is no execute bit, any regular file qualifies.
   */
  isExecutableFileAsync(filePath: string): Promise<boolean>;

  /** Read a file as UTF-8 string (sync). */
  readFileSync(filePath: string): string;
}
