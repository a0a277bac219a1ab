/**
 * @fileoverview In-memory {@link IFileSystem} describing a host's files.
 */

import type { IFileSystem } from '../../../interfaces/IFileSystem';

export class FakeFileSystem implements IFileSystem {
  constructor(
    private readonly executables: Set<string> = new Set(),
    private readonly files: Set<string> = new Set(),
    private readonly directories: Set<string> = new Set(),
    private readonly contents: Record<string, string> = {},
  ) {}

  async existsAsync(filePath: string): Promise<boolean> {
    return this.existsSync(filePath);
  }

  existsSync(filePath: string): boolean {
    return this.directories.has(filePath) || this.files.has(filePath) || this.executables.has(filePath)
      || filePath in this.contents;
  }

  async isFileAsync(filePath: string): Promise<boolean> {
    return this.files.has(filePath) || this.executables.has(filePath);
  }

  async isExecutableFileAsync(filePath: string): Promise<boolean> {
    return this.executables.has(filePath);
  }

  readFileSync(filePath: string): string {
    const text = this.contents[filePath];
    if (text === undefined) {
      throw new Error(`ENOENT: ${filePath}`);
    }
    return text;
  }
}
