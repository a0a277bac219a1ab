/**
 * @fileoverview Default IFileSystem implementation using Node.js fs module.
 * 
 * @module core/defaultFileSystem
 */

import * as fs from 'fs';
import type { IFileSystem } from '../interfaces/IFileSystem';

/**
 * Default file system implementation backed by Node.js fs module.
 */
export class DefaultFileSystem implements IFileSystem {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async existsAsync(filePath: string): Promise<boolean> {
    try {
      await fs.promises.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  existsSync(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  async isFileAsync(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async isExecutableFileAsync(filePath: string): Promise<boolean> {
    if (!(await this.isFileAsync(filePath))) {
      return false;
    }
    if (this.platform === 'win32') {
      return true;
    }
    try {
      await fs.promises.access(filePath, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  readFileSync(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }
}
