/**
 * FileSystemAdapter - Node.js fs/promises implementation
 */

import fs from 'fs/promises';
import type { IFileSystem } from './IFileSystem.js';

export class FileSystemAdapter implements IFileSystem {
  async readFile(path: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
    return fs.readFile(path, encoding);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }
}
