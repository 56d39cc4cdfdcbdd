/**
 * Mock IFileSystem implementation for testing
 */

import type { IFileSystem } from '../../src/platform/IFileSystem.js';

export class MockFileSystem implements IFileSystem {
  private files: Map<string, string> = new Map();

  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return content;
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }
}
