/**
 * Platform-agnostic file system interface
 * Implementation uses fs/promises
 */

export interface IFileSystem {
  /**
   * Read file contents as string
   */
  readFile(path: string, encoding?: BufferEncoding): Promise<string>;

  /**
   * Check if file or directory exists
   */
  exists(path: string): Promise<boolean>;
}
