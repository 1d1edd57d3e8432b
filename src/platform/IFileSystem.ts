/**
 * Platform-agnostic file system interface
 * Only what configuration loading needs
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
