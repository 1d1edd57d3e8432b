/**
 * FileSystemAdapter - Node.js fs/promises implementation of IFileSystem
 */

import type { IFileSystem } from './IFileSystem.js';
import fs from 'fs/promises';

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
