import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';
import { ConfigurationError, errnoCode, errorMessage } from '../download/core/errors';

/**
 * FileManager - Directory setup and atomic file writes
 * Used for the state directory and the download output directory
 */
export class FileManager {
  /**
   * Create a directory (and parents) if it does not exist yet
   */
  async ensureDirectory(directory: string): Promise<void> {
    try {
      const stats = await fs.stat(directory);
      if (!stats.isDirectory()) {
        throw new ConfigurationError(
          `${directory} exists but is not a directory. Rename or move it.`,
        );
      }
      return;
    } catch (error: unknown) {
      if (errnoCode(error) !== 'ENOENT') {
        throw error;
      }
    }

    await fs.mkdir(directory, { recursive: true });
    logger.info('📁 Directory created', { path: directory });
  }

  /**
   * Read a file, or undefined when it does not exist
   */
  async readIfExists(filePath: string): Promise<Buffer | undefined> {
    try {
      return await fs.readFile(filePath);
    } catch (error: unknown) {
      if (errnoCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Atomic write: write to a temp file beside the target, then rename
   */
  async writeAtomic(filePath: string, data: string | Buffer): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await this.deleteFile(tempPath);
      throw error;
    }
  }

  /**
   * Delete a file, ignoring files that are already gone
   */
  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error: unknown) {
      if (errnoCode(error) !== 'ENOENT') {
        logger.error('Failed to delete file', {
          path: filePath,
          error: errorMessage(error),
        });
      }
    }
  }

  /**
   * Check if file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Build a safe file name inside a directory
   */
  static buildFilePath(directory: string, baseName: string, extension: string): string {
    return path.join(directory, `${FileManager.sanitizeFilename(baseName)}.${extension}`);
  }

  static sanitizeFilename(name: string): string {
    const cleaned = name.replace(/[<>:"/\\|?*\x00-\x1F]/g, '_').trim();
    return (cleaned || 'untitled').substring(0, 200);
  }
}
