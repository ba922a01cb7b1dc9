import { Injectable, Logger } from "@nestjs/common";
import { constants, createReadStream, createWriteStream, Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { pipeline } from "stream/promises";
import {
  DirectoryCreateError,
  errorMessage,
} from "../errors/motion-photo.errors";

@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async isFile(filePath: string): Promise<boolean> {
    const stats = await fs.stat(filePath).catch(() => null);
    return stats?.isFile() ?? false;
  }

  async isDirectory(dirPath: string): Promise<boolean> {
    const stats = await fs.stat(dirPath).catch(() => null);
    return stats?.isDirectory() ?? false;
  }

  /**
   * Size of a file in bytes, or null when it does not exist.
   */
  async sizeOf(filePath: string): Promise<number | null> {
    const stats = await fs.stat(filePath).catch(() => null);
    return stats ? stats.size : null;
  }

  hasExtension(filePath: string, extensions: readonly string[]): boolean {
    return extensions.includes(path.extname(filePath).toLowerCase());
  }

  async listDirectory(dirPath: string): Promise<Dirent[]> {
    return fs.readdir(dirPath, { withFileTypes: true });
  }

  /**
   * Creates a directory and its parents. Existing directories are left alone.
   */
  async ensureDirectory(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      throw new DirectoryCreateError(dirPath, errorMessage(error));
    }
  }

  /**
   * Streams each source into the target, back to back, without holding whole
   * files in memory. A failed copy leaves no partial target behind.
   * @returns The number of bytes written.
   */
  async concatenate(sources: string[], target: string): Promise<number> {
    try {
      await pipeline(async function* () {
        for (const source of sources) {
          yield* createReadStream(source);
        }
      }, createWriteStream(target));
    } catch (error) {
      await fs.rm(target, { force: true }).catch((err) =>
        this.logger.warn(`Failed to delete partial file ${target}: ${errorMessage(err)}`),
      );
      throw error;
    }

    const stats = await fs.stat(target);
    return stats.size;
  }

  /**
   * Copies a file, keeping its timestamps. Returns false when the destination
   * already exists and was left in place.
   */
  async copyFile(source: string, destination: string): Promise<boolean> {
    try {
      await fs.copyFile(source, destination, constants.COPYFILE_EXCL);
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        return false;
      }
      throw error;
    }
    const stats = await fs.stat(source);
    await fs.utimes(destination, stats.atime, stats.mtime);
    return true;
  }

  async remove(filePath: string): Promise<void> {
    await fs.unlink(filePath);
  }
}

// fs errors can come from another realm (vm contexts, test runners), so
// they are recognised by shape rather than by prototype.
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
