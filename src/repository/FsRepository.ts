import { promises as fs } from "fs";
import * as path from "path";
import type { StorageRepository } from "./StorageRepository.js";

/**
 * FsRepository: StorageRepository implementation for the local file system.
 */
export class FsRepository implements StorageRepository {
  baseDir: string;

  constructor(baseDir: string = ".") {
    this.baseDir = baseDir;
  }

  /**
   * Resolves a path against baseDir. Absolute paths are kept as they are.
   */
  resolve(filePath: string): string {
    return path.resolve(this.baseDir, filePath);
  }

  /**
   * Checks whether a file exists.
   *
   * @param filePath - Relative path from baseDir.
   */
  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(filePath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Reads the content of a file as UTF-8 text.
   *
   * @param filePath - Relative path to the file.
   * @returns File content as a string.
   */
  async readFile(filePath: string): Promise<string> {
    return await fs.readFile(this.resolve(filePath), "utf-8");
  }
}
