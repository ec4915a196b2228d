import { access, copyFile, mkdir, readFile, rm, writeFile } from "node:fs/promises";

import { errnoCode } from "../nodePrimitives.js";

/**
 * Narrow abstraction over the filesystem calls made by the key store, the
 * remapper and the scratch workspace manager. Tests inject doubles to provoke
 * collisions and partial failures without touching the real disk.
 */
export interface FileSystemGateway {
  readText(path: string): Promise<string>;
  /** Persists UTF-8 text, replacing any existing content. */
  writeText(path: string, data: string): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
  /**
   * Creates a single directory. Must reject with an `EEXIST` errno error when
   * the directory is already present so callers can detect collisions.
   */
  makeDirectory(path: string): Promise<void>;
  /** Removes a directory tree; missing paths are ignored. */
  removeTree(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}

export const defaultFileSystemGateway: FileSystemGateway = {
  async readText(path: string): Promise<string> {
    return await readFile(path, "utf8");
  },
  async writeText(path: string, data: string): Promise<void> {
    await writeFile(path, data, "utf8");
  },
  async copyFile(source: string, destination: string): Promise<void> {
    await copyFile(source, destination);
  },
  async makeDirectory(path: string): Promise<void> {
    await mkdir(path);
  },
  async removeTree(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  },
  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return false;
      }
      throw error;
    }
  },
};
