/**
 * File Store
 * File system implementation of IStore
 */

import fs from "fs/promises";
import type { Dirent } from "fs";
import path from "path";
import type { IStore, StoreOptions } from "./types.js";

function isMissing(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class FileStore implements IStore {
  private readonly basePath: string;
  private readonly prettyPrint: boolean;

  constructor(options: StoreOptions) {
    this.basePath = options.basePath;
    this.prettyPrint = options.prettyPrint ?? true;
  }

  /**
   * Keys without an extension are JSON documents
   */
  getPath(key: string): string {
    const normalizedKey = path.extname(key) ? key : `${key}.json`;
    return path.join(this.basePath, normalizedKey);
  }

  async readJson<T>(key: string): Promise<T | null> {
    const content = await this.readText(key);
    if (content === null) return null;
    return JSON.parse(content) as T;
  }

  async writeJson<T>(key: string, data: T): Promise<void> {
    const content = this.prettyPrint
      ? JSON.stringify(data, null, 2)
      : JSON.stringify(data);

    await this.writeText(key, content);
  }

  async readText(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.getPath(key), "utf-8");
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async writeText(key: string, content: string): Promise<void> {
    const filePath = this.getPath(key);

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.getPath(key));
      return true;
    } catch {
      return false;
    }
  }

  async list(prefix?: string): Promise<string[]> {
    const keys: string[] = [];

    async function walk(dir: string, baseDir: string): Promise<void> {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isMissing(error)) return;
        throw error;
      }

      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
          await walk(fullPath, baseDir);
        } else if (entry.isFile()) {
          const key = path
            .relative(baseDir, fullPath)
            .split(path.sep)
            .join("/")
            .replace(/\.json$/, "");

          if (!prefix || key.startsWith(prefix)) {
            keys.push(key);
          }
        }
      }
    }

    await walk(this.basePath, this.basePath);
    return keys.sort();
  }
}

/**
 * Create a file store
 */
export function createFileStore(basePath: string, options?: Partial<StoreOptions>): IStore {
  return new FileStore({
    basePath,
    prettyPrint: options?.prettyPrint ?? true,
  });
}
