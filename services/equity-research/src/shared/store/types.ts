/**
 * Store Types
 * Interface for run artifacts (summaries, reports, index snapshots)
 */

// ============================================
// STORE INTERFACE
// ============================================

export interface IStore {
  /**
   * Read a JSON document, null when absent
   */
  readJson<T>(key: string): Promise<T | null>;

  /**
   * Write a JSON document
   */
  writeJson<T>(key: string, data: T): Promise<void>;

  /**
   * Read a text artifact, null when absent
   */
  readText(key: string): Promise<string | null>;

  /**
   * Write a text artifact (Markdown reports)
   */
  writeText(key: string, content: string): Promise<void>;

  exists(key: string): Promise<boolean>;

  /**
   * List keys under a prefix
   */
  list(prefix?: string): Promise<string[]>;

  /**
   * Resolve the on-disk location for a key
   */
  getPath(key: string): string;
}

// ============================================
// STORE OPTIONS
// ============================================

export interface StoreOptions {
  /** Base directory */
  basePath: string;

  /** Pretty print JSON */
  prettyPrint?: boolean;
}
