/**
 * Result cache - rule outputs keyed by file path and content hash
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import crypto from "crypto";
import { isValidationErrorKind, type ValidationIssue } from "../../types/data-model.js";
import { FileIOError, getErrorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const DEFAULT_MAX_ENTRIES = 10000;

const CACHE_FILE_VERSION = 1;

export interface ResultCacheOptions {
  maxEntries?: number;
  /** JSON file the cache is loaded from and saved to */
  persistPath?: string;
  read?: boolean;
  write?: boolean;
}

export interface CacheKeyParts {
  filePath: string;
  contentHash: string;
  ruleId: string;
  /** Settings that change a rule's output, e.g. required attributes */
  settings: string;
}

interface CacheFile {
  version: number;
  entries: Array<[string, ValidationIssue[]]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isValidationIssue(value: unknown): value is ValidationIssue {
  if (!isRecord(value)) return false;
  const { kind, location, message, detail } = value;
  if (!isValidationErrorKind(kind) || typeof location !== "string" || typeof message !== "string") {
    return false;
  }
  return detail === null || (isRecord(detail) && typeof detail.type === "string" && typeof detail.msg === "string");
}

function isCacheEntry(value: unknown): value is [string, ValidationIssue[]] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "string" &&
    Array.isArray(value[1]) &&
    value[1].every(isValidationIssue)
  );
}

function isCacheFile(value: unknown): value is CacheFile {
  return (
    isRecord(value) &&
    value.version === CACHE_FILE_VERSION &&
    Array.isArray(value.entries) &&
    value.entries.every(isCacheEntry)
  );
}

/**
 * SHA-256 of a text, hex encoded
 */
export function hashContent(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * LRU cache of per-rule validation issues
 *
 * Only rules whose output depends on file content alone may be cached.
 */
export class ResultCache {
  private entries = new Map<string, ValidationIssue[]>();
  private maxEntries: number;
  private persistPath: string | undefined;
  private readEnabled: boolean;
  private writeEnabled: boolean;
  private dirty = false;

  constructor(options: ResultCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.persistPath = options.persistPath;
    this.readEnabled = options.read ?? true;
    this.writeEnabled = options.write ?? true;
  }

  /**
   * Create a cache and load its persisted entries, if any
   *
   * A missing or unreadable cache file leaves the cache empty. Entries are
   * loaded even with reads disabled so that a save keeps them.
   */
  static async open(options: ResultCacheOptions): Promise<ResultCache> {
    const cache = new ResultCache(options);
    if (options.persistPath) {
      await cache.load(options.persistPath);
    }
    return cache;
  }

  static key(parts: CacheKeyParts): string {
    return `${parts.filePath}:${parts.contentHash}:${parts.ruleId}:${parts.settings}`;
  }

  private async load(persistPath: string): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(persistPath, "utf-8");
    } catch (error) {
      if (getErrorCode(error) !== "ENOENT") {
        logger.warn("Failed to read cache file, starting empty", { persistPath, error });
      }
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn("Cache file is not valid JSON, starting empty", { persistPath, error });
      return;
    }

    if (!isCacheFile(parsed)) {
      logger.warn("Cache file has an unexpected layout, starting empty", { persistPath });
      return;
    }

    for (const [key, issues] of parsed.entries.slice(-this.maxEntries)) {
      this.entries.set(key, issues);
    }
    logger.debug("Cache loaded", { persistPath, entries: this.entries.size });
  }

  get(key: string): ValidationIssue[] | undefined {
    if (!this.readEnabled) {
      return undefined;
    }
    const issues = this.entries.get(key);
    if (issues !== undefined) {
      // Refresh recency
      this.entries.delete(key);
      this.entries.set(key, issues);
    }
    return issues;
  }

  set(key: string, issues: readonly ValidationIssue[]): void {
    if (!this.writeEnabled) {
      return;
    }
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, issues.map((issue) => ({ ...issue })));
    this.dirty = true;
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Write the cache to its persist path when it changed
   *
   * @throws FileIOError if the file cannot be written
   */
  async save(): Promise<void> {
    if (!this.persistPath || !this.writeEnabled || !this.dirty) {
      return;
    }

    const payload: CacheFile = {
      version: CACHE_FILE_VERSION,
      entries: Array.from(this.entries.entries()),
    };

    try {
      await mkdir(dirname(this.persistPath), { recursive: true });
      await writeFile(this.persistPath, JSON.stringify(payload), "utf-8");
    } catch (error) {
      throw new FileIOError(`Failed to save cache to ${this.persistPath}`, undefined, {
        cause: error,
      });
    }

    this.dirty = false;
    logger.info("Cache saved", { persistPath: this.persistPath, entries: this.entries.size });
  }
}
