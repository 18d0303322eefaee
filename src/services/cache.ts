/**
 * Cache Service
 * 預報快取 - 可替換的快取策略（不快取 / 記憶體 / 檔案），統一 TTL 管理
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import type { CacheMode, CachePolicy } from '../types/config.js';
import { loggers } from '../lib/logger.js';

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.cache', 'tide-calendar');
export const DEFAULT_CACHE_TTL_MS = 6 * 60 * 60 * 1000; // 6 小時

const MEMORY_MAX_ENTRIES = 500;

export interface CacheStatus {
  mode: CacheMode;
  entryCount: number;
  /** 檔案快取目錄 */
  cacheDir?: string;
  totalSize?: number;
}

export interface CacheStore<V> {
  readonly mode: CacheMode;
  get(key: string): V | null;
  set(key: string, value: V, ttlMs?: number): void;
  delete(key: string): void;
  /**
   * 清除快取
   * @param prefix 只清除特定前綴的快取
   */
  clear(prefix?: string): void;
  getStatus(): CacheStatus;
}

/**
 * 檔案內容轉回快取值，不符合預期時回傳 null
 */
export type CacheValueParser<V> = (data: unknown) => V | null;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * 不快取：每次都向上游取得最新資料
 */
export class NoopCacheStore<V> implements CacheStore<V> {
  readonly mode = 'none';

  get(): V | null {
    return null;
  }

  set(): void {}

  delete(): void {}

  clear(): void {}

  getStatus(): CacheStatus {
    return { mode: this.mode, entryCount: 0 };
  }
}

/**
 * 行程內 TTL 快取，超過上限時淘汰最舊的項目
 */
export class MemoryCacheStore<V> implements CacheStore<V> {
  readonly mode = 'memory';
  private readonly store = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly defaultTtlMs: number = DEFAULT_CACHE_TTL_MS,
    private readonly maxEntries: number = MEMORY_MAX_ENTRIES
  ) {}

  get(key: string): V | null {
    const entry = this.store.get(key);
    if (!entry) {
      return null;
    }
    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    this.store.delete(key);
    this.store.set(key, { value, expiresAt: Date.now() + ttlMs });

    while (this.store.size > this.maxEntries) {
      const oldestKey = this.store.keys().next().value;
      if (oldestKey === undefined) break;
      this.store.delete(oldestKey);
    }
  }

  delete(key: string): void {
    this.store.delete(key);
  }

  clear(prefix?: string): void {
    if (!prefix) {
      this.store.clear();
      return;
    }
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(`${prefix}/`)) {
        this.store.delete(key);
      }
    }
  }

  getStatus(): CacheStatus {
    const now = Date.now();
    let entryCount = 0;
    for (const entry of this.store.values()) {
      if (entry.expiresAt >= now) entryCount++;
    }
    return { mode: this.mode, entryCount };
  }
}

const fileEntrySchema = z.object({
  data: z.unknown(),
  expiresAt: z.number(),
  createdAt: z.number(),
});

/**
 * 檔案快取：key 中的 / 對應子目錄，每筆一個 JSON 檔
 */
export class FileCacheStore<V> implements CacheStore<V> {
  readonly mode = 'file';
  private readonly cacheDir: string;

  constructor(
    private readonly parse: CacheValueParser<V>,
    cacheDir: string = DEFAULT_CACHE_DIR,
    private readonly defaultTtlMs: number = DEFAULT_CACHE_TTL_MS
  ) {
    this.cacheDir = cacheDir;
    this.ensureDir(this.cacheDir);
  }

  private ensureDir(dir: string): void {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  private keyToPath(key: string): string {
    const parts = key.split('/');
    const fileName = `${parts.pop()}.json`;
    return path.join(this.cacheDir, ...parts, fileName);
  }

  set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    const filePath = this.keyToPath(key);
    this.ensureDir(path.dirname(filePath));
    const now = Date.now();
    fs.writeFileSync(
      filePath,
      JSON.stringify({ data: value, expiresAt: now + ttlMs, createdAt: now }),
      'utf-8'
    );
  }

  get(key: string): V | null {
    const filePath = this.keyToPath(key);
    if (!fs.existsSync(filePath)) {
      return null;
    }

    try {
      const entry = fileEntrySchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
      if (!entry.success || Date.now() > entry.data.expiresAt) {
        this.delete(key);
        return null;
      }

      const value = this.parse(entry.data.data);
      if (value === null) {
        this.delete(key);
      }
      return value;
    } catch (error) {
      loggers.cache.warn('Cache entry unreadable, ignoring', {
        key,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  delete(key: string): void {
    fs.rmSync(this.keyToPath(key), { force: true });
  }

  clear(prefix?: string): void {
    const target = prefix ? path.join(this.cacheDir, prefix) : this.cacheDir;
    if (!fs.existsSync(target)) {
      return;
    }
    for (const item of fs.readdirSync(target)) {
      fs.rmSync(path.join(target, item), { recursive: true, force: true });
    }
  }

  getStatus(): CacheStatus {
    let entryCount = 0;
    let totalSize = 0;

    const countFiles = (dir: string): void => {
      if (!fs.existsSync(dir)) return;
      for (const item of fs.readdirSync(dir, { withFileTypes: true })) {
        const itemPath = path.join(dir, item.name);
        if (item.isDirectory()) {
          countFiles(itemPath);
        } else if (item.isFile() && item.name.endsWith('.json')) {
          entryCount++;
          totalSize += fs.statSync(itemPath).size;
        }
      }
    };

    countFiles(this.cacheDir);

    return { mode: this.mode, entryCount, cacheDir: this.cacheDir, totalSize };
  }
}

/**
 * 依快取策略建立對應的 CacheStore
 */
export function createCacheStore<V>(policy: CachePolicy, parse: CacheValueParser<V>): CacheStore<V> {
  switch (policy.mode) {
    case 'none':
      return new NoopCacheStore<V>();
    case 'file':
      return new FileCacheStore<V>(parse, policy.dir, policy.ttlMs);
    case 'memory':
    default:
      return new MemoryCacheStore<V>(policy.ttlMs);
  }
}
