import type { LogLevel } from '../lib/logger.js';

/**
 * 快取模式
 * - none: 每次請求都即時取得
 * - memory: 行程內 TTL 快取
 * - file: JSON 檔案快取
 */
export type CacheMode = 'none' | 'memory' | 'file';

/**
 * 快取策略
 */
export interface CachePolicy {
  mode: CacheMode;
  /** 存活時間（毫秒） */
  ttlMs: number;
  /** 檔案快取目錄（mode 為 file 時使用） */
  dir: string;
}

/**
 * 設定檔結構
 */
export interface AppConfig {
  /** 氣象署 API 授權碼 */
  apiKey?: string;
  /** HTTP 服務埠號 */
  port?: number;
  cacheMode?: CacheMode;
  /** 快取 TTL（小時） */
  cacheTtlHours?: number;
  cacheDir?: string;
  /** 站點對照表路徑 */
  stationsFile?: string;
  logLevel?: LogLevel;
}
