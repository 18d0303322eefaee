/**
 * Config Service
 * 設定管理服務 - 環境變數優先，其次設定檔，最後使用預設值
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { AppConfig, CacheMode, CachePolicy } from '../types/config.js';
import { isLogLevel, loggers, LOG_LEVELS, type LogLevel } from '../lib/logger.js';
import { DEFAULT_CACHE_DIR } from './cache.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'tide-calendar');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_PORT = 5000;
export const DEFAULT_CACHE_MODE: CacheMode = 'memory';
export const DEFAULT_CACHE_TTL_HOURS = 6;
export const DEFAULT_STATIONS_FILE = fileURLToPath(new URL('../../data/stations.json', import.meta.url));

const CACHE_MODES = ['none', 'memory', 'file'] as const;

const configFileSchema = z
  .object({
    apiKey: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    cacheMode: z.enum(CACHE_MODES),
    cacheTtlHours: z.number().positive(),
    cacheDir: z.string().min(1),
    stationsFile: z.string().min(1),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  })
  .partial();

export type Env = Record<string, string | undefined>;

export class ConfigService {
  private configPath: string;
  private config: AppConfig;
  private env: Env;

  constructor(configPath?: string, env: Env = process.env) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.env = env;
    this.config = this.load();
  }

  /**
   * 載入設定檔；格式錯誤時記錄警告並改用預設值
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const parsed = configFileSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        loggers.config.warn('Config file invalid, using defaults', {
          path: this.configPath,
          issue: parsed.error.issues[0]?.message,
        });
        return {};
      }
      return parsed.data;
    } catch (error) {
      loggers.config.warn('Config file unreadable, using defaults', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private readEnv(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value && value.length > 0 ? value : undefined;
  }

  /**
   * 取得氣象署 API 授權碼（優先環境變數）
   */
  getApiKey(): string | undefined {
    return this.readEnv('CWA_API_KEY') ?? this.config.apiKey;
  }

  getPort(): number {
    const envValue = this.readEnv('PORT');
    if (envValue !== undefined) {
      const port = Number(envValue);
      if (Number.isInteger(port) && port > 0 && port <= 65535) {
        return port;
      }
      loggers.config.warn('Invalid PORT, falling back', { value: envValue });
    }
    return this.config.port ?? DEFAULT_PORT;
  }

  getCacheMode(): CacheMode {
    const envValue = this.readEnv('CACHE_MODE');
    if (envValue !== undefined) {
      const mode = CACHE_MODES.find((m) => m === envValue.toLowerCase());
      if (mode) {
        return mode;
      }
      loggers.config.warn('Invalid CACHE_MODE, falling back', { value: envValue });
    }
    return this.config.cacheMode ?? DEFAULT_CACHE_MODE;
  }

  getCacheTtlHours(): number {
    const envValue = this.readEnv('CACHE_TTL_HOURS');
    if (envValue !== undefined) {
      const hours = Number(envValue);
      if (Number.isFinite(hours) && hours > 0) {
        return hours;
      }
      loggers.config.warn('Invalid CACHE_TTL_HOURS, falling back', { value: envValue });
    }
    return this.config.cacheTtlHours ?? DEFAULT_CACHE_TTL_HOURS;
  }

  getCachePolicy(): CachePolicy {
    return {
      mode: this.getCacheMode(),
      ttlMs: this.getCacheTtlHours() * 60 * 60 * 1000,
      dir: this.readEnv('CACHE_DIR') ?? this.config.cacheDir ?? DEFAULT_CACHE_DIR,
    };
  }

  getStationsFile(): string {
    return this.readEnv('STATIONS_FILE') ?? this.config.stationsFile ?? DEFAULT_STATIONS_FILE;
  }

  getLogLevel(): LogLevel | undefined {
    const envValue = this.readEnv('LOG_LEVEL')?.toLowerCase();
    if (envValue !== undefined) {
      if (isLogLevel(envValue)) {
        return envValue;
      }
      loggers.config.warn('Invalid LOG_LEVEL, ignoring', { value: envValue, allowed: LOG_LEVELS.join(',') });
    }
    return this.config.logLevel;
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
