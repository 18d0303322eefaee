/**
 * Health Check Service - 系統健康狀態檢查
 * 回報 API 授權碼、站點對照表、快取策略與上游請求狀況
 */

import type { CacheMode } from '../types/config.js';
import type { CacheStatus } from './cache.js';
import type { UpstreamStats } from './cwa-api.js';

export type HealthStatus = 'ok' | 'degraded';

export interface HealthCheckResult {
  status: HealthStatus;
  api_configured: boolean;
  stations_loaded: number;
  cache: {
    mode: CacheMode;
    ttlHours: number;
    entryCount: number;
  };
  upstream?: UpstreamStats;
  timestamp: string;
}

export interface HealthSources {
  apiConfigured: () => boolean;
  stationCount: () => number;
  cacheStatus: () => CacheStatus;
  cacheTtlHours: number;
  /** 尚未建立 API 客戶端時為 undefined */
  upstreamStats?: () => UpstreamStats | undefined;
  clock?: () => Date;
}

export class HealthCheckService {
  constructor(private sources: HealthSources) {}

  /**
   * 執行健康檢查
   * 缺少授權碼或站點表為空時標記為 degraded，仍可回應
   */
  check(): HealthCheckResult {
    const apiConfigured = this.sources.apiConfigured();
    const stationsLoaded = this.sources.stationCount();
    const cacheStatus = this.sources.cacheStatus();
    const upstream = this.sources.upstreamStats?.();

    const result: HealthCheckResult = {
      status: apiConfigured && stationsLoaded > 0 ? 'ok' : 'degraded',
      api_configured: apiConfigured,
      stations_loaded: stationsLoaded,
      cache: {
        mode: cacheStatus.mode,
        ttlHours: this.sources.cacheTtlHours,
        entryCount: cacheStatus.entryCount,
      },
      timestamp: (this.sources.clock?.() ?? new Date()).toISOString(),
    };
    if (upstream) {
      result.upstream = upstream;
    }
    return result;
  }
}

/**
 * 人類可讀的狀態摘要
 */
export function summarizeHealth(result: HealthCheckResult): string {
  const issues: string[] = [];
  if (!result.api_configured) issues.push('未設定 CWA_API_KEY');
  if (result.stations_loaded === 0) issues.push('站點對照表為空');

  if (issues.length === 0) {
    return '所有系統元件正常運作 ✓';
  }
  return `檢測到問題: ${issues.join(', ')}`;
}
