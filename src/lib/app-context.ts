/**
 * App Context
 * 組裝站點表、快取、API 客戶端與 Feed 服務，供 CLI 與 HTTP 伺服器共用
 */

import type { ForecastSource } from '../types/cwa.js';
import { CwaApiClient } from '../services/cwa-api.js';
import { createCacheStore, type CacheStore } from '../services/cache.js';
import { getConfigService, type ConfigService } from '../services/config.js';
import { HealthCheckService } from '../services/health.js';
import { TideFeedService, parseCachedForecast, type CachedForecast } from '../services/tide-feed.js';
import { ConfigurationError } from './errors.js';
import { loggers } from './logger.js';
import { StationRegistry } from './station-registry.js';

export interface AppContext {
  config: ConfigService;
  stations: StationRegistry;
  cache: CacheStore<CachedForecast>;
  feed: TideFeedService;
  health: HealthCheckService;
  /** 有設定授權碼時才會建立 */
  client?: CwaApiClient;
}

export interface AppContextOptions {
  config?: ConfigService;
  /** 覆寫 API 授權碼（例如 CLI 的 --api-key） */
  apiKey?: string;
  /** 覆寫資料來源（測試用） */
  source?: ForecastSource;
  stations?: StationRegistry;
  clock?: () => Date;
}

/**
 * 未設定授權碼時的資料來源：站點與參數驗證照常進行，實際抓取時才失敗
 */
class UnconfiguredSource implements ForecastSource {
  async fetchTideForecast(): Promise<never> {
    throw new ConfigurationError('尚未設定氣象署 API 授權碼 (CWA_API_KEY)');
  }
}

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? getConfigService();
  const stations = options.stations ?? StationRegistry.fromFile(config.getStationsFile());
  const policy = config.getCachePolicy();
  const cache = createCacheStore(policy, parseCachedForecast);

  const apiKey = options.apiKey ?? config.getApiKey();
  const client = !options.source && apiKey ? new CwaApiClient(apiKey) : undefined;
  const source = options.source ?? client ?? new UnconfiguredSource();

  if (!options.source && !apiKey) {
    loggers.config.warn('CWA_API_KEY not set, feed requests will fail');
  }

  const feed = new TideFeedService({
    source,
    stations,
    cache,
    cacheTtlMs: policy.ttlMs,
    clock: options.clock,
  });

  const health = new HealthCheckService({
    apiConfigured: () => Boolean(options.source || apiKey),
    stationCount: () => stations.size,
    cacheStatus: () => cache.getStatus(),
    cacheTtlHours: policy.ttlMs / (60 * 60 * 1000),
    upstreamStats: () => client?.getStats(),
    clock: options.clock,
  });

  loggers.config.debug('App context created', {
    stations: stations.size,
    cacheMode: policy.mode,
    apiConfigured: Boolean(apiKey),
  });

  return { config, stations, cache, feed, health, client };
}
