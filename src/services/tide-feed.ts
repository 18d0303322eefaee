/**
 * Tide Feed Service
 * 站點解析 → 取得預報（經快取）→ 轉換 → 時間窗過濾 → 輸出 iCalendar
 */

import { z } from 'zod';
import type { ForecastSource } from '../types/cwa.js';
import type { Station } from '../types/station.js';
import type { TideEvent } from '../types/tide.js';
import type { CacheStore, CacheValueParser } from './cache.js';
import type { StationRegistry } from '../lib/station-registry.js';
import { buildCalendar } from '../lib/ical.js';
import { loggers } from '../lib/logger.js';
import { recordCacheLookup, recordEventsRendered } from '../lib/metrics.js';
import { filterEventsInWindow, parseTideEvents } from '../lib/tide-parser.js';
import { forecastWindow } from '../lib/time-utils.js';
import { parseDays } from '../lib/validation.js';
import { SingleFlight } from './single-flight.js';

/**
 * 快取內容：上游 records 原文與取得時間
 */
export interface CachedForecast {
  records: unknown;
  fetchedAt: string;
}

const cachedForecastSchema = z.object({
  records: z.unknown(),
  fetchedAt: z.string(),
});

export const parseCachedForecast: CacheValueParser<CachedForecast> = (data) => {
  const parsed = cachedForecastSchema.safeParse(data);
  if (!parsed.success || parsed.data.records === undefined) {
    return null;
  }
  return { records: parsed.data.records, fetchedAt: parsed.data.fetchedAt };
};

export interface TideFeed {
  station: Station;
  days: number;
  events: TideEvent[];
  ics: string;
}

export interface TideFeedServiceOptions {
  source: ForecastSource;
  stations: StationRegistry;
  cache: CacheStore<CachedForecast>;
  /** 快取存活時間（毫秒），未指定時使用 CacheStore 的預設值 */
  cacheTtlMs?: number;
  /** 目前時間，測試時可注入 */
  clock?: () => Date;
  refreshInterval?: string;
}

export function forecastCacheKey(stationId: string, days: number): string {
  return `forecast/${stationId}-${days}`;
}

export class TideFeedService {
  private readonly source: ForecastSource;
  private readonly stations: StationRegistry;
  private readonly cache: CacheStore<CachedForecast>;
  private readonly cacheTtlMs?: number;
  private readonly clock: () => Date;
  private readonly refreshInterval?: string;
  private readonly inFlight = new SingleFlight<CachedForecast>();

  constructor(options: TideFeedServiceOptions) {
    this.source = options.source;
    this.stations = options.stations;
    this.cache = options.cache;
    this.cacheTtlMs = options.cacheTtlMs;
    this.clock = options.clock ?? (() => new Date());
    this.refreshInterval = options.refreshInterval;
  }

  /**
   * 產生指定站點的行事曆
   * @throws StationNotFoundError 站點不存在
   * @throws ValidationError days 不合法
   * @throws FetchError / MalformedDataError 上游失敗或資料格式錯誤
   */
  async getFeed(stationInput: string, daysInput?: string | number | null): Promise<TideFeed> {
    const station = this.stations.resolve(stationInput);
    const days = parseDays(daysInput);
    const now = this.clock();

    const forecast = await this.getForecast(station, days, now);
    const { start, end } = forecastWindow(now, days);
    const events = filterEventsInWindow(parseTideEvents(forecast.records, station), start, end);
    const ics = buildCalendar(events, station, {
      generatedAt: now,
      refreshInterval: this.refreshInterval,
    });

    recordEventsRendered(events.length);
    loggers.feed.info('Feed generated', {
      stationId: station.id,
      days,
      eventCount: events.length,
      fetchedAt: forecast.fetchedAt,
    });

    return { station, days, events, ics };
  }

  /**
   * 讀取快取；未命中時向上游取得，同 key 的並行請求共用一次呼叫
   */
  async getForecast(station: Station, days: number, now: Date = this.clock()): Promise<CachedForecast> {
    const key = forecastCacheKey(station.id, days);

    const cached = this.cache.get(key);
    if (cached) {
      recordCacheLookup('hit');
      loggers.cache.debug('Cache hit', { key });
      return cached;
    }

    const { value, shared } = await this.inFlight.run(key, async () => {
      const response = await this.source.fetchTideForecast({ stationId: station.id, days, now });
      // 格式錯誤的回應不寫入快取
      parseTideEvents(response.records, station);
      const forecast: CachedForecast = { records: response.records, fetchedAt: now.toISOString() };
      this.cache.set(key, forecast, this.cacheTtlMs);
      return forecast;
    });

    recordCacheLookup(shared ? 'shared' : 'miss');
    return value;
  }

  clearCache(): void {
    this.cache.clear('forecast');
  }
}
