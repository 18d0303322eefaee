import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TideFeedService, forecastCacheKey, parseCachedForecast, type CachedForecast } from '../../src/services/tide-feed.js';
import { MemoryCacheStore, NoopCacheStore } from '../../src/services/cache.js';
import {
  FetchError,
  MalformedDataError,
  StationNotFoundError,
  ValidationError,
} from '../../src/lib/errors.js';
import { FIXED_NOW, KEELUNG, createFakeSource, createTestRegistry, loadForecastFixture } from '../helpers/fixtures.js';

describe('TideFeedService', () => {
  let cache: MemoryCacheStore<CachedForecast>;

  beforeEach(() => {
    cache = new MemoryCacheStore<CachedForecast>();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createService(source = createFakeSource().source) {
    return new TideFeedService({
      source,
      stations: createTestRegistry(),
      cache,
      clock: () => FIXED_NOW,
    });
  }

  describe('getFeed', () => {
    it('should keep only events inside [now - 1 day, now + days]', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      const feed = await createService(source).getFeed('基隆市中正區', 2);

      expect(feed.station).toEqual(KEELUNG);
      expect(feed.days).toBe(2);
      expect(feed.events.map((e) => e.time.toISOString())).toEqual([
        '2025-12-27T04:20:00.000Z',
        '2025-12-27T21:01:00.000Z',
        '2025-12-28T05:15:00.000Z',
        '2025-12-28T22:00:00.000Z',
        '2025-12-29T06:10:00.000Z',
        '2025-12-29T23:30:00.000Z',
      ]);
      expect(fetchTideForecast).toHaveBeenCalledWith({ stationId: '10017010', days: 2, now: FIXED_NOW });
    });

    it('should default to 30 days', async () => {
      const feed = await createService().getFeed('10017010');
      expect(feed.days).toBe(30);
      expect(feed.events).toHaveLength(7);
    });

    it('should render one VEVENT per event', async () => {
      const feed = await createService().getFeed('基隆市中正區', '2');

      expect(feed.ics.startsWith('BEGIN:VCALENDAR\r\n')).toBe(true);
      expect(feed.ics.match(/BEGIN:VEVENT/g)).toHaveLength(6);
      expect(feed.ics).toContain('SUMMARY:基隆中正 🔺滿潮 55cm\r\n');
      expect(feed.ics).toContain('DTSTAMP:20251228T000000Z\r\n');
    });

    it('should reject unknown stations before fetching', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      await expect(createService(source).getFeed('不存在的站')).rejects.toThrow(StationNotFoundError);
      expect(fetchTideForecast).not.toHaveBeenCalled();
    });

    it('should reject invalid days before fetching', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      await expect(createService(source).getFeed('基隆市中正區', '0')).rejects.toThrow(ValidationError);
      await expect(createService(source).getFeed('基隆市中正區', 'abc')).rejects.toThrow(ValidationError);
      expect(fetchTideForecast).not.toHaveBeenCalled();
    });

    it('should surface malformed upstream data', async () => {
      const { source } = createFakeSource(async () => ({ success: 'true', records: { Unexpected: [] } }));
      await expect(createService(source).getFeed('基隆市中正區')).rejects.toThrow(MalformedDataError);
      expect(cache.get(forecastCacheKey('10017010', 30))).toBeNull();
    });

    it('should report a station missing from the upstream payload', async () => {
      await expect(createService().getFeed('新北市淡水區')).rejects.toThrow(StationNotFoundError);
    });
  });

  describe('caching', () => {
    it('should reuse a cached forecast for the same station and days', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      const service = createService(source);

      await service.getFeed('基隆市中正區', 7);
      await service.getFeed('10017010', 7);

      expect(fetchTideForecast).toHaveBeenCalledOnce();
      expect(cache.get('forecast/10017010-7')?.fetchedAt).toBe('2025-12-28T00:00:00.000Z');
    });

    it('should use a separate entry per day count', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      const service = createService(source);

      await service.getFeed('基隆市中正區', 7);
      await service.getFeed('基隆市中正區', 14);

      expect(fetchTideForecast).toHaveBeenCalledTimes(2);
    });

    it('should share one upstream call between concurrent misses', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      const service = createService(source);

      const [a, b] = await Promise.all([
        service.getFeed('基隆市中正區', 7),
        service.getFeed('基隆市中正區', 7),
      ]);

      expect(fetchTideForecast).toHaveBeenCalledOnce();
      expect(a.ics).toBe(b.ics);
    });

    it('should not cache failures', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      fetchTideForecast.mockRejectedValueOnce(new FetchError('upstream down', 503));
      const service = createService(source);

      await expect(service.getFeed('基隆市中正區', 7)).rejects.toThrow('upstream down');
      await expect(service.getFeed('基隆市中正區', 7)).resolves.toMatchObject({ days: 7 });
      expect(fetchTideForecast).toHaveBeenCalledTimes(2);
    });

    it('should always fetch with the none policy', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      const service = new TideFeedService({
        source,
        stations: createTestRegistry(),
        cache: new NoopCacheStore<CachedForecast>(),
        clock: () => FIXED_NOW,
      });

      await service.getFeed('基隆市中正區', 7);
      await service.getFeed('基隆市中正區', 7);
      expect(fetchTideForecast).toHaveBeenCalledTimes(2);
    });

    it('should drop cached forecasts on clearCache', async () => {
      const { source, fetchTideForecast } = createFakeSource();
      const service = createService(source);

      await service.getFeed('基隆市中正區', 7);
      service.clearCache();
      await service.getFeed('基隆市中正區', 7);
      expect(fetchTideForecast).toHaveBeenCalledTimes(2);
    });
  });
});

describe('parseCachedForecast', () => {
  it('should accept stored forecasts', () => {
    const { records } = loadForecastFixture();
    expect(parseCachedForecast({ records, fetchedAt: '2025-12-28T00:00:00.000Z' })).toEqual({
      records,
      fetchedAt: '2025-12-28T00:00:00.000Z',
    });
  });

  it('should reject anything else', () => {
    expect(parseCachedForecast({ fetchedAt: 'x' })).toBeNull();
    expect(parseCachedForecast('stale')).toBeNull();
  });
});
