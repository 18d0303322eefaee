/**
 * Test fixtures and in-process stand-ins
 */

import fs from 'node:fs';
import { vi } from 'vitest';
import type { ForecastQuery, ForecastSource, RawForecastResponse } from '../../src/types/cwa.js';
import { StationRegistry } from '../../src/lib/station-registry.js';

/** 2025-12-28 08:00 (Asia/Taipei) */
export const FIXED_NOW = new Date('2025-12-28T00:00:00Z');

export const KEELUNG = { id: '10017010', name: '基隆市中正區' };
export const MAGONG = { id: '10016010', name: '澎湖縣馬公市' };

export function loadForecastFixture(): RawForecastResponse {
  const data: { records: unknown } = JSON.parse(
    fs.readFileSync(new URL('../fixtures/tide-forecast.json', import.meta.url), 'utf-8')
  );
  return { success: 'true', records: data.records };
}

/**
 * 上游回應的原始 JSON（含 success 欄位）
 */
export function loadForecastBody(): unknown {
  return JSON.parse(fs.readFileSync(new URL('../fixtures/tide-forecast.json', import.meta.url), 'utf-8'));
}

export function createTestRegistry(): StationRegistry {
  return new StationRegistry([
    KEELUNG,
    MAGONG,
    { id: '65000100', name: '新北市淡水區' },
    { id: '64000100', name: '高雄市旗津區' },
    { id: '10014010', name: '臺東縣臺東市' },
  ]);
}

export function createFakeSource(
  respond: (query: ForecastQuery) => Promise<RawForecastResponse> = async () => loadForecastFixture()
) {
  const fetchTideForecast = vi.fn(respond);
  const source: ForecastSource = { fetchTideForecast };
  return { source, fetchTideForecast };
}
