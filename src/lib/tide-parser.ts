/**
 * Tide Parser Module
 * 將氣象署 F-A0021-001 回應攤平為依時間排列的潮汐事件
 *
 * 回應結構：
 *   records.TideForecasts[] → Location → TimePeriods.Daily[] → Time[]
 */

import { z } from 'zod';
import type { Station } from '../types/station.js';
import type { HeightBasis, TideEvent, TideType } from '../types/tide.js';
import { MalformedDataError, StationNotFoundError } from './errors.js';
import { parseForecastDateTime } from './time-utils.js';

const heightValueSchema = z.union([z.number(), z.string()]).nullish();

const tideTimeSchema = z.object({
  DateTime: z.string().optional(),
  Tide: z.string().optional(),
  TideHeights: z
    .object({
      AboveTWVD: heightValueSchema,
      AboveLocalMSL: heightValueSchema,
      AboveChartDatum: heightValueSchema,
    })
    .optional(),
});

const dailySchema = z.object({
  Date: z.string().optional(),
  LunarDate: z.string().optional(),
  TideRange: z.string().optional(),
  Time: z.array(tideTimeSchema).default([]),
});

const forecastSchema = z.object({
  Location: z.object({
    LocationId: z.string().optional(),
    LocationName: z.string().optional(),
    TimePeriods: z.object({
      Daily: z.array(dailySchema).default([]),
    }),
  }),
});

// 舊版回應使用單數 TideForecast
const recordsSchema = z.object({
  TideForecasts: z.array(forecastSchema).optional(),
  TideForecast: z.array(forecastSchema).optional(),
});

export type TideForecastRecord = z.infer<typeof forecastSchema>;
type TideTimeEntry = z.infer<typeof tideTimeSchema>;
type HeightValue = z.infer<typeof heightValueSchema>;

const TIDE_TYPES: ReadonlyMap<string, TideType> = new Map<string, TideType>([
  ['滿潮', 'high'],
  ['乾潮', 'low'],
]);

/**
 * 潮位基準優先順序：當地平均海平面 → TWVD → 海圖基準面
 */
const HEIGHT_FIELDS: ReadonlyArray<[keyof NonNullable<TideTimeEntry['TideHeights']>, HeightBasis]> = [
  ['AboveLocalMSL', 'local'],
  ['AboveTWVD', 'msl'],
  ['AboveChartDatum', 'chart'],
];

/**
 * 驗證 records 結構並取出預報清單
 */
export function extractForecasts(records: unknown): TideForecastRecord[] {
  const parsed = recordsSchema.safeParse(records);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'records';
    throw new MalformedDataError(`潮汐資料格式錯誤: ${where || 'records'} ${issue?.message ?? ''}`.trim());
  }

  const forecasts = parsed.data.TideForecasts ?? parsed.data.TideForecast;
  if (!forecasts) {
    throw new MalformedDataError('潮汐資料缺少 TideForecasts');
  }
  return forecasts;
}

/**
 * 找出指定站點的預報區塊
 * 以 LocationId 比對；上游未提供 ID 時改用 LocationName
 */
export function findStationForecast(forecasts: TideForecastRecord[], station: Station): TideForecastRecord {
  const match = forecasts.find(({ Location }) =>
    Location.LocationId !== undefined
      ? Location.LocationId === station.id
      : Location.LocationName === station.name
  );
  if (!match) {
    throw new StationNotFoundError(station.name);
  }
  return match;
}

/**
 * 依優先順序選出第一個有值的潮位
 * @returns 無任何可辨識潮位時回傳 null
 */
export function selectHeight(
  heights: TideTimeEntry['TideHeights']
): { height: number; basis: HeightBasis } | null {
  if (!heights) {
    return null;
  }
  for (const [field, basis] of HEIGHT_FIELDS) {
    const height = toHeight(heights[field]);
    if (height !== null) {
      return { height, basis };
    }
  }
  return null;
}

function toHeight(value: HeightValue): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.round(value) : null;
  }
  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? Math.round(parsed) : null;
}

/**
 * 解析 API 回應，回傳指定站點的所有潮汐事件（維持上游順序）
 */
export function parseTideEvents(records: unknown, station: Station): TideEvent[] {
  const forecast = findStationForecast(extractForecasts(records), station);
  const events: TideEvent[] = [];

  for (const daily of forecast.Location.TimePeriods.Daily) {
    for (const entry of daily.Time) {
      events.push(toTideEvent(entry, daily.LunarDate));
    }
  }

  return events;
}

function toTideEvent(entry: TideTimeEntry, lunarDate: string | undefined): TideEvent {
  const time = entry.DateTime ? parseForecastDateTime(entry.DateTime) : null;
  if (!time) {
    throw new MalformedDataError(`無法解析潮汐時間: ${entry.DateTime ?? '(missing)'}`);
  }

  const type = entry.Tide !== undefined ? TIDE_TYPES.get(entry.Tide.trim()) : undefined;
  if (!type) {
    throw new MalformedDataError(`未知的潮汐類型: ${entry.Tide ?? '(missing)'} (${entry.DateTime})`);
  }

  const selected = selectHeight(entry.TideHeights);
  if (!selected) {
    throw new MalformedDataError(`缺少潮位高度: ${entry.DateTime}`);
  }

  const event: TideEvent = { time, type, height: selected.height, basis: selected.basis };
  if (lunarDate) {
    event.lunarDate = lunarDate;
  }
  return event;
}

/**
 * 只保留時間窗內的事件（含端點），不改變順序
 */
export function filterEventsInWindow(events: TideEvent[], start: Date, end: Date): TideEvent[] {
  const from = start.getTime();
  const to = end.getTime();
  return events.filter((event) => {
    const t = event.time.getTime();
    return t >= from && t <= to;
  });
}
