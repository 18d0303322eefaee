/**
 * Time Utils Module
 * 時間工具模組 - 臺灣時間（UTC+8，無日光節約）與 iCalendar 時間格式
 */

export const TAIPEI_TIMEZONE = 'Asia/Taipei';

const TAIPEI_OFFSET_MS = 8 * 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * 轉成臺灣時間的牆上時鐘（以 UTC 欄位表示）
 */
function toTaipeiWallClock(date: Date): Date {
  return new Date(date.getTime() + TAIPEI_OFFSET_MS);
}

/**
 * 格式化為氣象署查詢參數格式 (yyyy-MM-ddTHH:mm:ss，臺灣時間)
 */
export function formatTaipeiDateTime(date: Date): string {
  return toTaipeiWallClock(date).toISOString().slice(0, 19);
}

/**
 * 格式化為精簡格式 (yyyyMMddHHmm，臺灣時間)，用於事件 UID
 */
export function formatTaipeiCompact(date: Date): string {
  return formatTaipeiDateTime(date).replace(/[-:T]/g, '').slice(0, 12);
}

/**
 * 格式化為 iCalendar UTC 時間 (yyyyMMddTHHmmssZ)
 */
export function formatICalUtc(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60 * 1000);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * 解析帶時區的 ISO 時間，例如 2025-12-29T05:01:00+08:00
 * 未帶時區資訊者視為臺灣時間
 * @returns 無法解析時回傳 null
 */
export function parseForecastDateTime(value: string): Date | null {
  const trimmed = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?/.test(trimmed)) {
    return null;
  }

  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(trimmed);
  const date = new Date(hasZone ? trimmed : `${trimmed}+08:00`);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * 預報時間窗：往前 1 天（避免時區差異把今天的事件過濾掉）到往後 days 天
 */
export function forecastWindow(now: Date, days: number): { start: Date; end: Date } {
  return {
    start: addDays(now, -1),
    end: addDays(now, days),
  };
}
