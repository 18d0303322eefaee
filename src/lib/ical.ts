/**
 * iCalendar Serializer
 * 將潮汐事件輸出為 RFC 5545 文字，供行事曆 App 訂閱
 */

import type { Station } from '../types/station.js';
import type { TideEvent } from '../types/tide.js';
import { formatTideDescription, formatTideTitle } from './tide-title.js';
import { addMinutes, formatICalUtc, formatTaipeiCompact, TAIPEI_TIMEZONE } from './time-utils.js';

export const EVENT_DURATION_MINUTES = 30;
export const DEFAULT_REFRESH_INTERVAL = 'PT6H';

const CRLF = '\r\n';
const MAX_LINE_OCTETS = 75;
const UID_DOMAIN = 'tide-calendar';

export interface CalendarOptions {
  /** DTSTAMP 使用的時間，預設為現在 */
  generatedAt?: Date;
  /** 建議行事曆 App 重新抓取的間隔 (ISO 8601 duration) */
  refreshInterval?: string;
}

/**
 * 跳脫 TEXT 值中的特殊字元
 */
export function escapeText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/**
 * 折行：每行最多 75 octets，續行以單一空白開頭
 * 以字元（code point）為單位切割，不會切斷 UTF-8 多位元組序列
 */
export function foldLine(line: string): string {
  let result = '';
  let current = '';
  let currentOctets = 0;
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8');
    if (currentOctets + octets > limit) {
      result += current + CRLF + ' ';
      current = '';
      currentOctets = 0;
      // 續行開頭的空白佔 1 octet
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }

  return result + current;
}

/**
 * 事件 UID：同一站點、時間、潮汐類型每次產生都相同，行事曆 App 才能正確更新
 */
export function buildEventUid(event: TideEvent, station: Station): string {
  return `${formatTaipeiCompact(event.time)}-${event.type}-${station.id}@${UID_DOMAIN}`;
}

function buildEvent(event: TideEvent, station: Station, dtstamp: string): string[] {
  return [
    'BEGIN:VEVENT',
    `UID:${buildEventUid(event, station)}`,
    `DTSTAMP:${dtstamp}`,
    `DTSTART:${formatICalUtc(event.time)}`,
    `DTEND:${formatICalUtc(addMinutes(event.time, EVENT_DURATION_MINUTES))}`,
    `SUMMARY:${escapeText(formatTideTitle(event, station.name))}`,
    `DESCRIPTION:${escapeText(formatTideDescription(event, station.name))}`,
    'TRANSP:TRANSPARENT',
    'END:VEVENT',
  ];
}

/**
 * 產生完整的 VCALENDAR 文字
 * 事件依輸入順序輸出
 */
export function buildCalendar(
  events: readonly TideEvent[],
  station: Station,
  options: CalendarOptions = {}
): string {
  const dtstamp = formatICalUtc(options.generatedAt ?? new Date());
  const refreshInterval = options.refreshInterval ?? DEFAULT_REFRESH_INTERVAL;

  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:-//Tide Calendar//${escapeText(station.name)}//TW`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    `X-WR-CALNAME:${escapeText(`🌊 ${station.name}潮汐`)}`,
    `X-WR-TIMEZONE:${TAIPEI_TIMEZONE}`,
    `REFRESH-INTERVAL;VALUE=DURATION:${refreshInterval}`,
    `X-PUBLISHED-TTL:${refreshInterval}`,
    ...events.flatMap((event) => buildEvent(event, station, dtstamp)),
    'END:VCALENDAR',
  ];

  return lines.map(foldLine).join(CRLF) + CRLF;
}
