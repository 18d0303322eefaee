/**
 * Tide Title Module
 * 潮汐事件的標題與描述文字
 */

import type { HeightBasis, TideEvent, TideType } from '../types/tide.js';

export const TIDE_TYPE_LABEL: Record<TideType, string> = {
  high: '滿潮',
  low: '乾潮',
};

const TIDE_GLYPH: Record<TideType, string> = {
  high: '🔺',
  low: '🔻',
};

export const HEIGHT_BASIS_LABEL: Record<HeightBasis, string> = {
  local: '當地平均海平面',
  msl: '臺灣高程基準 (TWVD)',
  chart: '海圖基準面',
};

// 行政區層級字元：縣、市、區、鄉、鎮
const ADMINISTRATIVE_CHARS = /[市縣區鄉鎮]/g;

/**
 * 簡化站點名稱，移除行政區層級字元
 * 例如「基隆市中正區」→「基隆中正」
 */
export function shortenStationName(name: string): string {
  return name.replace(ADMINISTRATIVE_CHARS, '');
}

/**
 * 事件標題，例如「基隆中正 🔺滿潮 123cm」
 */
export function formatTideTitle(event: TideEvent, stationName: string): string {
  return `${shortenStationName(stationName)} ${TIDE_GLYPH[event.type]}${TIDE_TYPE_LABEL[event.type]} ${event.height}cm`;
}

/**
 * 事件描述（多行）
 */
export function formatTideDescription(event: TideEvent, stationName: string): string {
  const lines = [
    `站點: ${stationName}`,
    `類型: ${TIDE_TYPE_LABEL[event.type]}`,
    `潮位: ${event.height} cm (${HEIGHT_BASIS_LABEL[event.basis]})`,
  ];
  if (event.lunarDate) {
    lines.push(`農曆: ${event.lunarDate}`);
  }
  return lines.join('\n');
}
