/**
 * Input Validation
 * 預報天數等使用者輸入的驗證
 */

import { ValidationError } from './errors.js';

export const MIN_DAYS = 1;
export const MAX_DAYS = 30;
export const DEFAULT_DAYS = 30;

/**
 * 解析預報天數
 * 未提供時使用預設值；非整數或超出 1-30 範圍則拋出 ValidationError
 */
export function parseDays(input: string | number | undefined | null): number {
  if (input === undefined || input === null) {
    return DEFAULT_DAYS;
  }

  let days: number;
  if (typeof input === 'number') {
    days = input;
  } else {
    const trimmed = input.trim();
    if (trimmed === '') {
      return DEFAULT_DAYS;
    }
    if (!/^-?\d+$/.test(trimmed)) {
      throw new ValidationError(`days 必須是整數: ${input}`, 'days');
    }
    days = Number(trimmed);
  }

  if (!Number.isInteger(days) || days < MIN_DAYS || days > MAX_DAYS) {
    throw new ValidationError(`days 必須介於 ${MIN_DAYS} 到 ${MAX_DAYS} 之間: ${input}`, 'days');
  }

  return days;
}
