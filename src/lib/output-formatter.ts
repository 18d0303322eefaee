/**
 * Output Formatter
 * 統一輸出格式處理：json | table
 */

import Table from 'cli-table3';
import { exitCodeFor, isTideCalendarError, StationNotFoundError } from './errors.js';

export type OutputFormat = 'json' | 'table';

export function isValidFormat(format: string): format is OutputFormat {
  return format === 'json' || format === 'table';
}

/**
 * 從 commander 的全域選項取得輸出格式，無效值視為 json
 */
export function resolveFormat(value: unknown): OutputFormat {
  return typeof value === 'string' && isValidFormat(value) ? value : 'json';
}

/**
 * 輸出資料到 stdout
 * @param tableRenderer 若為 table 格式，使用此函數渲染
 */
export function outputData(data: unknown, format: OutputFormat = 'json', tableRenderer?: () => string): void {
  if (format === 'table' && tableRenderer) {
    console.log(tableRenderer());
    return;
  }
  console.log(JSON.stringify(data, null, 2));
}

export function renderTable(head: string[], rows: Array<Array<string | number>>): string {
  const table = new Table({
    head,
    style: { head: ['cyan'] },
  });
  for (const row of rows) {
    table.push(row.map(String));
  }
  return table.toString();
}

/**
 * 指令失敗時輸出錯誤並設定結束碼
 * json 格式輸出到 stdout 方便腳本解析，table 格式輸出到 stderr
 */
export function reportCommandError(error: unknown, format: OutputFormat): void {
  const detail = isTideCalendarError(error)
    ? error.toJSON()
    : { code: 'UNKNOWN_ERROR', message: error instanceof Error ? error.message : String(error) };

  if (format === 'json') {
    console.log(JSON.stringify({ success: false, error: detail }, null, 2));
  } else {
    console.error(`錯誤：${detail.message}`);
    if (error instanceof StationNotFoundError && error.candidates.length > 0) {
      console.error(`相似站點：${error.candidates.join('、')}`);
    }
  }

  process.exitCode = exitCodeFor(error);
}
