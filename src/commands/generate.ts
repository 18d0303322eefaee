/**
 * Generate Command
 * 產生潮汐 iCalendar 檔案
 */

import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { createAppContext, type AppContext } from '../lib/app-context.js';
import { loggers } from '../lib/logger.js';
import { outputData, renderTable, reportCommandError, resolveFormat } from '../lib/output-formatter.js';
import { formatTaipeiDateTime } from '../lib/time-utils.js';
import { DEFAULT_DAYS } from '../lib/validation.js';

export const DEFAULT_STATION = '基隆市中正區';
export const DEFAULT_OUTPUT = './output/tide.ics';
/** 輸出到 stdout */
export const STDOUT_OUTPUT = '-';

export interface GenerateOptions {
  station: string;
  days?: string;
  output: string;
}

export interface GenerateResult {
  success: true;
  station: { id: string; name: string };
  days: number;
  eventCount: number;
  firstEvent?: string;
  lastEvent?: string;
  output: string;
}

/**
 * 產生並寫出行事曆
 * output 為 - 時直接寫到 stdout，不另外輸出摘要
 */
export async function generateCalendar(ctx: AppContext, options: GenerateOptions): Promise<GenerateResult> {
  const feed = await loggers.cli.trackAsync(
    '產生行事曆',
    () => ctx.feed.getFeed(options.station, options.days),
    { station: options.station }
  );

  if (options.output === STDOUT_OUTPUT) {
    process.stdout.write(feed.ics);
  } else {
    const outputPath = path.resolve(options.output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, feed.ics, 'utf-8');
  }

  const first = feed.events[0];
  const last = feed.events[feed.events.length - 1];

  return {
    success: true,
    station: { id: feed.station.id, name: feed.station.name },
    days: feed.days,
    eventCount: feed.events.length,
    firstEvent: first ? formatTaipeiDateTime(first.time) : undefined,
    lastEvent: last ? formatTaipeiDateTime(last.time) : undefined,
    output: options.output,
  };
}

export const generateCommand = new Command('generate')
  .description('產生潮汐 iCalendar (.ics) 檔案')
  .option('-s, --station <station>', '站點名稱或 ID', DEFAULT_STATION)
  .option('-d, --days <days>', `預報天數 (1-30，預設 ${DEFAULT_DAYS})`)
  .option('-o, --output <path>', '輸出路徑，- 表示 stdout', DEFAULT_OUTPUT)
  .option('--api-key <key>', '氣象署 API 授權碼（預設讀取 CWA_API_KEY）')
  .action(async (options: GenerateOptions & { apiKey?: string }, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const ctx = createAppContext({ apiKey: options.apiKey });
      const result = await generateCalendar(ctx, options);

      if (options.output === STDOUT_OUTPUT) {
        return;
      }

      outputData(result, format, () =>
        renderTable(
          ['項目', '內容'],
          [
            ['站點', `${result.station.name} (${result.station.id})`],
            ['天數', result.days],
            ['事件數', result.eventCount],
            ['第一筆', result.firstEvent ?? '-'],
            ['最後一筆', result.lastEvent ?? '-'],
            ['輸出', result.output],
          ]
        )
      );
    } catch (error) {
      reportCommandError(error, format);
    }
  });
