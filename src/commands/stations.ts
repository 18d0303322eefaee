/**
 * Stations Command
 * 潮汐站點查詢指令
 */

import { Command } from 'commander';
import { StationRegistry } from '../lib/station-registry.js';
import { getConfigService } from '../services/config.js';
import { outputData, renderTable, reportCommandError, resolveFormat } from '../lib/output-formatter.js';

let registry: StationRegistry | null = null;

function getRegistry(): StationRegistry {
  if (!registry) {
    registry = StationRegistry.fromFile(getConfigService().getStationsFile());
  }
  return registry;
}

/**
 * 清除已載入的站點表（用於測試）
 */
export function resetStationsCache(): void {
  registry = null;
}

export const stationsCommand = new Command('stations')
  .description('潮汐站點查詢');

/**
 * tide-cal stations list
 */
stationsCommand
  .command('list')
  .description('列出所有潮汐站點')
  .option('--id-only', '只顯示站點 ID')
  .option('--name-only', '只顯示站點名稱')
  .action((options: { idOnly?: boolean; nameOnly?: boolean }, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const stations = getRegistry().getAll();

      if (options.idOnly || options.nameOnly) {
        const values = stations.map((s) => (options.idOnly ? s.id : s.name));
        console.log(format === 'json' ? JSON.stringify(values) : values.join('\n'));
        return;
      }

      outputData(stations, format, () =>
        renderTable(['ID', '名稱'], stations.map((s) => [s.id, s.name])) +
        `\n共 ${stations.length} 個站點`
      );
    } catch (error) {
      reportCommandError(error, format);
    }
  });

/**
 * tide-cal stations search <query>
 */
stationsCommand
  .command('search <query>')
  .description('搜尋站點（支援模糊搜尋）')
  .option('-l, --limit <number>', '限制結果數量', '10')
  .action((query: string, options: { limit: string }, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const limit = parseInt(options.limit, 10);
      const results = getRegistry().search(query, Number.isNaN(limit) ? 10 : limit);

      outputData(results, format, () => {
        if (results.length === 0) {
          return `找不到符合「${query}」的站點`;
        }
        return (
          `搜尋「${query}」的結果：\n` +
          renderTable(['ID', '名稱'], results.map((s) => [s.id, s.name])) +
          `\n共 ${results.length} 個結果`
        );
      });
    } catch (error) {
      reportCommandError(error, format);
    }
  });

/**
 * tide-cal stations info <station>
 */
stationsCommand
  .command('info <station>')
  .description('取得站點資訊（支援 ID 或名稱）')
  .action((stationInput: string, _options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const station = getRegistry().resolve(stationInput);
      outputData({ success: true, station }, format, () =>
        [
          `站點資訊：${station.name}`,
          `  ID：${station.id}`,
          `  名稱：${station.name}`,
        ].join('\n')
      );
    } catch (error) {
      reportCommandError(error, format);
    }
  });
