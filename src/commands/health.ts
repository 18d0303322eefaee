/**
 * Health Check Command
 * 健康檢查指令 - 檢查授權碼、站點表與快取設定
 */

import { Command } from 'commander';
import { createAppContext } from '../lib/app-context.js';
import { outputData, renderTable, reportCommandError, resolveFormat } from '../lib/output-formatter.js';
import { summarizeHealth, type HealthCheckResult } from '../services/health.js';

export const healthCommand = new Command('health')
  .description('檢查系統健康狀態')
  .action((_options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const result = createAppContext().health.check();
      outputData(result, format, () => renderHealth(result));

      // 缺少授權碼時以結束碼 3 提示
      if (!result.api_configured) {
        process.exitCode = 3;
      }
    } catch (error) {
      reportCommandError(error, format);
    }
  });

function renderHealth(result: HealthCheckResult): string {
  const rows: Array<[string, string]> = [
    ['狀態', result.status === 'ok' ? '✅ ok' : '⚠️ degraded'],
    ['API 授權碼', result.api_configured ? '已設定' : '未設定'],
    ['站點數', String(result.stations_loaded)],
    ['快取', `${result.cache.mode} (TTL ${result.cache.ttlHours}h, ${result.cache.entryCount} 筆)`],
    ['時間', result.timestamp],
  ];
  return `${renderTable(['項目', '狀態'], rows)}\n${summarizeHealth(result)}`;
}
