/**
 * Serve Command
 * 啟動 HTTP 伺服器提供 iCalendar 訂閱
 */

import type http from 'node:http';
import { Command } from 'commander';
import { createAppContext } from '../lib/app-context.js';
import { toError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { startServer } from '../services/http-server.js';
import { getConfigService } from '../services/config.js';

export const serveCommand = new Command('serve')
  .description('啟動 HTTP 伺服器 (GET /tide/{station}.ics)')
  .option('-p, --port <port>', '監聽埠號（預設讀取 PORT 或 5000）')
  .option('-H, --host <host>', '監聽位址')
  .action(async (options: { port?: string; host?: string }) => {
    const config = getConfigService();
    const port = options.port !== undefined ? parseInt(options.port, 10) : config.getPort();

    if (Number.isNaN(port) || port < 1 || port > 65535) {
      console.error(`❌ 無效的埠號: ${options.port}`);
      process.exitCode = 1;
      return;
    }

    let server: http.Server;
    try {
      server = await startServer(createAppContext({ config }), port, options.host);
    } catch (error) {
      const err = toError(error);
      loggers.server.error('Server failed to start', err, { port });
      console.error(`❌ 伺服器啟動失敗: ${err.message}`);
      process.exitCode = 2;
      return;
    }

    loggers.server.info('Server listening', { port, host: options.host ?? '0.0.0.0' });
    console.error(`✅ 潮汐行事曆服務已啟動: http://localhost:${port}/`);
    console.error(`   訂閱網址: webcal://localhost:${port}/tide/{station}.ics`);

    // 優雅關閉
    const shutdown = (signal: string): void => {
      loggers.server.info('Shutting down', { signal });
      server.close((error) => {
        if (error) {
          loggers.server.error('Server close failed', error);
          process.exitCode = 2;
        }
      });
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  });
