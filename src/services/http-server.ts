/**
 * HTTP Server
 * 提供 iCalendar 訂閱、站點清單、健康檢查與 Prometheus 指標端點
 */

import http from 'node:http';
import type { AppContext } from '../lib/app-context.js';
import { isTideCalendarError, toError } from '../lib/errors.js';
import { createRequestContext, loggers, type LogContext } from '../lib/logger.js';
import { getMetricsContentType, getMetricsSnapshot, recordHttpRequest } from '../lib/metrics.js';
import { DEFAULT_DAYS, MAX_DAYS, MIN_DAYS } from '../lib/validation.js';

const FEED_PATH = /^\/tide\/(.+)\.ics$/;
const FEED_CACHE_CONTROL = 'public, max-age=3600';

type RouteName = 'feed' | 'stations' | 'health' | 'metrics' | 'index' | 'not_found';

interface Reply {
  status: number;
  headers: Record<string, string>;
  body: string;
}

function json(status: number, data: unknown): Reply {
  return {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
    body: JSON.stringify(data),
  };
}

/**
 * 將錯誤轉為 HTTP 回應
 * 已知錯誤依 status 回應，其餘一律 500 且不洩漏內部訊息
 */
export function errorReply(error: unknown): Reply {
  if (isTideCalendarError(error)) {
    return json(error.status, { error: error.toJSON() });
  }
  return json(500, { error: { code: 'INTERNAL_ERROR', message: '伺服器內部錯誤' } });
}

function route(pathname: string): RouteName {
  if (FEED_PATH.test(pathname)) return 'feed';
  switch (pathname) {
    case '/api/stations':
      return 'stations';
    case '/health':
      return 'health';
    case '/metrics':
      return 'metrics';
    case '/':
      return 'index';
    default:
      return 'not_found';
  }
}

export function createRequestHandler(ctx: AppContext) {
  async function dispatch(name: RouteName, url: URL, host: string): Promise<Reply> {
    switch (name) {
      case 'feed': {
        const match = FEED_PATH.exec(url.pathname);
        const stationInput = match?.[1] ?? '';
        const { station, ics } = await ctx.feed.getFeed(stationInput, url.searchParams.get('days'));
        return {
          status: 200,
          headers: {
            'Content-Type': 'text/calendar; charset=utf-8',
            'Content-Disposition': `attachment; filename*=UTF-8''${encodeURIComponent(`${station.name}_tide.ics`)}`,
            'Cache-Control': FEED_CACHE_CONTROL,
          },
          body: ics,
        };
      }

      case 'stations': {
        const stations = ctx.stations.getAll().map(({ id, name }) => ({ id, name }));
        return json(200, { stations, total: stations.length });
      }

      case 'health':
        return json(200, ctx.health.check());

      case 'metrics':
        return {
          status: 200,
          headers: { 'Content-Type': getMetricsContentType() },
          body: await getMetricsSnapshot(),
        };

      case 'index':
        return json(200, {
          name: 'Tide Calendar',
          description: '臺灣潮汐預報 iCalendar 訂閱服務',
          endpoints: {
            feed: `/tide/{station}.ics?days=${DEFAULT_DAYS}`,
            stations: '/api/stations',
            health: '/health',
            metrics: '/metrics',
          },
          days: { default: DEFAULT_DAYS, min: MIN_DAYS, max: MAX_DAYS },
          subscribe: `webcal://${host}/tide/{station}.ics`,
        });

      case 'not_found':
        return json(404, { error: { code: 'NOT_FOUND', message: `找不到路徑: ${url.pathname}` } });
    }
  }

  return async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const startTime = Date.now();
    const context: LogContext = createRequestContext(req.method, req.url);
    const host = req.headers.host ?? 'localhost';
    const url = new URL(req.url ?? '/', `http://${host}`);
    const name = route(url.pathname);

    let reply: Reply;
    if (req.method !== 'GET') {
      reply = json(405, { error: { code: 'METHOD_NOT_ALLOWED', message: `不支援的方法: ${req.method}` } });
      reply.headers['Allow'] = 'GET';
    } else {
      try {
        reply = await dispatch(name, url, host);
      } catch (error) {
        reply = errorReply(error);
        const logContext = { ...context, statusCode: reply.status };
        if (reply.status >= 500) {
          loggers.server.error('Request failed', toError(error), logContext);
        } else {
          loggers.server.warn('Request rejected', {
            ...logContext,
            reason: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }

    res.writeHead(reply.status, reply.headers);
    res.end(reply.body);

    const duration = Date.now() - startTime;
    recordHttpRequest(name, reply.status, duration);
    loggers.server.info('Request completed', { ...context, statusCode: reply.status, duration });
  };
}

export function createTideServer(ctx: AppContext): http.Server {
  const handle = createRequestHandler(ctx);
  return http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      loggers.server.error('Unhandled request error', toError(error));
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json; charset=utf-8' });
      }
      res.end();
    });
  });
}

/**
 * 啟動伺服器，監聽成功後 resolve
 */
export function startServer(ctx: AppContext, port: number, host?: string): Promise<http.Server> {
  const server = createTideServer(ctx);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
