/**
 * CWA API Client
 * 中央氣象署開放資料 API 客戶端 - 取得潮汐預報 (F-A0021-001)
 */

import { ofetch, FetchError as HttpFetchError } from 'ofetch';
import { z } from 'zod';
import type { ForecastQuery, ForecastSource, RawForecastResponse } from '../types/cwa.js';
import { FetchError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { recordUpstreamRequest, recordUpstreamRetry } from '../lib/metrics.js';
import { formatTaipeiDateTime, forecastWindow } from '../lib/time-utils.js';
import { retry, isRetryableStatus, isTransientNetworkError } from './retry.js';

export const API_BASE = 'https://opendata.cwa.gov.tw/api/v1/rest/datastore';
export const TIDE_FORECAST_DATASET = 'F-A0021-001';

const DEFAULT_TIMEOUT_MS = 30 * 1000;

const envelopeSchema = z.object({
  success: z.union([z.literal('true'), z.literal(true)]),
  records: z.unknown(),
});

export interface CwaApiClientOptions {
  /** 單次請求逾時（毫秒） */
  timeoutMs?: number;
  /** 暫時性錯誤的重試次數（預設 1） */
  maxRetries?: number;
  /** 重試前的基本等待時間（毫秒） */
  retryDelayMs?: number;
  baseUrl?: string;
}

export interface UpstreamStats {
  totalRequests: number;
  failedRequests: number;
  lastSuccessAt?: string;
  lastFailureAt?: string;
  lastError?: string;
}

export class CwaApiClient implements ForecastSource {
  private readonly apiKey: string;
  private readonly options: Required<CwaApiClientOptions>;
  private readonly stats: UpstreamStats = { totalRequests: 0, failedRequests: 0 };

  constructor(apiKey: string, options: CwaApiClientOptions = {}) {
    this.apiKey = apiKey;
    this.options = {
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? 1,
      retryDelayMs: options.retryDelayMs ?? 500,
      baseUrl: options.baseUrl ?? API_BASE,
    };
  }

  /**
   * 取得單一站點的潮汐預報
   * 查詢區間為 [now - 1 天, now + days 天]
   */
  async fetchTideForecast(query: ForecastQuery): Promise<RawForecastResponse> {
    const { start, end } = forecastWindow(query.now ?? new Date(), query.days);
    const url = `${this.options.baseUrl}/${TIDE_FORECAST_DATASET}`;
    const context = { url, stationId: query.stationId, days: query.days };
    const startTime = Date.now();

    this.stats.totalRequests++;
    loggers.api.debug('API request started', context);

    try {
      const body = await retry(
        () =>
          ofetch<unknown>(url, {
            query: {
              Authorization: this.apiKey,
              format: 'JSON',
              LocationId: query.stationId,
              timeFrom: formatTaipeiDateTime(start),
              timeTo: formatTaipeiDateTime(end),
            },
            timeout: this.options.timeoutMs,
            // 重試由 retry() 統一處理
            retry: 0,
          }),
        {
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.retryDelayMs,
          shouldRetry: isTransientError,
          onRetry: (error, attempt, delayMs) => {
            recordUpstreamRetry();
            loggers.api.warn('API request retrying', {
              ...context,
              attempt,
              delayMs: Math.round(delayMs),
              reason: toFetchError(error).message,
            });
          },
        }
      );

      const envelope = envelopeSchema.safeParse(body);
      if (!envelope.success) {
        throw new FetchError(`API 回應失敗: ${describeBody(body)}`);
      }

      const duration = Date.now() - startTime;
      this.stats.lastSuccessAt = new Date().toISOString();
      recordUpstreamRequest(true, 200, duration);
      loggers.api.info('API request completed', { ...context, duration, statusCode: 200 });

      return { success: 'true', records: envelope.data.records };
    } catch (error) {
      const failure = toFetchError(error);
      const duration = Date.now() - startTime;

      this.stats.failedRequests++;
      this.stats.lastFailureAt = new Date().toISOString();
      this.stats.lastError = failure.message;
      recordUpstreamRequest(false, failure.upstreamStatus, duration);
      loggers.api.error('API request failed', failure, {
        ...context,
        duration,
        statusCode: failure.upstreamStatus,
      });

      throw failure;
    }
  }

  /**
   * 取得上游請求統計（用於健康檢查）
   */
  getStats(): UpstreamStats {
    return { ...this.stats };
  }
}

/**
 * 網路錯誤與 408/429/5xx 視為暫時性錯誤，其餘 4xx 不重試
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpFetchError) {
    const status = error.statusCode ?? error.status;
    if (status !== undefined) {
      return isRetryableStatus(status);
    }
  }
  return isTransientNetworkError(error);
}

/**
 * 將 ofetch 或其他錯誤統一轉為 FetchError，保留上游狀態碼與訊息
 * ofetch 的 error.message 含完整請求網址（包括授權碼），不可沿用
 */
export function toFetchError(error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  if (error instanceof HttpFetchError) {
    const status = error.statusCode ?? error.status;
    const detail =
      extractMessage(error.data) ?? error.statusText ?? (error.cause instanceof Error ? error.cause.message : undefined);
    const label = status !== undefined ? `HTTP ${status}` : '網路錯誤';
    const message = detail ? `氣象署 API 請求失敗 (${label}): ${detail}` : `氣象署 API 請求失敗 (${label})`;
    return new FetchError(message, status, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchError(`氣象署 API 請求失敗: ${message}`, undefined, { cause: error });
}

function extractMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.length > 0) {
    return data.slice(0, 200);
  }
  if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}

function describeBody(body: unknown): string {
  const message = extractMessage(body);
  if (message) {
    return message;
  }
  const text = typeof body === 'string' ? body : JSON.stringify(body) ?? String(body);
  return text.slice(0, 200);
}
