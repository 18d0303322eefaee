/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，每行一筆，便於集中式日誌系統解析
 * 特性：
 *   - 日誌級別控制（LOG_LEVEL）
 *   - requestId 追蹤
 *   - 執行時間 (duration)
 *   - 錯誤堆疊記錄
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一個請求的完整生命週期 */
  requestId?: string;
  /** HTTP 方法 */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'info') */
  minLevel?: LogLevel;
  /** 全部輸出到 stderr（CLI 模式下保持 stdout 乾淨） */
  stderr?: boolean;
  /** 是否包含堆疊追蹤 (default: true) */
  includeStack?: boolean;
  /** 自訂格式化函數 */
  formatter?: (entry: LogEntry) => string;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel ?? 'info',
      stderr: config.stderr ?? false,
      includeStack: config.includeStack !== false,
      formatter: config.formatter ?? ((entry) => JSON.stringify(entry)),
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    const formatted = this.config.formatter(entry);

    if (this.config.stderr) {
      console.error(formatted);
      return;
    }

    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry = this.createEntry('error', message, context);
    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        code,
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    this.output(this.createEntry(level, message, context));
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    };
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  setStderr(stderr: boolean): void {
    this.config.stderr = stderr;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} 完成`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.error(
        `${operation} 失敗`,
        error instanceof Error ? error : new Error(String(error)),
        { ...context, duration: Date.now() - startTime }
      );
      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例，按組件分類
 */
export const loggers = {
  api: new StructuredLogger('API'),
  cache: new StructuredLogger('Cache', { minLevel: 'warn' }),
  feed: new StructuredLogger('Feed'),
  server: new StructuredLogger('Server'),
  config: new StructuredLogger('Config', { minLevel: 'warn' }),
  cli: new StructuredLogger('CLI'),
};

/**
 * 統一調整所有組件的日誌設定
 */
export function configureLoggers(options: { minLevel?: LogLevel; stderr?: boolean }): void {
  for (const logger of Object.values(loggers)) {
    if (options.minLevel) {
      logger.setMinLevel(options.minLevel);
    }
    if (options.stderr !== undefined) {
      logger.setStderr(options.stderr);
    }
  }
}

/**
 * 建立 HTTP 請求的追蹤上下文
 */
export function createRequestContext(method?: string, url?: string): LogContext {
  return {
    requestId: randomUUID(),
    method,
    url,
  };
}

/**
 * 時間格式化輔助函數
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
