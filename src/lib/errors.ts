/**
 * Error Types
 * 錯誤類型 - 每種錯誤帶有穩定的 code 與對應的 HTTP 狀態碼
 */

export type ErrorCode =
  | 'FETCH_FAILED'
  | 'STATION_NOT_FOUND'
  | 'MALFORMED_DATA'
  | 'VALIDATION_ERROR'
  | 'NOT_CONFIGURED';

export abstract class TideCalendarError extends Error {
  abstract readonly code: ErrorCode;
  /** 對應的 HTTP 狀態碼 */
  abstract readonly status: number;

  toJSON(): { code: ErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

/**
 * 與上游 API 溝通失敗（網路錯誤、非 2xx 回應、success 不為 true）
 */
export class FetchError extends TideCalendarError {
  readonly code = 'FETCH_FAILED';
  readonly status = 502;
  /** 上游回應的 HTTP 狀態碼（網路錯誤時為 undefined） */
  readonly upstreamStatus?: number;

  constructor(message: string, upstreamStatus?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FetchError';
    this.upstreamStatus = upstreamStatus;
  }
}

export class StationNotFoundError extends TideCalendarError {
  readonly code = 'STATION_NOT_FOUND';
  readonly status = 404;
  readonly input: string;
  /** 名稱相近的站點 */
  readonly candidates: string[];

  constructor(input: string, candidates: string[] = []) {
    super(`找不到潮汐站「${input}」`);
    this.name = 'StationNotFoundError';
    this.input = input;
    this.candidates = candidates;
  }

  override toJSON(): { code: ErrorCode; message: string; candidates: string[] } {
    return { ...super.toJSON(), candidates: this.candidates };
  }
}

/**
 * 上游回應缺少必要欄位或格式錯誤
 */
export class MalformedDataError extends TideCalendarError {
  readonly code = 'MALFORMED_DATA';
  readonly status = 502;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MalformedDataError';
  }
}

export class ValidationError extends TideCalendarError {
  readonly code = 'VALIDATION_ERROR';
  readonly status = 400;
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * 缺少必要設定（例如 API 授權碼）
 */
export class ConfigurationError extends TideCalendarError {
  readonly code = 'NOT_CONFIGURED';
  readonly status = 500;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isTideCalendarError(error: unknown): error is TideCalendarError {
  return error instanceof TideCalendarError;
}

/**
 * 將任意錯誤轉成 Error 實例（用於日誌）
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * CLI 結束碼
 * 1: 參數錯誤或找不到站點、2: 上游失敗或資料錯誤、3: 缺少授權碼
 */
export function exitCodeFor(error: unknown): number {
  if (!isTideCalendarError(error)) {
    return 1;
  }
  switch (error.code) {
    case 'FETCH_FAILED':
    case 'MALFORMED_DATA':
      return 2;
    case 'NOT_CONFIGURED':
      return 3;
    case 'VALIDATION_ERROR':
    case 'STATION_NOT_FOUND':
      return 1;
  }
}
