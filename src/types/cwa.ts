/**
 * 氣象署開放資料 datastore 回應
 * records 內容由 tide-parser 以 schema 驗證後才使用
 */
export interface RawForecastResponse {
  success: 'true';
  records: unknown;
}

/**
 * 潮汐預報查詢參數
 */
export interface ForecastQuery {
  stationId: string;
  /** 預報天數 (1-30) */
  days: number;
  /** 查詢基準時間，預設為現在 */
  now?: Date;
}

/**
 * 潮汐預報資料來源
 */
export interface ForecastSource {
  fetchTideForecast(query: ForecastQuery): Promise<RawForecastResponse>;
}
