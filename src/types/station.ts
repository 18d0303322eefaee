/**
 * 潮汐預報站點
 * 對應氣象署站點對照表的 LocationId / LocationName
 */
export interface Station {
  /** 站點 ID，例如 "10017010" */
  id: string;
  /** 站點名稱，例如 "基隆市中正區" */
  name: string;
}

/**
 * 站點解析結果
 */
export interface StationResolveResult {
  success: true;
  station: Station;
}

/**
 * 站點解析錯誤
 */
export interface StationResolveError {
  success: false;
  error: {
    code: 'STATION_NOT_FOUND';
    message: string;
    candidates: string[];
  };
}

export type StationResolveResponse = StationResolveResult | StationResolveError;
