/**
 * 潮汐類型：滿潮 / 乾潮
 */
export type TideType = 'high' | 'low';

/**
 * 潮位高度基準
 * - local: 當地平均海平面 (AboveLocalMSL)
 * - msl: 臺灣高程基準 (AboveTWVD)
 * - chart: 海圖基準面 (AboveChartDatum)
 */
export type HeightBasis = 'local' | 'msl' | 'chart';

/**
 * 正規化後的單筆潮汐事件
 */
export interface TideEvent {
  /** 發生時間 */
  time: Date;
  type: TideType;
  /** 潮位（公分，可為負值） */
  height: number;
  basis: HeightBasis;
  /** 農曆日期，例如 "11/10" */
  lunarDate?: string;
}
