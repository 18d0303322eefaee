/**
 * Station Registry Module
 * 潮汐站點對照表 - 載入一次後不再變動，支援 ID、名稱、台/臺 異體字查詢
 */

import fs from 'node:fs';
import { z } from 'zod';
import type { Station, StationResolveResponse } from '../types/station.js';
import { StationNotFoundError } from './errors.js';
import { getTopCandidates } from './fuzzy.js';

/**
 * 氣象署站點對照表格式 (location.json)
 */
const stationFileSchema = z.array(
  z.object({
    LocationId: z.string().min(1),
    LocationName: z.string().min(1),
  })
);

const MAX_CANDIDATES = 5;

export class StationRegistry {
  private readonly stations: readonly Station[];
  private readonly stationById: Map<string, Station>;
  private readonly stationByName: Map<string, Station>;
  private readonly stationNames: string[];

  constructor(stations: Station[]) {
    this.stations = Object.freeze(stations.map((s) => Object.freeze({ id: s.id, name: s.name })));
    this.stationById = new Map();
    this.stationByName = new Map();
    this.stationNames = [];

    for (const station of this.stations) {
      this.stationById.set(station.id, station);
      this.stationByName.set(station.name, station);
      this.stationNames.push(station.name);
    }
  }

  /**
   * 從 JSON 檔案載入對照表
   * @throws Error 檔案不存在或格式錯誤
   */
  static fromFile(filePath: string): StationRegistry {
    const content = fs.readFileSync(filePath, 'utf-8');
    const parsed = stationFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`站點對照表格式錯誤 (${filePath}): ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return new StationRegistry(
      parsed.data.map((row) => ({ id: row.LocationId, name: row.LocationName }))
    );
  }

  /**
   * 解析站點 ID 或名稱
   */
  tryResolve(input: string): StationResolveResponse {
    const normalized = decodeStationInput(input);

    const station =
      this.stationById.get(normalized) ??
      this.stationByName.get(normalized) ??
      getVariants(normalized)
        .map((variant) => this.stationByName.get(variant))
        .find((s): s is Station => s !== undefined);

    if (station) {
      return { success: true, station };
    }

    const candidates = getTopCandidates(normalized, this.stationNames, MAX_CANDIDATES);
    return {
      success: false,
      error: {
        code: 'STATION_NOT_FOUND',
        message: `找不到潮汐站「${normalized}」`,
        candidates,
      },
    };
  }

  /**
   * 解析站點，找不到時拋出 StationNotFoundError
   */
  resolve(input: string): Station {
    const result = this.tryResolve(input);
    if (!result.success) {
      throw new StationNotFoundError(decodeStationInput(input), result.error.candidates);
    }
    return result.station;
  }

  getAll(): readonly Station[] {
    return this.stations;
  }

  getById(id: string): Station | undefined {
    return this.stationById.get(id);
  }

  /**
   * 搜尋站點（回傳多個結果）
   */
  search(query: string, limit: number = 10): Station[] {
    return getTopCandidates(query, this.stationNames, limit)
      .map((name) => this.stationByName.get(name))
      .filter((s): s is Station => s !== undefined);
  }

  get size(): number {
    return this.stations.length;
  }
}

/**
 * 去除空白並解開 URL 編碼（訂閱網址中的中文站名）
 */
function decodeStationInput(input: string): string {
  const trimmed = input.trim();
  if (!trimmed.includes('%')) {
    return trimmed;
  }
  try {
    return decodeURIComponent(trimmed).trim();
  } catch {
    // 不是合法的 URL 編碼，視為一般字串
    return trimmed;
  }
}

/**
 * 產生異體字變體（台↔臺）
 */
function getVariants(input: string): string[] {
  const variants: string[] = [];
  if (input.includes('台')) {
    variants.push(input.replace(/台/g, '臺'));
  }
  if (input.includes('臺')) {
    variants.push(input.replace(/臺/g, '台'));
  }
  return variants;
}
