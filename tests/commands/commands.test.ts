import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { cli } from '../../src/cli.js';
import { createAppContext, type AppContext } from '../../src/lib/app-context.js';
import { StationNotFoundError } from '../../src/lib/errors.js';
import { generateCalendar, STDOUT_OUTPUT } from '../../src/commands/generate.js';
import { resetStationsCache } from '../../src/commands/stations.js';
import { ConfigService } from '../../src/services/config.js';
import { FIXED_NOW, createFakeSource, createTestRegistry } from '../helpers/fixtures.js';

const MISSING_CONFIG = '/nonexistent/tide-calendar/config.json';

let tmpDir: string;

function run(...args: string[]): Promise<unknown> {
  return cli.parseAsync(args, { from: 'user' });
}

/**
 * 取出第 n 次 console.log 的 JSON 輸出
 */
function loggedJson(calls: ReadonlyArray<ReadonlyArray<unknown>>, call = 0): unknown {
  return JSON.parse(String(calls[call]?.[0]));
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tide-cal-'));
  const stationsFile = path.join(tmpDir, 'stations.json');
  fs.writeFileSync(
    stationsFile,
    JSON.stringify([
      { LocationId: '10017010', LocationName: '基隆市中正區' },
      { LocationId: '10016010', LocationName: '澎湖縣馬公市' },
    ])
  );

  vi.stubEnv('STATIONS_FILE', stationsFile);
  vi.stubEnv('CACHE_MODE', 'none');
  vi.stubEnv('CWA_API_KEY', '');
  vi.stubEnv('LOG_LEVEL', '');
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  resetStationsCache();
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  process.exitCode = undefined;
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('generateCalendar', () => {
  let ctx: AppContext;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    ctx = createAppContext({
      config: new ConfigService(MISSING_CONFIG, {}),
      source: createFakeSource().source,
      stations: createTestRegistry(),
      clock: () => FIXED_NOW,
    });
  });

  it('should write the calendar and summarize it', async () => {
    const output = path.join(tmpDir, 'nested', 'keelung.ics');
    const result = await generateCalendar(ctx, { station: '基隆市中正區', days: '2', output });

    expect(result).toEqual({
      success: true,
      station: { id: '10017010', name: '基隆市中正區' },
      days: 2,
      eventCount: 6,
      firstEvent: '2025-12-27T12:20:00',
      lastEvent: '2025-12-30T07:30:00',
      output,
    });

    const ics = fs.readFileSync(output, 'utf-8');
    expect(ics.startsWith('BEGIN:VCALENDAR\r\n')).toBe(true);
    expect(ics.match(/BEGIN:VEVENT/g)).toHaveLength(6);
  });

  it('should write to stdout for -', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    const result = await generateCalendar(ctx, { station: '10016010', output: STDOUT_OUTPUT });

    expect(result.days).toBe(30);
    expect(result.eventCount).toBe(1);
    const written = write.mock.calls.map((call) => String(call[0])).join('');
    expect(written).toContain('BEGIN:VCALENDAR\r\n');
    expect(written).toContain('SUMMARY:澎湖馬公 🔺滿潮 120cm\r\n');
  });

  it('should omit first and last events when the window is empty', async () => {
    const { source } = createFakeSource(async () => ({
      success: 'true',
      records: {
        TideForecasts: [
          {
            Location: {
              LocationId: '10017010',
              LocationName: '基隆市中正區',
              TimePeriods: {
                Daily: [
                  {
                    Date: '2026-03-01',
                    Time: [{ DateTime: '2026-03-01T10:00:00+08:00', Tide: '滿潮', TideHeights: { AboveLocalMSL: 40 } }],
                  },
                ],
              },
            },
          },
        ],
      },
    }));
    const emptyCtx = createAppContext({
      config: new ConfigService(MISSING_CONFIG, {}),
      source,
      stations: createTestRegistry(),
      clock: () => FIXED_NOW,
    });

    const result = await generateCalendar(emptyCtx, { station: '基隆市中正區', output: path.join(tmpDir, 'x.ics') });
    expect(result.eventCount).toBe(0);
    expect(result.firstEvent).toBeUndefined();
    expect(result.lastEvent).toBeUndefined();
  });

  it('should not write a file when the upstream payload lacks the station', async () => {
    const { source } = createFakeSource(async () => ({ success: 'true', records: { TideForecasts: [] } }));
    const output = path.join(tmpDir, 'missing.ics');
    const missingCtx = createAppContext({
      config: new ConfigService(MISSING_CONFIG, {}),
      source,
      stations: createTestRegistry(),
      clock: () => FIXED_NOW,
    });

    await expect(generateCalendar(missingCtx, { station: '基隆市中正區', output })).rejects.toThrow(
      StationNotFoundError
    );
    expect(fs.existsSync(output)).toBe(false);
  });
});

describe('tide-cal stations', () => {
  it('should list station ids', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('stations', 'list', '--id-only');

    expect(log).toHaveBeenCalledWith('["10017010","10016010"]');
    expect(process.exitCode).toBeUndefined();
  });

  it('should show station info', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('stations', 'info', '10016010');

    expect(loggedJson(log.mock.calls)).toEqual({ success: true, station: { id: '10016010', name: '澎湖縣馬公市' } });
  });

  it('should report unknown stations with exit code 1', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('stations', 'info', '不存在的站');

    expect(loggedJson(log.mock.calls)).toMatchObject({
      success: false,
      error: { code: 'STATION_NOT_FOUND', message: '找不到潮汐站「不存在的站」' },
    });
    expect(process.exitCode).toBe(1);
  });
});

describe('tide-cal generate', () => {
  it('should fail with exit code 1 for an unknown station', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('generate', '-s', '不存在的站', '-o', path.join(tmpDir, 'out.ics'));

    expect(loggedJson(log.mock.calls)).toMatchObject({ success: false, error: { code: 'STATION_NOT_FOUND' } });
    expect(process.exitCode).toBe(1);
    expect(fs.existsSync(path.join(tmpDir, 'out.ics'))).toBe(false);
  });

  it('should fail with exit code 1 for invalid days', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('generate', '-s', '基隆市中正區', '-d', '45', '-o', path.join(tmpDir, 'out.ics'));

    expect(loggedJson(log.mock.calls)).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR' } });
    expect(process.exitCode).toBe(1);
  });

  it('should fail with exit code 3 when no API key is configured', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('generate', '-s', '基隆市中正區', '-d', '7', '-o', path.join(tmpDir, 'out.ics'));

    expect(loggedJson(log.mock.calls)).toMatchObject({ success: false, error: { code: 'NOT_CONFIGURED' } });
    expect(process.exitCode).toBe(3);
  });
});

describe('tide-cal health', () => {
  it('should exit with 3 when the API key is missing', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('health');

    expect(loggedJson(log.mock.calls)).toMatchObject({
      status: 'degraded',
      api_configured: false,
      stations_loaded: 2,
      cache: { mode: 'none', entryCount: 0 },
    });
    expect(process.exitCode).toBe(3);
  });
});

describe('tide-cal serve', () => {
  it('should reject an invalid port', async () => {
    await run('serve', '-p', 'abc');

    expect(console.error).toHaveBeenCalledWith('❌ 無效的埠號: abc');
    expect(process.exitCode).toBe(1);
  });
});
