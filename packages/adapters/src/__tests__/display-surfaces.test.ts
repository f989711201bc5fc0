import { describe, it, expect, jest, afterAll } from '@jest/globals';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { renderFrameText } from '../console/frame-text.js';
import { ConsoleDisplaySurface } from '../console/console-display.surface.js';
import { NdjsonFrameLogSurface, toFrameLogLine } from '../file/ndjson-frame-log.surface.js';
import { LIVE_SOURCE, OVERSPEED, makeFrame } from './frame-fixtures.js';

const RULE = '-------------------------------------------';

// ═══════════════════════════════════════════════════════════════════════════════
// Text rendering
// ═══════════════════════════════════════════════════════════════════════════════

describe('renderFrameText', () => {
  it('renders every metric with its gauge', () => {
    const frame = makeFrame(
      { speedKph: 70, rpm: 2100, batteryPct: 99.97, engineTempC: 88, fuelPct: 79.5 },
      { tick: 3 },
    );
    expect(renderFrameText(frame, 10).split('\n')).toEqual([
      '======== TICK 3/10 ========',
      RULE,
      '      *** Real-Time Vehicle Status ***',
      RULE,
      '  Speed        70 km/h',
      '  RPM          2100 rpm (██)',
      '  Battery      99.97 % [█████████░]',
      '  Engine temp  88.0 °C',
      '  Fuel         79.5 % [███████░░░]',
      RULE,
    ]);
  });

  it('renders a no-data banner and placeholders before any reading', () => {
    const frame = makeFrame(
      {},
      {
        status: 'NO_DATA',
        source: {
          source: 'simulator',
          state: 'unavailable',
          lastError: 'simulator: simulated ECU dropout',
          consecutiveFailures: 1,
        },
      },
    );
    const lines = renderFrameText(frame).split('\n');
    expect(lines[0]).toBe('======== TICK 1 ========');
    expect(lines[4]).toBe(
      '  [NO DATA] waiting for telemetry from simulator (unavailable: simulator: simulated ECU dropout)',
    );
    expect(lines.slice(5, 10)).toEqual([
      '  Speed        --',
      '  RPM          --',
      '  Battery      --',
      '  Engine temp  --',
      '  Fuel         --',
    ]);
  });

  it('marks stale data', () => {
    const frame = makeFrame({ speedKph: 50 }, { status: 'STALE', source: { ...LIVE_SOURCE, state: 'unavailable' } });
    expect(renderFrameText(frame).split('\n')[4]).toBe('  [STALE DATA] last known values from simulator (unavailable)');
  });

  it('appends the alert block', () => {
    const frame = makeFrame({ speedKph: 120 }, { alerts: [OVERSPEED] });
    expect(renderFrameText(frame).split('\n').slice(-3)).toEqual([
      '*** SYSTEM ALERTS ***',
      '  HIGH SPEED ALERT: 120 km/h above max 110 km/h',
      '*********************',
    ]);
  });

  it('clamps the percentage gauge', () => {
    const lines = renderFrameText(makeFrame({ batteryPct: 0, fuelPct: 100 })).split('\n');
    expect(lines[6]).toBe('  Battery      0.00 % [░░░░░░░░░░]');
    expect(lines[8]).toBe('  Fuel         100.0 % [██████████]');
  });
});

describe('ConsoleDisplaySurface', () => {
  it('writes the rendered text once per frame', async () => {
    const write = jest.fn<(text: string) => void>();
    const surface = new ConsoleDisplaySurface({ maxTicks: 10, write });
    const frame = makeFrame({ speedKph: 70 }, { tick: 2 });

    await surface.render(frame);

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith(renderFrameText(frame, 10));
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// NDJSON frame log
// ═══════════════════════════════════════════════════════════════════════════════

describe('toFrameLogLine', () => {
  it('flattens a frame to values and alert messages', () => {
    const line = toFrameLogLine(makeFrame({ speedKph: 120, rpm: 3600 }, { tick: 4, alerts: [OVERSPEED] }));
    expect(line).toEqual({
      ts: '2026-01-01T00:00:00.000Z',
      runId: 'run-test',
      tick: 4,
      status: 'LIVE',
      source: 'live',
      values: { speedKph: 120, rpm: 3600 },
      alerts: ['HIGH SPEED ALERT: 120 km/h above max 110 km/h'],
    });
  });
});

describe('NdjsonFrameLogSurface', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'frame-log-'));

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('appends one JSON line per frame, creating the directory', async () => {
    const file = path.join(dir, 'logs', 'dashboard.log');
    const surface = new NdjsonFrameLogSurface(file);

    await surface.render(makeFrame({ speedKph: 60 }, { tick: 1 }));
    await surface.render(makeFrame({ speedKph: 65 }, { tick: 2 }));
    await surface.close();

    const lines = fs.readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? '')).toMatchObject({ tick: 2, values: { speedKph: 65 } });
  });

  it('rejects render while the path is unwritable and reopens it on the next frame', async () => {
    const target = path.join(dir, 'is-a-directory');
    fs.mkdirSync(target);
    const surface = new NdjsonFrameLogSurface(target);

    await expect(surface.render(makeFrame({ speedKph: 60 }, { tick: 1 }))).rejects.toThrow(/EISDIR/);

    fs.rmdirSync(target);
    await surface.render(makeFrame({ speedKph: 61 }, { tick: 2 }));
    await surface.close();

    const lines = fs.readFileSync(target, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ tick: 2, values: { speedKph: 61 } });
  });

  it('close without any frame is a no-op', async () => {
    const surface = new NdjsonFrameLogSurface(path.join(dir, 'never.log'));
    await surface.close();
    expect(fs.existsSync(path.join(dir, 'never.log'))).toBe(false);
  });
});
