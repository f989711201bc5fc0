/**
 * Process Contract Tests
 *
 * Exit codes of `main`: 0 once max_ticks is reached or a shutdown signal
 * arrives, 1 when configuration or the telemetry source fails to start.
 */

import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from '@jest/globals';
import type { DashboardFrame, DisplaySurfacePort } from '@vehicle-dash/domain';
import { main } from '../main.js';
import { recordingLogger } from './helpers.js';

let cwd: string;

beforeEach(() => {
  cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'dashboard-main-'));
});

afterEach(() => {
  fs.rmSync(cwd, { recursive: true, force: true });
});

const QUIET_ENV = { LOG_FILE: '', REFRESH_INTERVAL_SECONDS: '0.001', SIM_INTERVAL_MS: '60000' };

function recordingSurface(onRender?: (frame: DashboardFrame) => void) {
  const frames: DashboardFrame[] = [];
  const surface: DisplaySurfacePort = {
    name: 'recording',
    render: async (frame) => {
      frames.push(frame);
      onRender?.(frame);
    },
  };
  return { frames, surface };
}

describe('main', () => {
  it('exits 0 once max_ticks frames have rendered', async () => {
    const logger = recordingLogger();
    const { frames, surface } = recordingSurface();
    const signals = new EventEmitter();

    const code = await main({ ...QUIET_ENV, MAX_TICKS: '2' }, { logger, cwd, signals, overrides: { surfaces: [surface] } });

    expect(code).toBe(0);
    expect(frames.map((f) => f.tick)).toEqual([1, 2]);
    expect(logger.info).toHaveBeenCalledWith('monitoring cycle complete');
    expect(logger.info).toHaveBeenCalledWith('2 ticks rendered, 5 readings accepted, 0 discarded');
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });

  it('exits 0 after a shutdown signal, finishing the current tick', async () => {
    const logger = recordingLogger();
    const signals = new EventEmitter();
    const { frames, surface } = recordingSurface(() => signals.emit('SIGTERM', 'SIGTERM'));

    const code = await main(QUIET_ENV, { logger, cwd, signals, overrides: { surfaces: [surface] } });

    expect(code).toBe(0);
    expect(frames).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith('SIGTERM received, finishing current tick...');
    expect(logger.info).toHaveBeenCalledWith('shutting down...');
  });

  it('exits 1 on an invalid environment value', async () => {
    const logger = recordingLogger();
    const { frames, surface } = recordingSurface();

    const code = await main({ HISTORY_CAPACITY: 'abc' }, { logger, cwd, overrides: { surfaces: [surface] } });

    expect(code).toBe(1);
    expect(frames).toEqual([]);
    expect(logger.error.mock.calls[0]?.[0]).toMatch(/^startup failed: invalid environment: HISTORY_CAPACITY/);
  });

  it('exits 1 when the poll URL cannot be parsed', async () => {
    const logger = recordingLogger();
    const { frames, surface } = recordingSurface();
    const signals = new EventEmitter();

    const code = await main(
      { ...QUIET_ENV, TELEMETRY_SOURCE: 'http-poll', TELEMETRY_URL: 'not a url' },
      { logger, cwd, signals, overrides: { surfaces: [surface] } },
    );

    expect(code).toBe(1);
    expect(frames).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith('startup failed: invalid telemetry URL "not a url"');
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });
});
