import { describe, it, expect, jest, afterEach } from '@jest/globals';
import type { DeliveryResult, ReadingInput, ReadingSink } from '@vehicle-dash/domain';
import { TelemetryUnavailableError } from '@vehicle-dash/domain';
import { DeterministicClock } from '../clock/deterministic-clock.js';
import { SimulatedTelemetrySource } from '../simulator/simulated-telemetry.source.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function recordingSink() {
  const batches: ReadingInput[][] = [];
  const failures: TelemetryUnavailableError[] = [];
  const sink: ReadingSink = {
    deliver: (readings): DeliveryResult => {
      batches.push([...readings]);
      return { accepted: readings.length, rejected: 0 };
    },
    reportFailure: (err) => failures.push(err),
  };
  return { sink, batches, failures };
}

function valueOf(batch: ReadingInput[], metric: string): number {
  const reading = batch.find((r) => r.metric === metric);
  if (!reading) throw new Error(`no ${metric} reading`);
  return reading.value;
}

afterEach(() => {
  jest.useRealTimers();
});

// ─── Model ────────────────────────────────────────────────────────────────────

describe('SimulatedTelemetrySource.step', () => {
  it('emits one reading per metric, all stamped with the same instant', () => {
    const clock = new DeterministicClock(Date.UTC(2026, 0, 1), 500);
    const sim = new SimulatedTelemetrySource({ seed: 1, intervalMs: 500, clock });

    const batch = sim.step();
    expect(batch.map((r) => r.metric)).toEqual(['speedKph', 'rpm', 'batteryPct', 'engineTempC', 'fuelPct']);
    for (const r of batch) expect(r.ts).toEqual(new Date(Date.UTC(2026, 0, 1)));

    const next = sim.step();
    expect(next[0]?.ts).toEqual(new Date(Date.UTC(2026, 0, 1) + 500));
  });

  it('is reproducible for a given seed', () => {
    const a = new SimulatedTelemetrySource({ seed: 42, intervalMs: 500, clock: new DeterministicClock(0) });
    const b = new SimulatedTelemetrySource({ seed: 42, intervalMs: 500, clock: new DeterministicClock(0) });
    for (let i = 0; i < 10; i++) expect(a.step()).toEqual(b.step());
  });

  it('keeps every value inside its physical envelope over a long drive', () => {
    const sim = new SimulatedTelemetrySource({ seed: 7, intervalMs: 500, initialSpeedKph: 120 });
    let prev = sim.state();
    let prevFuel = 80;
    for (let i = 0; i < 300; i++) {
      const batch = sim.step();
      const speed = valueOf(batch, 'speedKph');
      const rpm = valueOf(batch, 'rpm');
      const battery = valueOf(batch, 'batteryPct');
      const fuel = valueOf(batch, 'fuelPct');

      expect(speed).toBeGreaterThanOrEqual(0);
      expect(Math.abs(speed - prev.speedKph)).toBeLessThanOrEqual(15);
      expect(rpm).toBeGreaterThanOrEqual(800);
      expect(rpm).toBeLessThanOrEqual(6500);
      expect(battery).toBeLessThan(prev.batteryPct);
      expect(fuel).toBeLessThanOrEqual(prevFuel);

      prev = sim.state();
      prevFuel = fuel;
    }
    // at least 0.001 % burned per step
    expect(prevFuel).toBeLessThanOrEqual(79.7);
  });

  it('starts from the configured speed', () => {
    const sim = new SimulatedTelemetrySource({ seed: 5, intervalMs: 500, initialSpeedKph: 120 });
    expect(sim.state()).toEqual({ speedKph: 120, rpm: 0, batteryPct: 100, engineTempC: 20, fuelPct: 80 });
    const speed = valueOf(sim.step(), 'speedKph');
    expect(speed).toBeGreaterThanOrEqual(105);
    expect(speed).toBeLessThanOrEqual(135);
  });

  it('warms the engine from ambient temperature', () => {
    const sim = new SimulatedTelemetrySource({ seed: 11, intervalMs: 500 });
    for (let i = 0; i < 60; i++) sim.step();
    expect(sim.state().engineTempC).toBeGreaterThan(60);
  });
});

// ─── Delivery ─────────────────────────────────────────────────────────────────

describe('SimulatedTelemetrySource delivery', () => {
  it('reports a failure instead of readings when the dropout fires', () => {
    const sim = new SimulatedTelemetrySource({ seed: 3, intervalMs: 500, failureRate: 1 });
    const { sink, batches, failures } = recordingSink();
    sim.poll(sink);
    expect(batches).toHaveLength(0);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.message).toBe('simulator: simulated ECU dropout');
  });

  it('polls immediately on start, then every interval until stopped', async () => {
    jest.useFakeTimers();
    const sim = new SimulatedTelemetrySource({ seed: 3, intervalMs: 500 });
    const { sink, batches } = recordingSink();

    await sim.start(sink);
    expect(batches).toHaveLength(1);

    jest.advanceTimersByTime(1_000);
    expect(batches).toHaveLength(3);

    await sim.stop();
    jest.advanceTimersByTime(1_000);
    expect(batches).toHaveLength(3);
  });
});
