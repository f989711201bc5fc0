import type {
  Alert,
  AlertThresholds,
  ClockPort,
  IngestionStats,
  MetricName,
  MetricSnapshot,
  Reading,
  ReadingInput,
  TelemetryIngestionPort,
  VehicleStateSnapshot,
} from '@vehicle-dash/domain';
import {
  InvalidReadingError,
  OutOfOrderReadingError,
  UnknownMetricError,
  isMetricName,
} from '@vehicle-dash/domain';
import { systemClock } from '@vehicle-dash/adapters';
import { evaluateAlerts } from '../alerts/alert-evaluator.js';
import { RollingHistory, assertCapacity } from './rolling-history.js';

export interface StateAggregatorOptions {
  historyCapacity: number;
  clock?: ClockPort;
}

interface MetricEntry {
  current: Reading;
  history: RollingHistory<Reading>;
  lastUpdatedAt: Date;
}

/**
 * Owns the vehicle state. One writer (the telemetry feed) calls `ingest`;
 * any number of readers take snapshots. Every ingest validates fully before
 * touching state, so a rejected reading leaves no trace beyond the counter.
 */
export class StateAggregator implements TelemetryIngestionPort {
  private readonly entries = new Map<MetricName, MetricEntry>();
  private readonly clock: ClockPort;
  private version = 0;
  private cached: VehicleStateSnapshot | null = null;
  private accepted = 0;
  private rejected = 0;

  constructor(private readonly opts: StateAggregatorOptions) {
    assertCapacity(opts.historyCapacity);
    this.clock = opts.clock ?? systemClock;
  }

  ingest(input: ReadingInput): Reading {
    let reading: Reading;
    try {
      reading = this.validate(input);
    } catch (err) {
      this.rejected++;
      throw err;
    }

    const lastUpdatedAt = this.clock.now();
    const entry = this.entries.get(reading.metric);
    if (entry) {
      entry.current = reading;
      entry.history.push(reading);
      entry.lastUpdatedAt = lastUpdatedAt;
    } else {
      const history = new RollingHistory<Reading>(this.opts.historyCapacity);
      history.push(reading);
      this.entries.set(reading.metric, { current: reading, history, lastUpdatedAt });
    }

    this.version++;
    this.cached = null;
    this.accepted++;
    return reading;
  }

  /** Copy-on-read; the copy is reused until the next accepted reading. */
  snapshot(): VehicleStateSnapshot {
    if (this.cached) return this.cached;

    const metrics: Partial<Record<MetricName, MetricSnapshot>> = {};
    for (const [metric, entry] of this.entries) {
      metrics[metric] = Object.freeze({
        metric,
        current: entry.current,
        history: Object.freeze(entry.history.toArray()),
        lastUpdatedAt: new Date(entry.lastUpdatedAt.getTime()),
      });
    }

    this.cached = Object.freeze({
      version: this.version,
      takenAt: this.clock.now(),
      historyCapacity: this.opts.historyCapacity,
      metrics: Object.freeze(metrics),
    });
    return this.cached;
  }

  evaluateAlerts(thresholds: AlertThresholds): Alert[] {
    return evaluateAlerts(this.snapshot(), thresholds);
  }

  stats(): IngestionStats {
    return { accepted: this.accepted, rejected: this.rejected };
  }

  private validate(input: ReadingInput): Reading {
    const { metric, value } = input;
    if (!isMetricName(metric)) throw new UnknownMetricError(metric);
    if (!Number.isFinite(value)) {
      throw new InvalidReadingError(`${metric} value must be a finite number, got ${value}`);
    }

    const ts = new Date(input.ts instanceof Date ? input.ts.getTime() : input.ts);
    if (Number.isNaN(ts.getTime())) {
      throw new InvalidReadingError(`${metric} reading has an invalid timestamp`);
    }

    const current = this.entries.get(metric)?.current;
    if (current && ts.getTime() < current.ts.getTime()) {
      throw new OutOfOrderReadingError(
        `${metric} reading at ${ts.toISOString()} is older than current ${current.ts.toISOString()}`,
      );
    }

    return Object.freeze({ metric, value, ts });
  }
}
