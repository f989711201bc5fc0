import type { MetricName } from './metric.js';
import type { Reading } from './reading.js';

export interface MetricSnapshot {
  readonly metric: MetricName;
  readonly current: Reading;
  /** Oldest first; length never exceeds the aggregator's history capacity */
  readonly history: readonly Reading[];
  /** Wall-clock instant the aggregator accepted `current` */
  readonly lastUpdatedAt: Date;
}

/** Immutable, consistent copy of the aggregated vehicle state at one instant */
export interface VehicleStateSnapshot {
  readonly version: number;
  /** When this version was first read; snapshots of an unchanged version share it */
  readonly takenAt: Date;
  readonly historyCapacity: number;
  readonly metrics: Readonly<Partial<Record<MetricName, MetricSnapshot>>>;
}
