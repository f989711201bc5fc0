import type { MetricName } from './metric.js';

/** A single validated telemetry sample. Frozen once created. */
export interface Reading {
  readonly metric: MetricName;
  readonly value: number;
  readonly ts: Date;
}

/** A sample as delivered by a telemetry source, before validation. */
export interface ReadingInput {
  metric: string;
  value: number;
  ts: Date | number; // Date or epoch ms
}
