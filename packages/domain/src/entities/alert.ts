import type { MetricName } from './metric.js';

/** Acceptable range for one metric; an omitted bound is open on that side */
export interface ThresholdRange {
  readonly min?: number;
  readonly max?: number;
}

export type AlertThresholds = Readonly<Partial<Record<MetricName, ThresholdRange>>>;

export type AlertDirection = 'ABOVE_MAX' | 'BELOW_MIN';

export interface Alert {
  readonly metric: MetricName;
  readonly value: number;
  readonly direction: AlertDirection;
  /** The bound that was crossed */
  readonly limit: number;
  readonly ts: Date;
  readonly message: string;
}
