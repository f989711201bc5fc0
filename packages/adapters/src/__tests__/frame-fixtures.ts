import type { Alert, DashboardFrame, MetricName, MetricSnapshot, Reading, SourceHealth } from '@vehicle-dash/domain';
import { METRIC_NAMES } from '@vehicle-dash/domain';

export const T0 = new Date('2026-01-01T00:00:00.000Z');

export const LIVE_SOURCE: SourceHealth = {
  source: 'simulator',
  state: 'live',
  lastDeliveryAt: T0,
  consecutiveFailures: 0,
};

/** Frame with the given current values; each metric's history is just its current reading */
export function makeFrame(
  values: Partial<Record<MetricName, number>> = {},
  overrides: Partial<DashboardFrame> = {},
): DashboardFrame {
  const metrics: Partial<Record<MetricName, MetricSnapshot>> = {};
  for (const metric of METRIC_NAMES) {
    const value = values[metric];
    if (value === undefined) continue;
    const current: Reading = { metric, value, ts: T0 };
    metrics[metric] = { metric, current, history: [current], lastUpdatedAt: T0 };
  }
  return {
    runId: 'run-test',
    tick: 1,
    renderedAt: T0,
    status: 'LIVE',
    source: LIVE_SOURCE,
    snapshot: { version: 1, takenAt: T0, historyCapacity: 5, metrics },
    alerts: [],
    ...overrides,
  };
}

export const OVERSPEED: Alert = {
  metric: 'speedKph',
  value: 120,
  direction: 'ABOVE_MAX',
  limit: 110,
  ts: T0,
  message: 'HIGH SPEED ALERT: 120 km/h above max 110 km/h',
};
