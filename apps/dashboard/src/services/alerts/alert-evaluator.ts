import type {
  Alert,
  AlertDirection,
  AlertThresholds,
  MetricName,
  VehicleStateSnapshot,
} from '@vehicle-dash/domain';
import { METRIC_CATALOG, METRIC_NAMES, formatMetricValue } from '@vehicle-dash/domain';

function buildAlert(metric: MetricName, value: number, direction: AlertDirection, limit: number, ts: Date): Alert {
  const def = METRIC_CATALOG[metric];
  const shown = formatMetricValue(metric, value);
  const message =
    direction === 'ABOVE_MAX'
      ? `HIGH ${def.alertLabel} ALERT: ${shown} above max ${limit} ${def.unit}`
      : `LOW ${def.alertLabel} ALERT: ${shown} below min ${limit} ${def.unit}`;
  return Object.freeze({ metric, value, direction, limit, ts, message });
}

/**
 * Metrics whose current value lies outside their [min, max] range, in
 * catalogue order. Values equal to a bound are in range. Metrics with no
 * reading or no configured range never alert.
 */
export function evaluateAlerts(snapshot: VehicleStateSnapshot, thresholds: AlertThresholds): Alert[] {
  const alerts: Alert[] = [];
  for (const metric of METRIC_NAMES) {
    const range = thresholds[metric];
    const current = snapshot.metrics[metric]?.current;
    if (!range || !current) continue;

    if (range.max !== undefined && current.value > range.max) {
      alerts.push(buildAlert(metric, current.value, 'ABOVE_MAX', range.max, current.ts));
    } else if (range.min !== undefined && current.value < range.min) {
      alerts.push(buildAlert(metric, current.value, 'BELOW_MIN', range.min, current.ts));
    }
  }
  return alerts;
}
