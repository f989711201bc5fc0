export const METRIC_NAMES = ['speedKph', 'rpm', 'batteryPct', 'engineTempC', 'fuelPct'] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export interface MetricDefinition {
  readonly name: MetricName;
  readonly label: string;
  /** Upper-case label used in alert messages, e.g. `HIGH SPEED ALERT` */
  readonly alertLabel: string;
  readonly unit: string;
  readonly decimals: number;
}

export const METRIC_CATALOG: Readonly<Record<MetricName, MetricDefinition>> = {
  speedKph: { name: 'speedKph', label: 'Speed', alertLabel: 'SPEED', unit: 'km/h', decimals: 0 },
  rpm: { name: 'rpm', label: 'RPM', alertLabel: 'RPM', unit: 'rpm', decimals: 0 },
  batteryPct: { name: 'batteryPct', label: 'Battery', alertLabel: 'BATTERY', unit: '%', decimals: 2 },
  engineTempC: { name: 'engineTempC', label: 'Engine temp', alertLabel: 'ENGINE TEMP', unit: '°C', decimals: 1 },
  fuelPct: { name: 'fuelPct', label: 'Fuel', alertLabel: 'FUEL', unit: '%', decimals: 1 },
};

export function isMetricName(value: string): value is MetricName {
  return (METRIC_NAMES as readonly string[]).includes(value);
}

/** Formats a value with the metric's display precision, e.g. `99.97 %`. */
export function formatMetricValue(metric: MetricName, value: number): string {
  const def = METRIC_CATALOG[metric];
  return `${value.toFixed(def.decimals)} ${def.unit}`;
}
