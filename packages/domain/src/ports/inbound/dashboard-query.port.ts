import type { Alert } from '../../entities/alert.js';
import type { DashboardFrame, SourceHealth } from '../../entities/dashboard-frame.js';
import type { MetricName } from '../../entities/metric.js';
import type { Reading } from '../../entities/reading.js';

/** Read side used by the HTTP API */
export interface DashboardQueryPort {
  latestFrame(): DashboardFrame | null;
  currentAlerts(): Alert[];
  history(metric: MetricName): readonly Reading[];
  sourceHealth(): SourceHealth;
  ticksRendered(): number;
}
