import type { DashboardFrame, MetricName, SourceHealth } from '@vehicle-dash/domain';
import { METRIC_CATALOG, METRIC_NAMES, formatMetricValue } from '@vehicle-dash/domain';

const RULE = '-'.repeat(43);

function gauge(metric: MetricName, value: number): string {
  switch (metric) {
    case 'rpm':
      return ` (${'█'.repeat(Math.max(0, Math.floor(value / 1000)))})`;
    case 'batteryPct':
    case 'fuelPct': {
      const filled = Math.max(0, Math.min(10, Math.floor(value / 10)));
      return ` [${'█'.repeat(filled)}${'░'.repeat(10 - filled)}]`;
    }
    default:
      return '';
  }
}

function describeSource(source: SourceHealth): string {
  return source.lastError ? `${source.state}: ${source.lastError}` : source.state;
}

/** Plain-text rendering of one frame, one dashboard block per tick. */
export function renderFrameText(frame: DashboardFrame, maxTicks = 0): string {
  const lines: string[] = [
    `======== TICK ${frame.tick}${maxTicks > 0 ? `/${maxTicks}` : ''} ========`,
    RULE,
    '      *** Real-Time Vehicle Status ***',
    RULE,
  ];

  if (frame.status === 'NO_DATA') {
    lines.push(`  [NO DATA] waiting for telemetry from ${frame.source.source} (${describeSource(frame.source)})`);
  } else if (frame.status === 'STALE') {
    lines.push(`  [STALE DATA] last known values from ${frame.source.source} (${describeSource(frame.source)})`);
  }

  for (const metric of METRIC_NAMES) {
    const label = METRIC_CATALOG[metric].label.padEnd(12);
    const current = frame.snapshot.metrics[metric]?.current;
    lines.push(
      current
        ? `  ${label} ${formatMetricValue(metric, current.value)}${gauge(metric, current.value)}`
        : `  ${label} --`,
    );
  }
  lines.push(RULE);

  if (frame.alerts.length > 0) {
    lines.push('*** SYSTEM ALERTS ***');
    for (const alert of frame.alerts) lines.push(`  ${alert.message}`);
    lines.push('*********************');
  }

  return lines.join('\n');
}
