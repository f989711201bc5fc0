import type {
  Alert,
  AlertThresholds,
  ClockPort,
  DashboardFrame,
  DashboardQueryPort,
  DisplaySurfacePort,
  FrameStatus,
  LoggerPort,
  MetricName,
  Reading,
  SourceHealth,
  TelemetryIngestionPort,
  VehicleStateSnapshot,
} from '@vehicle-dash/domain';
import { RenderFailureError } from '@vehicle-dash/domain';
import { systemClock } from '@vehicle-dash/adapters';
import { evaluateAlerts } from '../alerts/alert-evaluator.js';

export interface PresentationLoopOptions {
  runId: string;
  aggregator: TelemetryIngestionPort;
  sourceHealth: () => SourceHealth;
  surfaces: DisplaySurfacePort[];
  thresholds: AlertThresholds;
  refreshIntervalMs: number;
  /** Frames older than this render as STALE; 0 disables the age check */
  staleAfterMs: number;
  /** Stop after this many ticks; 0 runs until cancelled */
  maxTicks?: number;
  logger: LoggerPort;
  clock?: ClockPort;
}

export interface TickResult {
  frame: DashboardFrame;
  failures: RenderFailureError[];
}

export type RunOutcome = 'cancelled' | 'completed';

export function frameStatus(
  snapshot: VehicleStateSnapshot,
  source: SourceHealth,
  now: Date,
  staleAfterMs: number,
): FrameStatus {
  let newest = -Infinity;
  for (const snap of Object.values(snapshot.metrics)) {
    if (snap) newest = Math.max(newest, snap.lastUpdatedAt.getTime());
  }
  if (newest === -Infinity) return 'NO_DATA';
  if (source.state === 'unavailable') return 'STALE';
  if (staleAfterMs > 0 && now.getTime() - newest > staleAfterMs) return 'STALE';
  return 'LIVE';
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Periodic render task. Each tick reads only already-ingested state, so a
 * slow or dead telemetry source cannot stall rendering. Cancellation is
 * checked between ticks; a tick in progress always completes.
 */
export class PresentationLoop implements DashboardQueryPort {
  private readonly clock: ClockPort;
  private readonly surfaces: DisplaySurfacePort[];
  private ticks = 0;
  private lastFrame: DashboardFrame | null = null;

  constructor(private readonly opts: PresentationLoopOptions) {
    this.clock = opts.clock ?? systemClock;
    this.surfaces = [...opts.surfaces];
  }

  attach(surface: DisplaySurfacePort): void {
    this.surfaces.push(surface);
  }

  async tick(): Promise<TickResult> {
    const { aggregator, thresholds, staleAfterMs, runId, logger } = this.opts;
    const snapshot = aggregator.snapshot();
    const alerts = evaluateAlerts(snapshot, thresholds);
    const source = this.opts.sourceHealth();
    const renderedAt = this.clock.now();

    const frame: DashboardFrame = Object.freeze({
      runId,
      tick: ++this.ticks,
      renderedAt,
      status: frameStatus(snapshot, source, renderedAt, staleAfterMs),
      source,
      snapshot,
      alerts: Object.freeze(alerts),
    });

    const failures: RenderFailureError[] = [];
    for (const surface of this.surfaces) {
      try {
        await surface.render(frame);
      } catch (err) {
        const failure = new RenderFailureError(surface.name, { cause: err });
        failures.push(failure);
        logger.error(`${failure.message}; retrying next tick`);
      }
    }

    this.lastFrame = frame;
    return { frame, failures };
  }

  async run(signal: AbortSignal): Promise<RunOutcome> {
    const maxTicks = this.opts.maxTicks ?? 0;
    this.opts.logger.info(
      `rendering every ${this.opts.refreshIntervalMs} ms${maxTicks > 0 ? ` for ${maxTicks} ticks` : ''}`,
    );

    while (!signal.aborted) {
      await this.tick();
      if (maxTicks > 0 && this.ticks >= maxTicks) return 'completed';
      await sleep(this.opts.refreshIntervalMs, signal);
    }
    return 'cancelled';
  }

  async closeSurfaces(): Promise<void> {
    for (const surface of this.surfaces) {
      try {
        await surface.close?.();
      } catch (err) {
        this.opts.logger.warn(`closing display surface ${surface.name} failed`, err);
      }
    }
  }

  // ─── DashboardQueryPort ────────────────────────────────────────────────────

  latestFrame(): DashboardFrame | null {
    return this.lastFrame;
  }

  currentAlerts(): Alert[] {
    return evaluateAlerts(this.opts.aggregator.snapshot(), this.opts.thresholds);
  }

  history(metric: MetricName): readonly Reading[] {
    return this.opts.aggregator.snapshot().metrics[metric]?.history ?? [];
  }

  sourceHealth(): SourceHealth {
    return this.opts.sourceHealth();
  }

  ticksRendered(): number {
    return this.ticks;
  }
}
