import { v4 as uuidv4 } from 'uuid';
import type {
  ClockPort,
  DisplaySurfacePort,
  LoggerPort,
  ReadingArchivePort,
  TelemetrySourcePort,
} from '@vehicle-dash/domain';
import {
  ConsoleDisplaySurface,
  HttpPollTelemetrySource,
  NdjsonFrameLogSurface,
  PgReadingArchiveRepository,
  PushTelemetrySource,
  SimulatedTelemetrySource,
  getPool,
} from '@vehicle-dash/adapters';
import type { DashboardConfig } from './config/dashboard-config.js';
import { StateAggregator } from './services/aggregator/state-aggregator.js';
import { TelemetryFeed } from './services/ingestion/telemetry-feed.js';
import { PresentationLoop } from './services/presentation/presentation-loop.js';

export interface Runtime {
  runId: string;
  aggregator: StateAggregator;
  feed: TelemetryFeed;
  loop: PresentationLoop;
  source: TelemetrySourcePort;
  /** Non-null only for the http-push source; the ingest route needs it */
  push: PushTelemetrySource | null;
  archive: ReadingArchivePort | null;
  /** Aborting stops the loop between ticks and the feed between readings */
  shutdown: AbortController;
}

export interface RuntimeOverrides {
  surfaces?: DisplaySurfacePort[];
  source?: TelemetrySourcePort;
  archive?: ReadingArchivePort | null;
  clock?: ClockPort;
}

export function createSource(config: DashboardConfig, clock?: ClockPort): TelemetrySourcePort {
  const t = config.telemetry;
  switch (t.kind) {
    case 'simulator':
      return new SimulatedTelemetrySource({
        seed: t.seed,
        intervalMs: t.intervalMs,
        initialSpeedKph: t.initialSpeedKph,
        failureRate: t.failureRate,
        clock,
      });
    case 'http-poll':
      return new HttpPollTelemetrySource({ url: t.url, intervalMs: t.intervalMs });
    case 'http-push':
      return new PushTelemetrySource();
  }
}

export function defaultSurfaces(config: DashboardConfig): DisplaySurfacePort[] {
  const surfaces: DisplaySurfacePort[] = [new ConsoleDisplaySurface({ maxTicks: config.maxTicks })];
  if (config.logFile) surfaces.push(new NdjsonFrameLogSurface(config.logFile));
  return surfaces;
}

/** Wires the aggregator, feed and loop. Nothing starts until the caller starts the feed and runs the loop. */
export function createRuntime(
  config: DashboardConfig,
  logger: LoggerPort,
  overrides: RuntimeOverrides = {},
): Runtime {
  const runId = uuidv4();
  const shutdown = new AbortController();
  const clock = overrides.clock;

  const aggregator = new StateAggregator({ historyCapacity: config.historyCapacity, clock });
  const source = overrides.source ?? createSource(config, clock);
  const archive =
    overrides.archive !== undefined
      ? overrides.archive
      : config.databaseUrl
        ? new PgReadingArchiveRepository(getPool(config.databaseUrl))
        : null;

  const feed = new TelemetryFeed({
    runId,
    source,
    aggregator,
    logger: logger.child('feed'),
    signal: shutdown.signal,
    archive: archive ?? undefined,
    clock,
  });

  const loop = new PresentationLoop({
    runId,
    aggregator,
    sourceHealth: () => feed.health(),
    surfaces: overrides.surfaces ?? defaultSurfaces(config),
    thresholds: config.alertThresholds,
    refreshIntervalMs: config.refreshIntervalMs,
    staleAfterMs: config.staleAfterMs,
    maxTicks: config.maxTicks,
    logger: logger.child('presentation'),
    clock,
  });

  return {
    runId,
    aggregator,
    feed,
    loop,
    source,
    push: source instanceof PushTelemetrySource ? source : null,
    archive,
    shutdown,
  };
}

/** Stops the source, flushes archive writes and closes surfaces. */
export async function stopRuntime(runtime: Runtime): Promise<void> {
  runtime.shutdown.abort();
  await runtime.feed.stop();
  await runtime.loop.closeSurfaces();
  await runtime.archive?.close();
}
