import type {
  ClockPort,
  DeliveryResult,
  LoggerPort,
  Reading,
  ReadingArchivePort,
  ReadingInput,
  ReadingSink,
  SourceHealth,
  TelemetryIngestionPort,
  TelemetrySourcePort,
  TelemetryUnavailableError,
} from '@vehicle-dash/domain';
import { isDashboardError } from '@vehicle-dash/domain';
import { systemClock } from '@vehicle-dash/adapters';

export interface TelemetryFeedOptions {
  runId: string;
  source: TelemetrySourcePort;
  aggregator: TelemetryIngestionPort;
  logger: LoggerPort;
  /** Checked between ingest calls; once aborted the rest of a batch is dropped */
  signal?: AbortSignal;
  archive?: ReadingArchivePort;
  clock?: ClockPort;
}

/**
 * The single delivery path from a telemetry source into the aggregator.
 * Serializes ingest calls, logs discarded readings and tracks source health.
 */
export class TelemetryFeed implements ReadingSink {
  private readonly clock: ClockPort;
  private readonly pendingArchives = new Set<Promise<void>>();
  private state: SourceHealth;

  constructor(private readonly opts: TelemetryFeedOptions) {
    this.clock = opts.clock ?? systemClock;
    this.state = { source: opts.source.name, state: 'connecting', consecutiveFailures: 0 };
  }

  health(): SourceHealth {
    return this.state;
  }

  deliver(readings: readonly ReadingInput[]): DeliveryResult {
    const { aggregator, logger, signal } = this.opts;
    const accepted: Reading[] = [];
    let rejected = 0;

    for (const input of readings) {
      if (signal?.aborted) {
        logger.debug(`shutdown requested, dropping ${readings.length - accepted.length - rejected} readings`);
        break;
      }
      try {
        accepted.push(aggregator.ingest(input));
      } catch (err) {
        if (!isDashboardError(err)) throw err;
        rejected++;
        logger.warn(`discarded reading (${err.name}): ${err.message}`);
      }
    }

    // only accepted readings count as a live delivery
    if (accepted.length > 0) {
      if (this.state.state === 'unavailable') {
        logger.info(`${this.state.source} recovered after ${this.state.consecutiveFailures} failed polls`);
      }
      this.state = {
        source: this.state.source,
        state: 'live',
        lastDeliveryAt: this.clock.now(),
        consecutiveFailures: 0,
      };
    }

    this.archive(accepted);
    return { accepted: accepted.length, rejected };
  }

  reportFailure(error: TelemetryUnavailableError): void {
    const failures = this.state.consecutiveFailures + 1;
    if (this.state.state !== 'unavailable') {
      this.opts.logger.warn(`telemetry unavailable: ${error.message}`);
    } else {
      this.opts.logger.debug(`telemetry still unavailable (${failures} failures): ${error.message}`);
    }
    this.state = {
      ...this.state,
      state: 'unavailable',
      lastError: error.message,
      consecutiveFailures: failures,
    };
  }

  async start(): Promise<void> {
    this.opts.logger.info(`starting telemetry source ${this.opts.source.name}`);
    await this.opts.source.start(this);
  }

  /** Stops the source and waits for in-flight archive writes. */
  async stop(): Promise<void> {
    await this.opts.source.stop();
    await Promise.allSettled([...this.pendingArchives]);
  }

  private archive(readings: Reading[]): void {
    const { archive, runId, logger } = this.opts;
    if (!archive || readings.length === 0) return;

    const write = archive
      .append(runId, readings)
      .catch((err) => logger.error('archive append failed (non-fatal)', err))
      .finally(() => this.pendingArchives.delete(write));
    this.pendingArchives.add(write);
  }
}
