export type DashboardErrorCode =
  | 'UNKNOWN_METRIC'
  | 'INVALID_READING'
  | 'OUT_OF_ORDER_READING'
  | 'TELEMETRY_UNAVAILABLE'
  | 'RENDER_FAILURE'
  | 'CONFIG_ERROR'
  | 'STARTUP_ERROR';

export abstract class DashboardError extends Error {
  abstract readonly code: DashboardErrorCode;
  /** HTTP status used when the error surfaces through the API */
  readonly status: number = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised by `ingest` for a metric name outside the recognised set */
export class UnknownMetricError extends DashboardError {
  readonly code = 'UNKNOWN_METRIC';
  override readonly status = 404;

  constructor(readonly metric: string) {
    super(`unknown metric "${metric}"`);
  }
}

export class InvalidReadingError extends DashboardError {
  readonly code = 'INVALID_READING';
  override readonly status = 400;
}

/** A reading older than the metric's current one */
export class OutOfOrderReadingError extends DashboardError {
  readonly code = 'OUT_OF_ORDER_READING';
  override readonly status = 409;
}

export class TelemetryUnavailableError extends DashboardError {
  readonly code = 'TELEMETRY_UNAVAILABLE';
  override readonly status = 503;

  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${message}`, options);
  }
}

export class RenderFailureError extends DashboardError {
  readonly code = 'RENDER_FAILURE';

  constructor(
    readonly surface: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`display surface "${surface}" failed: ${reason}`, options);
  }
}

export class ConfigError extends DashboardError {
  readonly code = 'CONFIG_ERROR';
}

export class StartupError extends DashboardError {
  readonly code = 'STARTUP_ERROR';
}

export function isDashboardError(err: unknown): err is DashboardError {
  return err instanceof DashboardError;
}
