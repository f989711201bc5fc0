// ─── Telemetry Sources ────────────────────────────────────────────────────────
export { SimulatedTelemetrySource } from './simulator/simulated-telemetry.source.js';
export type { SimulatorOptions, SimulatedVehicle } from './simulator/simulated-telemetry.source.js';
export {
  HttpPollTelemetrySource,
  parseTelemetryPayload,
} from './http/http-poll-telemetry.source.js';
export type { FetchLike, PollResponse, HttpPollOptions } from './http/http-poll-telemetry.source.js';
export { PushTelemetrySource } from './http/push-telemetry.source.js';

// ─── Display Surfaces ─────────────────────────────────────────────────────────
export { ConsoleDisplaySurface } from './console/console-display.surface.js';
export type { ConsoleDisplayOptions } from './console/console-display.surface.js';
export { renderFrameText } from './console/frame-text.js';
export { NdjsonFrameLogSurface, toFrameLogLine } from './file/ndjson-frame-log.surface.js';
export type { FrameLogLine } from './file/ndjson-frame-log.surface.js';

// ─── PostgreSQL Archive ───────────────────────────────────────────────────────
export { getPool, closePool } from './postgres/pool.js';
export type { DbPool, Queryable } from './postgres/pool.js';
export { PgReadingArchiveRepository } from './postgres/reading-archive.repository.js';

// ─── Logging ──────────────────────────────────────────────────────────────────
export { createConsoleLogger, isLogLevel, LOG_LEVELS } from './logging/console-logger.js';
export type { ConsoleLike, ConsoleLoggerOptions } from './logging/console-logger.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { DeterministicClock, SeededRng, systemClock } from './clock/deterministic-clock.js';
