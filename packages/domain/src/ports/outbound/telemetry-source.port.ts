import type { ReadingInput } from '../../entities/reading.js';
import type { TelemetryUnavailableError } from '../../errors.js';

export interface DeliveryResult {
  accepted: number;
  rejected: number;
}

/** Where a telemetry source delivers to */
export interface ReadingSink {
  deliver(readings: readonly ReadingInput[]): DeliveryResult;
  reportFailure(error: TelemetryUnavailableError): void;
}

/**
 * Contract: per metric, readings arrive with non-decreasing timestamps,
 * and every failed poll or push is reported through `reportFailure`.
 */
export interface TelemetrySourcePort {
  readonly name: string;
  start(sink: ReadingSink): Promise<void>;
  stop(): Promise<void>;
}
