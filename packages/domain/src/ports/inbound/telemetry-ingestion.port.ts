import type { Alert, AlertThresholds } from '../../entities/alert.js';
import type { Reading, ReadingInput } from '../../entities/reading.js';
import type { VehicleStateSnapshot } from '../../entities/vehicle-state.js';

export interface IngestionStats {
  accepted: number;
  rejected: number;
}

/**
 * Single-writer / multi-reader state owner.
 * `ingest` is only ever called from the telemetry feed; readers take snapshots.
 */
export interface TelemetryIngestionPort {
  /** Throws UnknownMetricError, InvalidReadingError or OutOfOrderReadingError; state is untouched on throw */
  ingest(input: ReadingInput): Reading;
  snapshot(): VehicleStateSnapshot;
  evaluateAlerts(thresholds: AlertThresholds): Alert[];
  stats(): IngestionStats;
}
