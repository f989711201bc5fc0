import type { Alert } from './alert.js';
import type { VehicleStateSnapshot } from './vehicle-state.js';

export type FrameStatus = 'LIVE' | 'STALE' | 'NO_DATA';

export type SourceState = 'connecting' | 'live' | 'unavailable';

export interface SourceHealth {
  readonly source: string;
  readonly state: SourceState;
  readonly lastDeliveryAt?: Date;
  readonly lastError?: string;
  readonly consecutiveFailures: number;
}

/** Everything one presentation tick renders */
export interface DashboardFrame {
  readonly runId: string;
  readonly tick: number;
  readonly renderedAt: Date;
  readonly status: FrameStatus;
  readonly source: SourceHealth;
  readonly snapshot: VehicleStateSnapshot;
  readonly alerts: readonly Alert[];
}
