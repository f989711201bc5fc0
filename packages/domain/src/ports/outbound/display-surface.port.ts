import type { DashboardFrame } from '../../entities/dashboard-frame.js';

export interface DisplaySurfacePort {
  readonly name: string;
  render(frame: DashboardFrame): Promise<void>;
  close?(): Promise<void>;
}
