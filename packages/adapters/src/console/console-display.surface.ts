import type { DashboardFrame, DisplaySurfacePort } from '@vehicle-dash/domain';
import { renderFrameText } from './frame-text.js';

export interface ConsoleDisplayOptions {
  /** Shown as `TICK n/max` when set */
  maxTicks?: number;
  write?: (text: string) => void;
}

export class ConsoleDisplaySurface implements DisplaySurfacePort {
  readonly name = 'console';

  private readonly write: (text: string) => void;

  constructor(private readonly opts: ConsoleDisplayOptions = {}) {
    this.write = opts.write ?? ((text) => console.log(`\n${text}`));
  }

  async render(frame: DashboardFrame): Promise<void> {
    this.write(renderFrameText(frame, this.opts.maxTicks));
  }
}
