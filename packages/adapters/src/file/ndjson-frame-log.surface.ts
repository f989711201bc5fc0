import fs from 'node:fs';
import path from 'node:path';
import type { DashboardFrame, DisplaySurfacePort, MetricName } from '@vehicle-dash/domain';

export interface FrameLogLine {
  ts: string;
  runId: string;
  tick: number;
  status: DashboardFrame['status'];
  source: string;
  values: Partial<Record<MetricName, number>>;
  alerts: string[];
}

export function toFrameLogLine(frame: DashboardFrame): FrameLogLine {
  const values: Partial<Record<MetricName, number>> = {};
  for (const snap of Object.values(frame.snapshot.metrics)) {
    if (snap) values[snap.metric] = snap.current.value;
  }
  return {
    ts: frame.renderedAt.toISOString(),
    runId: frame.runId,
    tick: frame.tick,
    status: frame.status,
    source: frame.source.state,
    values,
    alerts: frame.alerts.map((a) => a.message),
  };
}

/** Appends one JSON line per tick to a history log file. */
export class NdjsonFrameLogSurface implements DisplaySurfacePort {
  readonly name = 'frame-log';

  private stream: fs.WriteStream | null = null;

  constructor(private readonly filePath: string) {}

  private open(): fs.WriteStream {
    if (!this.stream) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const stream = fs.createWriteStream(this.filePath, { flags: 'a' });
      // the pending write's callback carries the error to `render`; a dead
      // stream is dropped so the next frame reopens the file
      stream.on('error', () => {
        if (this.stream === stream) this.stream = null;
      });
      this.stream = stream;
    }
    return this.stream;
  }

  render(frame: DashboardFrame): Promise<void> {
    const stream = this.open();
    const line = `${JSON.stringify(toFrameLogLine(frame))}\n`;
    return new Promise((resolve, reject) => {
      stream.write(line, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
