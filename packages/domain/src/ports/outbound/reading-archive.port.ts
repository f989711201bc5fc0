import type { Reading } from '../../entities/reading.js';

export interface ReadingArchivePort {
  append(runId: string, readings: readonly Reading[]): Promise<void>;
  close(): Promise<void>;
}
