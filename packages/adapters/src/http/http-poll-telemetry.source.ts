import { fetch } from 'undici';
import { z } from 'zod';
import type { ReadingInput, ReadingSink, TelemetrySourcePort } from '@vehicle-dash/domain';
import { StartupError, TelemetryUnavailableError } from '@vehicle-dash/domain';

/** Minimal response surface the poller reads */
export interface PollResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string) => Promise<PollResponse>;

export interface HttpPollOptions {
  url: string;
  intervalMs: number;
  timeoutMs?: number;
  fetchFn?: FetchLike;
}

const timestampSchema = z.union([z.number(), z.string().datetime()]).transform((v) => new Date(v));

const readingSchema = z.object({
  metric: z.string().min(1),
  value: z.number(),
  ts: timestampSchema,
});

/**
 * Accepted payloads:
 *   { readings: [{ metric, value, ts }] }
 *   { ts, speedKph: 60, rpm: 1800, ... }   flat status document, one reading per numeric field
 */
const batchSchema = z.object({ readings: z.array(readingSchema) });
const flatSchema = z.object({ ts: timestampSchema }).catchall(z.unknown());

export function parseTelemetryPayload(body: unknown): ReadingInput[] {
  const batch = batchSchema.safeParse(body);
  if (batch.success) return batch.data.readings;

  const { ts, ...fields } = flatSchema.parse(body);
  const readings: ReadingInput[] = [];
  for (const [metric, value] of Object.entries(fields)) {
    if (typeof value === 'number') readings.push({ metric, value, ts });
  }
  return readings;
}

export class HttpPollTelemetrySource implements TelemetrySourcePort {
  readonly name = 'http-poll';

  private readonly fetchFn: FetchLike;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight = false;

  constructor(private readonly opts: HttpPollOptions) {
    const timeoutMs = opts.timeoutMs ?? 5_000;
    this.fetchFn = opts.fetchFn ?? ((url) => fetch(url, { signal: AbortSignal.timeout(timeoutMs) }));
  }

  async poll(sink: ReadingSink): Promise<void> {
    if (this.inFlight) return;
    this.inFlight = true;
    try {
      const res = await this.fetchFn(this.opts.url);
      if (!res.ok) {
        sink.reportFailure(new TelemetryUnavailableError(this.name, `HTTP ${res.status} from ${this.opts.url}`));
        return;
      }
      sink.deliver(parseTelemetryPayload(await res.json()));
    } catch (err) {
      const reason = err instanceof z.ZodError ? 'malformed payload' : 'request failed';
      const detail = err instanceof Error ? err.message : String(err);
      sink.reportFailure(new TelemetryUnavailableError(this.name, `${reason}: ${detail}`, { cause: err }));
    } finally {
      this.inFlight = false;
    }
  }

  async start(sink: ReadingSink): Promise<void> {
    try {
      new URL(this.opts.url);
    } catch (err) {
      throw new StartupError(`invalid telemetry URL "${this.opts.url}"`, { cause: err });
    }
    if (this.timer) return;
    await this.poll(sink);
    this.timer = setInterval(() => void this.poll(sink), this.opts.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
