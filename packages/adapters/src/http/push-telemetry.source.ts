import type { DeliveryResult, ReadingSink, TelemetrySourcePort } from '@vehicle-dash/domain';
import { TelemetryUnavailableError } from '@vehicle-dash/domain';
import { parseTelemetryPayload } from './http-poll-telemetry.source.js';

/**
 * Telemetry pushed by the vehicle over HTTP. The dashboard's ingest route
 * hands request bodies to `push`; the source forwards them to the sink.
 */
export class PushTelemetrySource implements TelemetrySourcePort {
  readonly name = 'http-push';

  private sink: ReadingSink | null = null;

  /** Validates and delivers one request body. Throws ZodError on a malformed body. */
  push(body: unknown): DeliveryResult {
    if (!this.sink) {
      throw new TelemetryUnavailableError(this.name, 'source is not started');
    }
    return this.sink.deliver(parseTelemetryPayload(body));
  }

  async start(sink: ReadingSink): Promise<void> {
    this.sink = sink;
  }

  async stop(): Promise<void> {
    this.sink = null;
  }
}
