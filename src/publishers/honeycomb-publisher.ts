import { DEFAULT_SCRUB_FIELDS, enrichEvent, type EnrichmentContext } from '../enrichers/index.ts';
import { createHoneycombClient, DEFAULT_API_HOST } from '../telemetry/honeycomb-client.ts';
import type { LogEvent } from '../types/event.ts';
import type { TelemetryClient, TelemetryClientFactory } from '../types/telemetry.ts';
import { log } from '../utils/logger.ts';
import { StreamingPublisher, type StreamingPublisherOptions } from './streaming-publisher.ts';

export interface HoneycombPublisherOptions extends StreamingPublisherOptions {
  writeKey: string;
  dataset: string;
  apiHost?: string;
  scrubQuery?: boolean;
  scrubFields?: readonly string[];
  sampleRate?: number;
  addFields?: Record<string, string>;
  /** Builds the transport on first write; defaults to the HTTP batch client. */
  clientFactory?: TelemetryClientFactory;
}

/**
 * Sends parsed events to Honeycomb. Sampling already happened upstream (in
 * the parser), so events go out presampled with the configured rate.
 */
export class HoneycombPublisher extends StreamingPublisher {
  private client?: TelemetryClient;
  private readonly context: EnrichmentContext;
  private readonly clientConfig: { writeKey: string; dataset: string; apiHost: string };
  private readonly clientFactory: TelemetryClientFactory;

  constructor(options: HoneycombPublisherOptions) {
    super('honeycomb publisher', options);
    this.clientConfig = {
      writeKey: options.writeKey,
      dataset: options.dataset,
      apiHost: options.apiHost ?? DEFAULT_API_HOST,
    };
    this.context = {
      scrubQuery: options.scrubQuery ?? false,
      scrubFields: options.scrubFields ?? DEFAULT_SCRUB_FIELDS,
      addFields: { ...options.addFields },
      sampleRate: options.sampleRate ?? 1,
    };
    this.clientFactory = options.clientFactory ?? createHoneycombClient;
  }

  protected override initialize(): void {
    this.client = this.clientFactory({ ...this.clientConfig, sampleRate: this.context.sampleRate });
  }

  protected override async deliver(event: LogEvent): Promise<void> {
    const client = this.client;
    if (!client) {
      throw new Error(`${this.name} received an event before initialization`);
    }

    const { record, rejected } = enrichEvent(event, this.context);
    for (const error of rejected) {
      log.error('Unexpected error adding field to honeycomb event', {
        event,
        field: error.field,
        error,
      });
    }

    try {
      await client.send(record);
    } catch (error) {
      log.error('Unexpected error sending event to honeycomb', { event, error });
    }
  }

  protected override async flush(): Promise<void> {
    await this.client?.close();
  }
}
