import { DEFAULT_SCRUB_FIELDS, enrichEvent, type EnrichmentContext } from '../enrichers/index.ts';
import type { LogEvent } from '../types/event.ts';
import type { OutputStream } from '../types/publisher.ts';
import { log } from '../utils/logger.ts';
import { StreamingPublisher, type StreamingPublisherOptions } from './streaming-publisher.ts';
import { writeOutput } from './write-output.ts';

export interface JsonStdoutPublisherOptions extends StreamingPublisherOptions {
  scrubQuery?: boolean;
  scrubFields?: readonly string[];
  addFields?: Record<string, string>;
  output?: OutputStream;
}

/** Prints each parsed event as one JSON object per line. */
export class JsonStdoutPublisher extends StreamingPublisher {
  private readonly context: EnrichmentContext;
  private readonly output: OutputStream;

  constructor(options: JsonStdoutPublisherOptions) {
    super('json stdout publisher', options);
    this.context = {
      scrubQuery: options.scrubQuery ?? false,
      scrubFields: options.scrubFields ?? DEFAULT_SCRUB_FIELDS,
      addFields: { ...options.addFields },
      sampleRate: 1,
    };
    this.output = options.output ?? process.stdout;
  }

  protected override async deliver(event: LogEvent): Promise<void> {
    const { record, rejected } = enrichEvent(event, this.context);
    for (const error of rejected) {
      log.error('Unexpected error adding field to event', { event, field: error.field, error });
    }

    // the event's own timestamp replaces any parsed field of the same name
    const line = JSON.stringify({ ...record.data, timestamp: record.timestamp.toISOString() });
    try {
      await writeOutput(this.output, `${line}\n`);
    } catch (error) {
      log.error('Unexpected error printing event to stdout', { event, error });
    }
  }
}
