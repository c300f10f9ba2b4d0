import type { ParserConfig, PublisherConfig, SinglePublisherConfig } from '../config/schema.ts';
import { JsonLinesParser } from '../parsers/json-lines-parser.ts';
import type { LineParser } from '../types/parser.ts';
import type { OutputStream, Publisher } from '../types/publisher.ts';
import type { TelemetryClientFactory } from '../types/telemetry.ts';
import { CompositePublisher } from './composite-publisher.ts';
import { HoneycombPublisher } from './honeycomb-publisher.ts';
import { JsonStdoutPublisher } from './json-stdout-publisher.ts';
import { StdoutPublisher } from './stdout-publisher.ts';

/** Collaborators that don't come from configuration. */
export interface PublisherDeps {
  output?: OutputStream;
  clientFactory?: TelemetryClientFactory;
  parserFactory?: (cfg: ParserConfig) => LineParser;
}

const defaultParserFactory = (cfg: ParserConfig): LineParser => {
  switch (cfg.parserType) {
    case 'json':
      return new JsonLinesParser({ timeFields: cfg.timeFields });
  }
};

export class PublisherFactory {
  static create(cfg: PublisherConfig, deps: PublisherDeps = {}): Publisher {
    // Check if this is a multiple publishers configuration
    if ('publishers' in cfg) {
      const publishers = cfg.publishers.map((publisherConfig) =>
        this.createSinglePublisher(publisherConfig, deps),
      );
      return new CompositePublisher(publishers);
    }
    return this.createSinglePublisher(cfg, deps);
  }

  private static createSinglePublisher(cfg: SinglePublisherConfig, deps: PublisherDeps): Publisher {
    const parserFactory = deps.parserFactory ?? defaultParserFactory;
    switch (cfg.publisherType) {
      case 'honeycomb':
        return new HoneycombPublisher({
          writeKey: cfg.writeKey,
          dataset: cfg.dataset,
          apiHost: cfg.apiHost,
          scrubQuery: cfg.scrubQuery,
          scrubFields: cfg.scrubFields,
          sampleRate: cfg.sampleRate,
          addFields: cfg.addFields,
          channelCapacity: cfg.channelCapacity,
          parser: parserFactory(cfg.parser),
          clientFactory: deps.clientFactory,
        });
      case 'json-stdout':
        return new JsonStdoutPublisher({
          scrubQuery: cfg.scrubQuery,
          scrubFields: cfg.scrubFields,
          addFields: cfg.addFields,
          channelCapacity: cfg.channelCapacity,
          parser: parserFactory(cfg.parser),
          output: deps.output,
        });
      case 'stdout':
        return new StdoutPublisher(deps.output);
    }
  }
}
