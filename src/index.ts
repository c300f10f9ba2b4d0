// Main project index - organized exports

// Publishers
export { StreamingPublisher } from './publishers/streaming-publisher.ts';
export type { StreamingPublisherOptions } from './publishers/streaming-publisher.ts';
export { HoneycombPublisher } from './publishers/honeycomb-publisher.ts';
export type { HoneycombPublisherOptions } from './publishers/honeycomb-publisher.ts';
export { JsonStdoutPublisher } from './publishers/json-stdout-publisher.ts';
export type { JsonStdoutPublisherOptions } from './publishers/json-stdout-publisher.ts';
export { StdoutPublisher } from './publishers/stdout-publisher.ts';
export { CompositePublisher } from './publishers/composite-publisher.ts';
export { PublisherFactory } from './publishers/publisher-factory.ts';
export type { PublisherDeps } from './publishers/publisher-factory.ts';

// Pipeline
export { Channel } from './pipeline/channel.ts';
export { EventPipeline } from './pipeline/event-pipeline.ts';
export type { EventHandler, EventPipelineOptions } from './pipeline/event-pipeline.ts';
export { splitLines } from './pipeline/lines.ts';

// Enrichment
export * from './enrichers/index.ts';

// Transport and parsing
export { HoneycombClient, createHoneycombClient } from './telemetry/honeycomb-client.ts';
export type { HoneycombClientOptions } from './telemetry/honeycomb-client.ts';
export { JsonLinesParser } from './parsers/json-lines-parser.ts';
export { lineAlignedChunks } from './sources/line-chunks.ts';

// Configuration
export { loadConfig, parseConfig } from './config/load.ts';
export type {
  AppConfig,
  ParserConfig,
  PublisherConfig,
  SinglePublisherConfig,
} from './config/schema.ts';

// Errors and types
export * from './errors.ts';
export type * from './types/index.ts';
