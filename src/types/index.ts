export type { FieldValue, EventData, LogEvent, TelemetryRecord } from './event.ts';
export type { LineParser } from './parser.ts';
export type { OutputStream, Publisher, PublisherState } from './publisher.ts';
export type {
  TelemetryClient,
  TelemetryClientConfig,
  TelemetryClientFactory,
} from './telemetry.ts';
