import type { TelemetryRecord } from './event.ts';

export interface TelemetryClientConfig {
  writeKey: string;
  dataset: string;
  apiHost: string;
  sampleRate: number;
}

export interface TelemetryClient {
  send(record: TelemetryRecord): Promise<void>;
  // resolves once every outstanding send has been acknowledged
  close(): Promise<void>;
}

export type TelemetryClientFactory = (config: TelemetryClientConfig) => TelemetryClient;
