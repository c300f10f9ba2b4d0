/**
 * A scalar field value as accepted by the sinks. Parsers may hand over other
 * JSON values; the merge step flattens or rejects them.
 */
export type FieldValue = string | number | boolean | null;

export type EventData = Record<string, unknown>;

/** A structured record produced by a parser from one or more log lines. */
export interface LogEvent {
  timestamp: Date;
  data: EventData;
}

/** What a sink receives once an event has been enriched. */
export interface TelemetryRecord {
  timestamp: Date;
  data: Record<string, FieldValue>;
  sampleRate: number;
}
