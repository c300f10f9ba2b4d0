import type { TelemetryRecord } from '../types/event.ts';
import type { Enricher, MergedEvent } from './core.ts';

export type EnrichedEvent = {
  record: TelemetryRecord;
  rejected: MergedEvent['rejected'];
};

export const buildRecord = (): Enricher<MergedEvent, EnrichedEvent> => {
  return (merged, ctx) => ({
    record: { timestamp: merged.timestamp, data: merged.data, sampleRate: ctx.sampleRate },
    rejected: merged.rejected,
  });
};
