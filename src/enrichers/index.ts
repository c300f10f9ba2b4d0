import type { LogEvent } from '../types/event.ts';
import { buildRecord, type EnrichedEvent } from './build-record.ts';
import type { Enricher } from './core.ts';
import { mergeExtraFields } from './merge-fields.ts';
import { pipeline } from './pipeline.ts';
import { scrubSensitiveFields } from './scrub-fields.ts';

export { DEFAULT_SCRUB_FIELDS } from './core.ts';
export type { Enricher, EnrichmentContext, MergedEvent } from './core.ts';
export type { EnrichedEvent } from './build-record.ts';
export { buildRecord } from './build-record.ts';
export { mergeExtraFields, normalizeFieldValue } from './merge-fields.ts';
export { pipeline } from './pipeline.ts';
export { scrubSensitiveFields } from './scrub-fields.ts';

// scrub → merge extra fields → record
export const enrichEvent: Enricher<LogEvent, EnrichedEvent> = pipeline(
  scrubSensitiveFields(),
  mergeExtraFields(),
  buildRecord(),
);
