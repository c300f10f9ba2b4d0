/**
 * @fileoverview Core types for the per-event enrichment stage.
 *
 * Enrichers run synchronously inside a publisher's deliver task, one event at
 * a time, so they never see concurrent mutation of the same event.
 */

import type { FieldValue, LogEvent } from '../types/event.ts';
import type { FieldMergeError } from '../errors.ts';

export type EnrichmentContext = {
  scrubQuery: boolean;
  scrubFields: readonly string[];
  addFields: Readonly<Record<string, string>>;
  sampleRate: number;
};

export type Enricher<I, O> = (item: I, ctx: EnrichmentContext) => O;

/** An event whose data has been flattened to sink-ready field values. */
export type MergedEvent = {
  timestamp: Date;
  data: Record<string, FieldValue>;
  rejected: FieldMergeError[];
  source: LogEvent;
};

export const DEFAULT_SCRUB_FIELDS: readonly string[] = ['query'];
