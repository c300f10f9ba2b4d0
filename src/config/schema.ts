// config/schema.ts
import * as z from 'zod';
import { DEFAULT_SCRUB_FIELDS } from '../enrichers/core.ts';
import { DEFAULT_API_HOST } from '../telemetry/honeycomb-client.ts';

// static metadata stamped onto every event, under the parsed fields
const AddFields = z.record(z.string().min(1), z.string()).default({});

const ParserConfigSchema = z.discriminatedUnion('parserType', [
  z.object({
    parserType: z.literal('json'),
    timeFields: z.array(z.string().min(1)).min(1).optional(),
  }),
]);

const ScrubFields = z.array(z.string().min(1)).min(1).default([...DEFAULT_SCRUB_FIELDS]);

const ChannelCapacity = z.number().int().nonnegative().optional();

const HoneycombPublisherSchema = z.object({
  publisherType: z.literal('honeycomb'),
  writeKey: z.string().min(1, 'Honeycomb write key cannot be empty'),
  dataset: z.string().min(1, 'Honeycomb dataset cannot be empty'),
  apiHost: z.url('Invalid URL for Honeycomb API host').default(DEFAULT_API_HOST),
  scrubQuery: z.boolean().default(false),
  scrubFields: ScrubFields,
  sampleRate: z.number().int().positive().default(1),
  addFields: AddFields,
  channelCapacity: ChannelCapacity,
  parser: ParserConfigSchema.default({ parserType: 'json' }),
});

const JsonStdoutPublisherSchema = z.object({
  publisherType: z.literal('json-stdout'),
  scrubQuery: z.boolean().default(false),
  scrubFields: ScrubFields,
  addFields: AddFields,
  channelCapacity: ChannelCapacity,
  parser: ParserConfigSchema.default({ parserType: 'json' }),
});

const StdoutPublisherSchema = z.object({
  publisherType: z.literal('stdout'),
});

const SinglePublisherSchema = z.discriminatedUnion('publisherType', [
  HoneycombPublisherSchema,
  JsonStdoutPublisherSchema,
  StdoutPublisherSchema,
]);

// either one publisher, or several that all receive every chunk
const PublisherConfigSchema = z.union([
  SinglePublisherSchema,
  z.object({
    publishers: z.array(SinglePublisherSchema).min(1, 'At least one publisher is required'),
  }),
]);

export const AppConfig = z.object({
  publisherConfig: PublisherConfigSchema.default({ publisherType: 'stdout' }),
});

export type AppConfig = z.infer<typeof AppConfig>;
export type ParserConfig = z.infer<typeof ParserConfigSchema>;
export type SinglePublisherConfig = z.infer<typeof SinglePublisherSchema>;
export type PublisherConfig = z.infer<typeof PublisherConfigSchema>;
export type HoneycombPublisherConfig = z.infer<typeof HoneycombPublisherSchema>;
export type JsonStdoutPublisherConfig = z.infer<typeof JsonStdoutPublisherSchema>;
