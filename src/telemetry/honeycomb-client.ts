import Bottleneck from 'bottleneck';
import * as z from 'zod';
import { TelemetryClientClosedError } from '../errors.ts';
import type { TelemetryRecord } from '../types/event.ts';
import type { TelemetryClient, TelemetryClientConfig } from '../types/telemetry.ts';
import { fetchWithRetry } from '../utils/fetchWithRetry.ts';
import { log } from '../utils/logger.ts';

export const DEFAULT_API_HOST = 'https://api.honeycomb.io';

export interface HoneycombClientOptions extends TelemetryClientConfig {
  batchSize?: number;
  batchTimeoutMs?: number;
  maxRetries?: number;
  initialBackoffMs?: number;
  maxConcurrentBatches?: number;
  /** Batches queued or on the wire before `send` starts waiting. */
  maxPendingBatches?: number;
  fetch?: typeof fetch;
}

// the batch endpoint answers 200 with one status per submitted event
const BatchResponse = z.array(
  z.object({
    status: z.number(),
    error: z.string().optional(),
  }),
);

type BatchEvent = {
  time: string;
  samplerate: number;
  data: TelemetryRecord['data'];
};

/**
 * Batches records and posts them to a Honeycomb-compatible `/1/batch` API.
 * Records are presampled: the sample rate rides along but nothing is dropped
 * here. A batch that still fails after retries is logged and dropped.
 */
export class HoneycombClient implements TelemetryClient {
  private pending: TelemetryRecord[] = [];
  private timer: NodeJS.Timeout | null = null;
  private inFlight = new Set<Promise<void>>();
  private closed = false;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly dataset: string;
  private readonly batchSize: number;
  private readonly batchTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly maxPendingBatches: number;
  private readonly limiter: Bottleneck;
  private readonly fetchImpl: typeof fetch;

  constructor({
    writeKey,
    dataset,
    apiHost = DEFAULT_API_HOST,
    batchSize = 50,
    batchTimeoutMs = 100,
    maxRetries = 3,
    initialBackoffMs = 500,
    maxConcurrentBatches = 1,
    maxPendingBatches = 10,
    fetch: fetchImpl = fetch,
  }: HoneycombClientOptions) {
    if (!writeKey) throw new Error('Honeycomb write key is required');
    if (!dataset) throw new Error('Honeycomb dataset is required');
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }
    if (!Number.isInteger(maxPendingBatches) || maxPendingBatches < 1) {
      throw new RangeError(`maxPendingBatches must be a positive integer, got ${maxPendingBatches}`);
    }

    this.dataset = dataset;
    this.url = `${apiHost.replace(/\/+$/, '')}/1/batch/${encodeURIComponent(dataset)}`;
    this.headers = {
      'Content-Type': 'application/json',
      'X-Honeycomb-Team': writeKey,
    };
    this.batchSize = batchSize;
    this.batchTimeoutMs = batchTimeoutMs;
    this.maxRetries = maxRetries;
    this.initialBackoffMs = initialBackoffMs;
    this.maxPendingBatches = maxPendingBatches;
    this.fetchImpl = fetchImpl;
    this.limiter = new Bottleneck({ maxConcurrent: maxConcurrentBatches });
  }

  /**
   * Queues a record for the next batch. Resolves once it is queued, which
   * waits while `maxPendingBatches` batches are still outstanding.
   */
  async send(record: TelemetryRecord): Promise<void> {
    if (Number.isNaN(record.timestamp.getTime())) {
      throw new RangeError('Event timestamp is not a valid date');
    }
    while (!this.closed && this.inFlight.size >= this.maxPendingBatches) {
      await Promise.race(this.inFlight);
    }
    if (this.closed) {
      throw new TelemetryClientClosedError();
    }
    this.pending.push(record);
    if (this.pending.length >= this.batchSize) {
      this.dispatch();
    } else if (!this.timer) {
      this.timer = setTimeout(() => this.dispatch(), this.batchTimeoutMs);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.dispatch();
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private dispatch(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const batch = this.pending.splice(0);
    if (batch.length === 0) return;

    const request = this.postBatch(batch).finally(() => {
      this.inFlight.delete(request);
    });
    this.inFlight.add(request);
  }

  private async postBatch(batch: TelemetryRecord[]): Promise<void> {
    try {
      const body = JSON.stringify(
        batch.map(
          (record): BatchEvent => ({
            time: record.timestamp.toISOString(),
            samplerate: record.sampleRate,
            data: record.data,
          }),
        ),
      );
      const response = await fetchWithRetry(
        () =>
          this.limiter.schedule(() =>
            this.fetchImpl(this.url, { method: 'POST', headers: this.headers, body }),
          ),
        this.maxRetries,
        this.initialBackoffMs,
      );

      if (!response.ok) {
        log.error('Honeycomb rejected event batch', {
          dataset: this.dataset,
          events: batch.length,
          status: response.status,
          statusText: response.statusText,
        });
        return;
      }

      const parsed = BatchResponse.safeParse(await response.json().catch(() => null));
      const failures = parsed.success ? parsed.data.filter((r) => r.status >= 400) : [];
      if (failures.length > 0) {
        log.error('Honeycomb rejected events in batch', {
          dataset: this.dataset,
          events: batch.length,
          rejected: failures.length,
          error: failures[0].error,
        });
      } else {
        log.trace('Sent event batch to Honeycomb', {
          dataset: this.dataset,
          events: batch.length,
        });
      }
    } catch (error) {
      log.error('Unexpected error sending event batch to Honeycomb', {
        dataset: this.dataset,
        events: batch.length,
        error,
      });
    }
  }
}

export const createHoneycombClient = (config: TelemetryClientConfig): TelemetryClient =>
  new HoneycombClient(config);
