import { afterEach, describe, expect, it, vi } from 'vitest';
import { PublisherClosedError } from '../errors.ts';
import { HoneycombPublisher, type HoneycombPublisherOptions } from '../publishers/honeycomb-publisher.ts';
import type { LogEvent } from '../types/event.ts';
import type { LineParser } from '../types/parser.ts';
import { HoneycombClient } from '../telemetry/honeycomb-client.ts';
import { sha256Hex } from '../utils/hash.ts';
import { log } from '../utils/logger.ts';
import { FakeParser, FIXED_TIME } from './_utils/fakeParser.ts';
import { countingClientFactory, FakeTelemetryClient } from './_utils/fakeTelemetryClient.ts';

function build(overrides: Partial<HoneycombPublisherOptions> = {}) {
  const client = new FakeTelemetryClient();
  const counting = countingClientFactory(client);
  const publisher = new HoneycombPublisher({
    writeKey: 'test-key',
    dataset: 'test-dataset',
    parser: new FakeParser(),
    clientFactory: counting.factory,
    ...overrides,
  });
  return { publisher, client, configs: counting.configs };
}

describe('HoneycombPublisher', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sets up the client exactly once, on the first write', async () => {
    const { publisher, configs } = build({ sampleRate: 4 });
    expect(publisher.state).toBe('uninitialized');
    expect(configs).toHaveLength(0);

    await publisher.write('a=1\n');
    await publisher.write('a=2\n');
    expect(publisher.state).toBe('initialized');
    expect(configs).toEqual([
      {
        writeKey: 'test-key',
        dataset: 'test-dataset',
        apiHost: 'https://api.honeycomb.io',
        sampleRate: 4,
      },
    ]);

    await publisher.close();
    expect(publisher.state).toBe('closed');
  });

  it('initializes once when writes overlap', async () => {
    const { publisher, configs, client } = build();
    await Promise.all([publisher.write('a=1'), publisher.write('a=2')]);
    await publisher.close();

    expect(configs).toHaveLength(1);
    expect(client.sent.map((r) => r.data.a)).toEqual(['1', '2']);
  });

  it('sends every accepted event before close returns, and nothing after', async () => {
    const { publisher, client } = build();
    await publisher.write('n=1\nn=2\n');
    await publisher.write('n=3');
    await publisher.close();

    expect(client.sent.map((r) => r.data.n)).toEqual(['1', '2', '3']);
    expect(client.closeCalls).toBe(1);
    expect(client.sentAfterClose).toBe(0);
  });

  it('builds records with the event time, merged fields and sample rate', async () => {
    const { publisher, client } = build({ addFields: { env: 'prod', team: 'db' }, sampleRate: 20 });
    await publisher.write('env=staging q=x');
    await publisher.close();

    expect(client.sent).toEqual([
      { timestamp: FIXED_TIME, data: { env: 'staging', team: 'db', q: 'x' }, sampleRate: 20 },
    ]);
  });

  it('hashes the query when scrubbing is on', async () => {
    const { publisher, client } = build({ scrubQuery: true });
    await publisher.write('query=SELECT');
    await publisher.close();

    expect(client.sent[0].data.query).toBe(sha256Hex('SELECT'));
  });

  it('keeps going after a send failure', async () => {
    const errorSpy = vi.spyOn(log, 'error').mockImplementation(() => {});
    const client = new FakeTelemetryClient((record) => record.data.n === '2');
    const publisher = new HoneycombPublisher({
      writeKey: 'test-key',
      dataset: 'test-dataset',
      parser: new FakeParser(),
      clientFactory: () => client,
    });

    await publisher.write('n=1\nn=2\nn=3\n');
    await publisher.close();

    expect(client.sent.map((r) => r.data.n)).toEqual(['1', '3']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('Unexpected error sending event to honeycomb', {
      event: { timestamp: FIXED_TIME, data: { n: '2' } },
      error: expect.any(Error),
    });
  });

  it('logs fields it cannot add and still sends the rest', async () => {
    const errorSpy = vi.spyOn(log, 'error').mockImplementation(() => {});
    const parser: LineParser = {
      async *processLines(lines: AsyncIterable<string>): AsyncIterable<LogEvent> {
        for await (const line of lines) {
          yield { timestamp: FIXED_TIME, data: { line, broken: undefined } };
        }
      },
    };
    const { publisher, client } = build({ parser });

    await publisher.write('hello');
    await publisher.close();

    expect(client.sent.map((r) => r.data)).toEqual([{ line: 'hello' }]);
    expect(errorSpy).toHaveBeenCalledWith(
      'Unexpected error adding field to honeycomb event',
      expect.objectContaining({ field: 'broken' }),
    );
  });

  it('surfaces a client setup failure from the first write', async () => {
    const publisher = new HoneycombPublisher({
      writeKey: 'test-key',
      dataset: 'test-dataset',
      parser: new FakeParser(),
      clientFactory: () => {
        throw new Error('bad api host');
      },
    });

    await expect(publisher.write('a=1')).rejects.toThrow('bad api host');
    expect(publisher.state).toBe('uninitialized');
  });

  it('refuses writes after close', async () => {
    const { publisher } = build();
    await publisher.write('a=1');
    await publisher.close();

    await expect(publisher.write('a=2')).rejects.toBeInstanceOf(PublisherClosedError);
  });

  it('closes without touching the client when nothing was written', async () => {
    const { publisher, configs, client } = build();
    await publisher.close();

    expect(publisher.state).toBe('closed');
    expect(configs).toHaveLength(0);
    expect(client.closeCalls).toBe(0);
  });

  it('returns the same shutdown for repeated close calls', async () => {
    const { publisher, client } = build();
    await publisher.write('a=1');
    const first = publisher.close();
    const second = publisher.close();

    expect(second).toBe(first);
    await first;
    expect(client.closeCalls).toBe(1);
  });

  it('drops only the event with an invalid timestamp from a batch', async () => {
    const errorSpy = vi.spyOn(log, 'error').mockImplementation(() => {});
    const fetchMock = vi.fn(async (..._args: Parameters<typeof fetch>) =>
      new Response(JSON.stringify([{ status: 202 }, { status: 202 }]), { status: 200 }),
    );
    const parser: LineParser = {
      async *processLines(lines: AsyncIterable<string>): AsyncIterable<LogEvent> {
        for await (const line of lines) {
          yield { timestamp: line === 'bad' ? new Date('nope') : FIXED_TIME, data: { line } };
        }
      },
    };
    const publisher = new HoneycombPublisher({
      writeKey: 'test-key',
      dataset: 'test-dataset',
      parser,
      clientFactory: (config) => new HoneycombClient({ ...config, batchSize: 3, fetch: fetchMock }),
    });

    await publisher.write('ok1\nbad\nok2\n');
    await publisher.close();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toEqual([
      { time: FIXED_TIME.toISOString(), samplerate: 1, data: { line: 'ok1' } },
      { time: FIXED_TIME.toISOString(), samplerate: 1, data: { line: 'ok2' } },
    ]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('Unexpected error sending event to honeycomb', {
      event: expect.objectContaining({ data: { line: 'bad' } }),
      error: expect.any(RangeError),
    });
  });
});
