import { describe, expect, it } from 'vitest';
import { JsonLinesParser } from '../parsers/json-lines-parser.ts';
import type { LogEvent } from '../types/event.ts';

const now = new Date('2030-01-01T00:00:00.000Z');

async function* fromArray(items: string[]): AsyncGenerator<string> {
  for (const item of items) yield item;
}

describe('JsonLinesParser', () => {
  const parser = new JsonLinesParser({ now: () => now });

  it('takes the timestamp field as the event time and drops it from data', () => {
    const event = parser.parseLine('{"timestamp":"2024-01-01T10:00:00.000Z","user":"app"}');
    expect(event).toEqual({ timestamp: new Date('2024-01-01T10:00:00.000Z'), data: { user: 'app' } });
  });

  it('reads epoch seconds and epoch milliseconds', () => {
    expect(parser.parseLine('{"time":1700000000,"a":1}')?.timestamp.getTime()).toBe(1700000000000);
    expect(parser.parseLine('{"ts":1700000000123}')?.timestamp.getTime()).toBe(1700000000123);
  });

  it('falls back to now and keeps an unparseable time field', () => {
    expect(parser.parseLine('{"timestamp":"yesterday-ish","a":1}')).toEqual({
      timestamp: now,
      data: { timestamp: 'yesterday-ish', a: 1 },
    });
  });

  it('uses the configured time fields', () => {
    const custom = new JsonLinesParser({ timeFields: ['at'], now: () => now });
    expect(custom.parseLine('{"at":"2024-06-01T00:00:00.000Z","timestamp":"x"}')).toEqual({
      timestamp: new Date('2024-06-01T00:00:00.000Z'),
      data: { timestamp: 'x' },
    });
  });

  it('skips lines that are not JSON objects', () => {
    expect(parser.parseLine('plain text')).toBeNull();
    expect(parser.parseLine('[1,2]')).toBeNull();
    expect(parser.parseLine('"str"')).toBeNull();
  });

  it('streams events in line order', async () => {
    const events: LogEvent[] = [];
    for await (const event of parser.processLines(fromArray(['{"a":1}', 'junk', '{"a":2}']))) {
      events.push(event);
    }
    expect(events.map((e) => e.data.a)).toEqual([1, 2]);
  });
});
